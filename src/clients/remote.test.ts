import { describe, it, expect, vi } from "vitest";
import { callRemote, toRemoteServiceError } from "./remote.js";
import { ExportCancelledError, RemoteServiceError } from "../errors.js";

const context = { operation: "ListFindings" as const, region: "us-east-1", timeoutMs: 1_000 };

class FakeServiceException extends Error {
  $metadata = { httpStatusCode: 403 };

  constructor(message: string) {
    super(message);
    this.name = "AccessDeniedException";
  }
}

describe("callRemote", () => {
  it("returns the call result", async () => {
    const result = await callRemote(context, async () => ({ FindingIds: ["f-1"] }));
    expect(result).toEqual({ FindingIds: ["f-1"] });
  });

  it("passes an abort signal to the call", async () => {
    const call = vi.fn(async (signal: AbortSignal) => signal.aborted);
    await expect(callRemote(context, call)).resolves.toBe(false);
    expect(call).toHaveBeenCalledWith(expect.any(AbortSignal));
  });

  it("wraps SDK failures as RemoteServiceError", async () => {
    const error = await callRemote(context, async () => {
      throw new FakeServiceException("User is not authorized");
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteServiceError);
    expect(error).toMatchObject({
      message: "ListFindings failed in us-east-1: User is not authorized",
      operation: "ListFindings",
      region: "us-east-1",
      code: "AccessDeniedException",
      httpStatusCode: 403,
    });
  });

  it("fails with DeadlineExceeded when the call outlives its deadline", async () => {
    const call = vi.fn((signal: AbortSignal) => new Promise<string>((resolve) => {
      signal.addEventListener("abort", () => resolve("late"));
    }));

    const error = await callRemote({ ...context, timeoutMs: 10 }, call).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteServiceError);
    expect(error).toMatchObject({
      code: "DeadlineExceeded",
      message: "ListFindings in us-east-1 exceeded the 10ms deadline",
    });
    expect(call.mock.calls[0][0].aborted).toBe(true);
  });

  it("does not start a call once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const call = vi.fn(async () => "never");

    await expect(callRemote({ ...context, signal: controller.signal }, call)).rejects.toBeInstanceOf(
      ExportCancelledError,
    );
    expect(call).not.toHaveBeenCalled();
  });

  it("abandons an in-flight call when cancelled", async () => {
    const controller = new AbortController();
    const pending = callRemote({ ...context, signal: controller.signal }, () => new Promise<string>(() => {}));

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(ExportCancelledError);
  });
});

describe("toRemoteServiceError", () => {
  it("keeps an existing RemoteServiceError", () => {
    const original = new RemoteServiceError("boom", { operation: "GetFindings", region: "us-west-2" });
    expect(toRemoteServiceError(original, context)).toBe(original);
  });

  it("formats non-Error values", () => {
    const error = toRemoteServiceError("socket hang up", { operation: "ListDetectors", region: "us-east-2" });
    expect(error.message).toBe("ListDetectors failed in us-east-2: socket hang up");
    expect(error.code).toBeUndefined();
    expect(error.cause).toBe("socket hang up");
  });

  it("prefers an explicit error code", () => {
    const err = Object.assign(new Error("connect ECONNRESET"), { code: "ECONNRESET" });
    expect(toRemoteServiceError(err, context).code).toBe("ECONNRESET");
  });
});
