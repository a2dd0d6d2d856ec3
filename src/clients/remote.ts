/**
 * Remote call boundary
 *
 * Every AWS call made by the export goes through `callRemote`, which applies
 * the per-call deadline, observes the caller's cancellation signal and turns
 * SDK failures into RemoteServiceError.
 */

import {
  ExportCancelledError,
  RemoteServiceError,
  extractErrorCode,
  extractHttpStatusCode,
  formatErrorMessage,
} from "../errors.js";
import type { RemoteOperation } from "../types.js";

export type RemoteCallContext = {
  operation: RemoteOperation;
  region: string;
  timeoutMs: number;
  signal?: AbortSignal;
};

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new ExportCancelledError();
}

/**
 * Wrap a thrown value as a RemoteServiceError for the given call
 */
export function toRemoteServiceError(err: unknown, context: Pick<RemoteCallContext, "operation" | "region">): RemoteServiceError {
  if (err instanceof RemoteServiceError) return err;
  const code = extractErrorCode(err) ?? (err instanceof Error && err.name !== "Error" ? err.name : undefined);
  return new RemoteServiceError(
    `${context.operation} failed in ${context.region}: ${formatErrorMessage(err)}`,
    {
      operation: context.operation,
      region: context.region,
      code,
      httpStatusCode: extractHttpStatusCode(err),
    },
    { cause: err },
  );
}

/**
 * Run one remote call under a deadline and the caller's abort signal.
 *
 * `call` receives a signal to pass to the SDK's `send`; the call is also raced
 * against the deadline so a transport that ignores the signal cannot hold the
 * export open.
 */
export async function callRemote<T>(
  context: RemoteCallContext,
  call: (abortSignal: AbortSignal) => Promise<T>,
): Promise<T> {
  throwIfCancelled(context.signal);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onCancel: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new RemoteServiceError(
        `${context.operation} in ${context.region} exceeded the ${context.timeoutMs}ms deadline`,
        { operation: context.operation, region: context.region, code: "DeadlineExceeded" },
      );
      reject(err);
      controller.abort(err);
    }, context.timeoutMs);

    if (context.signal) {
      onCancel = () => {
        const err = new ExportCancelledError();
        reject(err);
        controller.abort(err);
      };
      context.signal.addEventListener("abort", onCancel, { once: true });
    }
  });

  try {
    return await Promise.race([call(controller.signal), interrupted]);
  } catch (err) {
    if (err instanceof ExportCancelledError || context.signal?.aborted) {
      throw err instanceof ExportCancelledError ? err : new ExportCancelledError();
    }
    throw toRemoteServiceError(err, context);
  } finally {
    clearTimeout(timer);
    if (onCancel) context.signal?.removeEventListener("abort", onCancel);
  }
}
