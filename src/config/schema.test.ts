import { describe, it, expect } from "vitest";
import { configFromEnv, loadExportConfig } from "./schema.js";
import { InvalidConfigError } from "../errors.js";

function configError(run: () => unknown): InvalidConfigError {
  try {
    run();
  } catch (err) {
    if (err instanceof InvalidConfigError) return err;
    throw err;
  }
  throw new Error("Expected InvalidConfigError");
}

describe("loadExportConfig", () => {
  it("fills defaults", () => {
    expect(loadExportConfig({}, {})).toEqual({
      defaultRegion: "us-east-1",
      regionPrefix: "us-",
      requestTimeoutMs: 30_000,
      regionConcurrency: 1,
      failurePolicy: "abort",
      validateSelection: true,
      pageSize: 50,
      outputDir: ".",
      logLevel: "info",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadExportConfig(
      {},
      {
        AWS_REGION: "eu-west-1",
        AWS_PROFILE: "audit",
        GUARDDUTY_EXPORT_REGION_PREFIX: "eu-",
        GUARDDUTY_EXPORT_TIMEOUT_MS: "5000",
        GUARDDUTY_EXPORT_CONCURRENCY: "4",
        GUARDDUTY_EXPORT_OUTPUT_DIR: "/tmp/exports",
        GUARDDUTY_EXPORT_LOG_LEVEL: "debug",
      },
    );

    expect(config).toMatchObject({
      defaultRegion: "eu-west-1",
      profile: "audit",
      regionPrefix: "eu-",
      requestTimeoutMs: 5000,
      regionConcurrency: 4,
      outputDir: "/tmp/exports",
      logLevel: "debug",
    });
  });

  it("prefers values given in code over the environment", () => {
    const config = loadExportConfig(
      { regionPrefix: "ap-", regionConcurrency: undefined },
      { GUARDDUTY_EXPORT_REGION_PREFIX: "eu-", GUARDDUTY_EXPORT_CONCURRENCY: "3" },
    );

    expect(config.regionPrefix).toBe("ap-");
    expect(config.regionConcurrency).toBe(3);
  });

  it("accepts an empty region prefix", () => {
    expect(loadExportConfig({ regionPrefix: "" }, {}).regionPrefix).toBe("");
  });

  it("ignores empty environment values", () => {
    expect(loadExportConfig({}, { AWS_REGION: "", GUARDDUTY_EXPORT_TIMEOUT_MS: "" })).toMatchObject({
      defaultRegion: "us-east-1",
      requestTimeoutMs: 30_000,
    });
  });

  it("rejects a non-integer environment value", () => {
    const error = configError(() => loadExportConfig({}, { GUARDDUTY_EXPORT_TIMEOUT_MS: "soon" }));

    expect(error.message).toBe('Invalid export configuration: GUARDDUTY_EXPORT_TIMEOUT_MS: expected an integer, got "soon"');
  });

  it("rejects out-of-range values with the offending path", () => {
    const error = configError(() => loadExportConfig({ regionConcurrency: 0, pageSize: 51 }, {}));

    expect(error.errors.some((message) => message.startsWith("/regionConcurrency: "))).toBe(true);
    expect(error.errors.some((message) => message.startsWith("/pageSize: "))).toBe(true);
  });

  it("rejects an unknown log level from the environment", () => {
    const error = configError(() => loadExportConfig({}, { GUARDDUTY_EXPORT_LOG_LEVEL: "loud" }));

    expect(error.errors.some((message) => message.startsWith("/logLevel: "))).toBe(true);
  });

  it("validates finding criteria", () => {
    const error = configError(() => loadExportConfig({ findingCriteria: { minSeverity: 11 } }, {}));

    expect(error.errors.some((message) => message.startsWith("/findingCriteria/minSeverity: "))).toBe(true);
  });

  it("returns a frozen configuration", () => {
    const config = loadExportConfig({ findingCriteria: { minSeverity: 4 } }, {});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.findingCriteria)).toBe(true);
  });
});

describe("configFromEnv", () => {
  it("returns only the variables that are set", () => {
    expect(configFromEnv({ GUARDDUTY_EXPORT_CONCURRENCY: "2" })).toEqual({
      overrides: { regionConcurrency: 2 },
      errors: [],
    });
  });
});
