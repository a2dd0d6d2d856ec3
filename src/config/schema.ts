/**
 * Export configuration schema and loader
 *
 * The configuration is validated once, frozen, and passed to every component
 * factory. Values given in code win over environment variables, which win over
 * schema defaults.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InvalidConfigError } from "../errors.js";

export const FindingCriteriaSchema = Type.Object({
  minSeverity: Type.Optional(Type.Number({ minimum: 0, maximum: 10 })),
  includeArchived: Type.Optional(Type.Boolean()),
});

export const ExportConfigSchema = Type.Object({
  defaultRegion: Type.String({ minLength: 1, default: "us-east-1", description: "Region used to list regions" }),
  profile: Type.Optional(Type.String({ minLength: 1, description: "Shared credentials profile" })),
  regionPrefix: Type.String({ default: "us-", description: "Only regions whose name starts with this prefix are offered" }),
  requestTimeoutMs: Type.Integer({ minimum: 1, default: 30_000, description: "Deadline for each remote call" }),
  regionConcurrency: Type.Integer({ minimum: 1, maximum: 16, default: 1, description: "Regions exported in parallel" }),
  failurePolicy: Type.Union([Type.Literal("abort"), Type.Literal("isolate-regions")], { default: "abort" }),
  validateSelection: Type.Boolean({ default: true, description: "Reject selected regions missing from the region list" }),
  pageSize: Type.Integer({ minimum: 1, maximum: 50, default: 50, description: "ListFindings MaxResults" }),
  findingCriteria: Type.Optional(FindingCriteriaSchema),
  outputDir: Type.String({ minLength: 1, default: "." }),
  logLevel: Type.Union(
    [Type.Literal("debug"), Type.Literal("info"), Type.Literal("warn"), Type.Literal("error"), Type.Literal("silent")],
    { default: "info" },
  ),
});

export type ExportConfig = Readonly<Static<typeof ExportConfigSchema>>;
export type ExportConfigInput = Partial<Static<typeof ExportConfigSchema>>;
export type FailurePolicy = ExportConfig["failurePolicy"];

type Env = Record<string, string | undefined>;

const INTEGER_PATTERN = /^-?\d+$/;

function envInteger(value: string | undefined, name: string, errors: string[]): number | undefined {
  if (value === undefined || value === "") return undefined;
  if (!INTEGER_PATTERN.test(value.trim())) {
    errors.push(`${name}: expected an integer, got "${value}"`);
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function definedEntries(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function envString(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Read configuration overrides from the environment
 */
export function configFromEnv(env: Env): { overrides: Record<string, unknown>; errors: string[] } {
  const errors: string[] = [];
  const candidates: Record<string, unknown> = {
    defaultRegion: envString(env.AWS_REGION),
    profile: envString(env.AWS_PROFILE),
    regionPrefix: env.GUARDDUTY_EXPORT_REGION_PREFIX,
    requestTimeoutMs: envInteger(env.GUARDDUTY_EXPORT_TIMEOUT_MS, "GUARDDUTY_EXPORT_TIMEOUT_MS", errors),
    regionConcurrency: envInteger(env.GUARDDUTY_EXPORT_CONCURRENCY, "GUARDDUTY_EXPORT_CONCURRENCY", errors),
    outputDir: envString(env.GUARDDUTY_EXPORT_OUTPUT_DIR),
    logLevel: envString(env.GUARDDUTY_EXPORT_LOG_LEVEL),
  };

  return { overrides: definedEntries(candidates), errors };
}

/**
 * Build a validated, frozen configuration from code-level input and the environment
 */
export function loadExportConfig(input: ExportConfigInput = {}, env: Env = process.env): ExportConfig {
  const { overrides, errors } = configFromEnv(env);
  const merged = Value.Default(ExportConfigSchema, Value.Clone({ ...overrides, ...definedEntries(input) }));

  for (const error of Value.Errors(ExportConfigSchema, merged)) {
    errors.push(`${error.path || "/"}: ${error.message}`);
  }

  if (errors.length > 0 || !Value.Check(ExportConfigSchema, merged)) {
    throw new InvalidConfigError(`Invalid export configuration: ${errors.join("; ")}`, errors);
  }

  if (merged.findingCriteria) Object.freeze(merged.findingCriteria);
  return Object.freeze(merged);
}
