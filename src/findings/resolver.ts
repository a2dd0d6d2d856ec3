/**
 * Finding Batch Resolver
 *
 * Fetches full finding records for one page of ids with a single GetFindings
 * call. The provider may leave out ids it cannot resolve; the result is
 * whatever it returned, in its order.
 */

import { GetFindingsCommand } from "@aws-sdk/client-guardduty";
import type { RegionalClients } from "../clients/factory.js";
import { callRemote } from "../clients/remote.js";
import type { ExportConfig } from "../config/schema.js";
import { IncompleteRecordError } from "../errors.js";
import type { Detector, FindingRecord } from "../types.js";

export interface FindingBatchResolver {
  resolve(detector: Detector, findingIds: readonly string[], signal?: AbortSignal): Promise<FindingRecord[]>;
}

/**
 * The GuardDuty finding attributes read by the export
 */
export type FindingFields = {
  Id?: string;
  Title?: string;
  Description?: string;
  Severity?: number;
  CreatedAt?: string;
  UpdatedAt?: string;
};

/**
 * Validate a GuardDuty finding and keep the fields the export needs
 */
export function toFindingRecord(finding: FindingFields, region: string): FindingRecord {
  const { Id, Title, Description, Severity, CreatedAt, UpdatedAt } = finding;

  if (
    Id !== undefined &&
    Title !== undefined &&
    Description !== undefined &&
    Severity !== undefined &&
    Number.isFinite(Severity) &&
    CreatedAt !== undefined &&
    UpdatedAt !== undefined
  ) {
    return {
      id: Id,
      title: Title,
      description: Description,
      severity: Severity,
      createdAt: CreatedAt,
      updatedAt: UpdatedAt,
    };
  }

  const missing: string[] = [];
  if (Id === undefined) missing.push("Id");
  if (Title === undefined) missing.push("Title");
  if (Description === undefined) missing.push("Description");
  if (Severity === undefined || !Number.isFinite(Severity)) missing.push("Severity");
  if (CreatedAt === undefined) missing.push("CreatedAt");
  if (UpdatedAt === undefined) missing.push("UpdatedAt");
  throw new IncompleteRecordError(Id ?? "<unknown>", missing, region);
}

export function createFindingBatchResolver(options: {
  clients: RegionalClients;
  config: Pick<ExportConfig, "requestTimeoutMs">;
}): FindingBatchResolver {
  const { clients, config } = options;

  return {
    async resolve(detector: Detector, findingIds: readonly string[], signal?: AbortSignal): Promise<FindingRecord[]> {
      if (findingIds.length === 0) return [];

      const client = clients.guardDuty(detector.region);
      const response = await callRemote(
        { operation: "GetFindings", region: detector.region, timeoutMs: config.requestTimeoutMs, signal },
        (abortSignal) =>
          client.send(
            new GetFindingsCommand({ DetectorId: detector.detectorId, FindingIds: [...findingIds] }),
            { abortSignal },
          ),
      );

      return (response.Findings ?? []).map((finding) => toFindingRecord(finding, detector.region));
    },
  };
}
