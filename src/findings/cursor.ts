/**
 * Finding Page Cursor
 *
 * ListFindings returns finding ids only, one page per call. The continuation
 * token is kept as an explicit value: `fetchPage` takes the token of the
 * previous page and returns the next one, and `pages` drives it forward until
 * the provider stops returning a token.
 */

import {
  ListFindingsCommand,
  type Condition,
  type FindingCriteria as GuardDutyFindingCriteria,
} from "@aws-sdk/client-guardduty";
import type { RegionalClients } from "../clients/factory.js";
import { callRemote } from "../clients/remote.js";
import type { ExportConfig } from "../config/schema.js";
import { RemoteServiceError } from "../errors.js";
import type { Detector, FindingCriteria, FindingPage } from "../types.js";

export interface FindingPageCursor {
  /**
   * Issue one ListFindings call. `pageNumber` only labels the returned page.
   */
  fetchPage(detector: Detector, continuationToken?: string, pageNumber?: number, signal?: AbortSignal): Promise<FindingPage>;
  /** Single forward pass over every page of `detector` */
  pages(detector: Detector, signal?: AbortSignal): AsyncGenerator<FindingPage, void, undefined>;
}

export function buildFindingCriteria(criteria?: FindingCriteria): GuardDutyFindingCriteria | undefined {
  if (!criteria) return undefined;

  const criterion: Record<string, Condition> = {};
  if (criteria.minSeverity !== undefined) {
    criterion.severity = { GreaterThanOrEqual: criteria.minSeverity };
  }
  if (criteria.includeArchived === false) {
    criterion["service.archived"] = { Equals: ["false"] };
  }

  return Object.keys(criterion).length > 0 ? { Criterion: criterion } : undefined;
}

export function createFindingPageCursor(options: {
  clients: RegionalClients;
  config: Pick<ExportConfig, "requestTimeoutMs" | "pageSize" | "findingCriteria">;
}): FindingPageCursor {
  const { clients, config } = options;
  const findingCriteria = buildFindingCriteria(config.findingCriteria);

  async function fetchPage(
    detector: Detector,
    continuationToken?: string,
    pageNumber = 1,
    signal?: AbortSignal,
  ): Promise<FindingPage> {
    const client = clients.guardDuty(detector.region);
    const response = await callRemote(
      { operation: "ListFindings", region: detector.region, timeoutMs: config.requestTimeoutMs, signal },
      (abortSignal) =>
        client.send(
          new ListFindingsCommand({
            DetectorId: detector.detectorId,
            FindingCriteria: findingCriteria,
            MaxResults: config.pageSize,
            NextToken: continuationToken,
          }),
          { abortSignal },
        ),
    );

    const nextToken = response.NextToken ? response.NextToken : undefined;
    if (nextToken !== undefined && nextToken === continuationToken) {
      throw new RemoteServiceError(
        `ListFindings for detector ${detector.detectorId} returned the continuation token it was given`,
        { operation: "ListFindings", region: detector.region, code: "RepeatedContinuationToken" },
      );
    }

    return { findingIds: response.FindingIds ?? [], nextToken, pageNumber };
  }

  return {
    fetchPage,

    async *pages(detector: Detector, signal?: AbortSignal) {
      let token: string | undefined;
      let pageNumber = 0;
      do {
        pageNumber += 1;
        const page = await fetchPage(detector, token, pageNumber, signal);
        yield page;
        token = page.nextToken;
      } while (token !== undefined);
    },
  };
}
