/**
 * Detector Enumerator
 */

import { ListDetectorsCommand } from "@aws-sdk/client-guardduty";
import type { RegionalClients } from "../clients/factory.js";
import { callRemote } from "../clients/remote.js";
import type { ExportConfig } from "../config/schema.js";
import type { Detector } from "../types.js";

export interface DetectorEnumerator {
  /** Detectors active in `region`; an empty list when GuardDuty has none there */
  listDetectors(region: string, signal?: AbortSignal): Promise<Detector[]>;
}

export function createDetectorEnumerator(options: {
  clients: RegionalClients;
  config: Pick<ExportConfig, "requestTimeoutMs">;
}): DetectorEnumerator {
  const { clients, config } = options;

  return {
    async listDetectors(region: string, signal?: AbortSignal): Promise<Detector[]> {
      const client = clients.guardDuty(region);
      const response = await callRemote(
        { operation: "ListDetectors", region, timeoutMs: config.requestTimeoutMs, signal },
        (abortSignal) => client.send(new ListDetectorsCommand({}), { abortSignal }),
      );
      return (response.DetectorIds ?? []).map((detectorId) => ({ region, detectorId }));
    },
  };
}
