/**
 * Region Resolver
 *
 * Lists the regions an export may target: one DescribeRegions call, filtered
 * by name prefix, in the order the provider returned them.
 */

import { DescribeRegionsCommand } from "@aws-sdk/client-ec2";
import type { RegionalClients } from "../clients/factory.js";
import { callRemote } from "../clients/remote.js";
import type { ExportConfig } from "../config/schema.js";
import type { Logger } from "../types.js";
import { noopLogger } from "../logging/logger.js";

export interface RegionResolver {
  listRegions(prefix?: string, signal?: AbortSignal): Promise<string[]>;
}

export type RegionResolverOptions = {
  clients: RegionalClients;
  config: Pick<ExportConfig, "regionPrefix" | "requestTimeoutMs">;
  logger?: Logger;
};

export function createRegionResolver(options: RegionResolverOptions): RegionResolver {
  const { clients, config } = options;
  const logger = options.logger ?? noopLogger;

  return {
    async listRegions(prefix = config.regionPrefix, signal?: AbortSignal): Promise<string[]> {
      const client = clients.ec2();
      const response = await callRemote(
        { operation: "DescribeRegions", region: clients.defaultRegion, timeoutMs: config.requestTimeoutMs, signal },
        (abortSignal) => client.send(new DescribeRegionsCommand({}), { abortSignal }),
      );

      const regions: string[] = [];
      for (const region of response.Regions ?? []) {
        if (region.RegionName?.startsWith(prefix)) regions.push(region.RegionName);
      }

      logger.debug(`Resolved ${regions.length} region(s) matching "${prefix}"`);
      return regions;
    },
  };
}
