/**
 * Regional AWS client factory
 *
 * One EC2 and one GuardDuty client per region, created on first use and shared
 * by every component of an export. Clients are built with `maxAttempts: 1`:
 * the export never retries a remote call on its own.
 */

import { EC2Client } from "@aws-sdk/client-ec2";
import { GuardDutyClient } from "@aws-sdk/client-guardduty";
import { fromIni } from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from "@smithy/types";
import type { ExportConfig } from "../config/schema.js";

export type CredentialSource = AwsCredentialIdentity | AwsCredentialIdentityProvider;

export interface RegionalClients {
  readonly defaultRegion: string;
  ec2(region?: string): EC2Client;
  guardDuty(region: string): GuardDutyClient;
  /** Release every client created so far */
  destroy(): void;
}

/**
 * Resolve the credentials handed to every client. Without an explicit source
 * or profile the SDK default provider chain is used.
 */
export function resolveCredentials(
  config: Pick<ExportConfig, "profile">,
  credentials?: CredentialSource,
): CredentialSource | undefined {
  if (credentials) return credentials;
  if (config.profile) return fromIni({ profile: config.profile });
  return undefined;
}

export function createRegionalClients(
  config: Pick<ExportConfig, "defaultRegion" | "profile">,
  credentials?: CredentialSource,
): RegionalClients {
  const resolved = resolveCredentials(config, credentials);
  const ec2Clients = new Map<string, EC2Client>();
  const guardDutyClients = new Map<string, GuardDutyClient>();

  return {
    defaultRegion: config.defaultRegion,

    ec2(region = config.defaultRegion) {
      let client = ec2Clients.get(region);
      if (!client) {
        client = new EC2Client({ region, credentials: resolved, maxAttempts: 1 });
        ec2Clients.set(region, client);
      }
      return client;
    },

    guardDuty(region: string) {
      let client = guardDutyClients.get(region);
      if (!client) {
        client = new GuardDutyClient({ region, credentials: resolved, maxAttempts: 1 });
        guardDutyClients.set(region, client);
      }
      return client;
    },

    destroy() {
      for (const client of ec2Clients.values()) client.destroy();
      for (const client of guardDutyClients.values()) client.destroy();
      ec2Clients.clear();
      guardDutyClients.clear();
    },
  };
}
