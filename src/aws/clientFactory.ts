/**
 * CloudFormation client construction.
 *
 * Resolves credentials from a shared-config profile and an optional assumed
 * role, and configures the SDK's adaptive retry mode, which rate-limits
 * requests client-side and backs off on throttling.
 */

import { CloudFormationClient } from "@aws-sdk/client-cloudformation";
import { fromIni, fromTemporaryCredentials } from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentityProvider } from "@aws-sdk/types";
import type { AuthConfig } from "@/types";
import { setupLogger } from "@utils/logger";

const logger = setupLogger("find-serverless-stacks:client");

export const DEFAULT_MAX_ATTEMPTS = 4;

/**
 * Resolve the credential provider for a scan.
 *
 * - A named profile other than "default" is read from the shared config files.
 * - With an assumed role, temporary credentials are requested using the
 *   profile's credentials (or the default chain).
 * - Otherwise undefined is returned and the SDK default chain applies.
 *
 * @param auth - Authentication settings
 * @returns Credential provider, or undefined for the default chain
 */
export function resolveCredentials(auth: AuthConfig): AwsCredentialIdentityProvider | undefined {
  const baseCredentials =
    auth.profile && auth.profile !== "default" ? fromIni({ profile: auth.profile }) : undefined;

  if (!auth.assumeRole) {
    return baseCredentials;
  }

  const { roleArn, sessionName, durationSeconds, externalId } = auth.assumeRole;
  logger.debug({ roleArn, sessionName, durationSeconds }, "Assuming role for scan");

  return fromTemporaryCredentials({
    params: {
      RoleArn: roleArn,
      RoleSessionName: sessionName,
      DurationSeconds: durationSeconds,
      ...(externalId && { ExternalId: externalId }),
    },
    ...(baseCredentials && { masterCredentials: baseCredentials }),
    clientConfig: { region: auth.region },
  });
}

/**
 * Create a CloudFormation client for the given region and credentials.
 *
 * @param auth - Authentication settings
 * @returns Configured client
 */
export function createCloudFormationClient(auth: AuthConfig): CloudFormationClient {
  return new CloudFormationClient({
    region: auth.region,
    credentials: resolveCredentials(auth),
    maxAttempts: auth.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    retryMode: "adaptive",
  });
}
