/**
 * find-serverless-stacks library entry point.
 */

export type * from "@/types";

export { Detector, DEFAULT_MAX_WORKERS } from "@detector/detector";
export type { DetectorOptions } from "@detector/detector";
export {
  RuleEngine,
  ServerlessDeploymentBucketRule,
  defaultRules,
  hasServerlessDeploymentBucket,
} from "@detector/rules";
export type { DetectionRule } from "@detector/rules";
export { DetectionError } from "@detector/errors";
export { createDetectedStack, toStacksOutput } from "@models/stack";
export { CloudFormationStackSource, ACTIVE_STACK_STATUSES } from "@aws/cloudFormationSource";
export { createCloudFormationClient, resolveCredentials } from "@aws/clientFactory";
export { AwsApiError, classifyAwsError } from "@aws/errors";
export type { AwsErrorType } from "@aws/errors";
export { parseRunConfig, ConfigError, ConfigValidationError } from "@core/config";
export { getFormatter, JsonFormatter, TsvFormatter, UnsupportedFormatError } from "@output/formatter";
export type { Formatter } from "@output/formatter";
export { setupLogger } from "@utils/logger";
