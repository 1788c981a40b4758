/**
 * Core type definitions for find-serverless-stacks.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Supported output formats.
 */
export type OutputFormat = "json" | "tsv";

/**
 * Lightweight stack reference returned by the bulk listing call.
 *
 * Listing entries can be malformed, so every field is optional. A candidate
 * without a name is skipped by the detector.
 */
export interface StackCandidate {
  readonly name?: string;
  /** Opaque identifier, usually the stack ARN */
  readonly stackId?: string;
  readonly status?: string;
  readonly createdAt?: Date;
  readonly updatedAt?: Date;
}

/**
 * One resource belonging to a stack.
 */
export interface ResourceRecord {
  /** Template-assigned logical ID (e.g., "ServerlessDeploymentBucket") */
  readonly logicalId?: string;
  /** CloudFormation resource type (e.g., "AWS::S3::Bucket") */
  readonly resourceType?: string;
  readonly physicalId?: string;
  readonly status?: string;
}

/**
 * Optional enrichment for a stack.
 *
 * Detail is best-effort: when it cannot be fetched the detector passes
 * `undefined` and falls back to the candidate's fields.
 */
export interface StackDetail {
  readonly description?: string;
  readonly createdAt?: Date;
  readonly updatedAt?: Date;
  readonly tags: Readonly<Record<string, string>>;
}

/**
 * Outcome of a single detection rule.
 */
export interface RuleResult {
  matched: boolean;
  reason: string;
}

/**
 * Rule engine output for one stack.
 *
 * `isMatch` is true if and only if `reasons` is non-empty. Reasons follow
 * rule registration order.
 */
export interface DetectionVerdict {
  readonly isMatch: boolean;
  readonly reasons: readonly string[];
}

/**
 * A stack reported as deployed by the Serverless Framework.
 */
export interface DetectedStack {
  readonly stackName: string;
  readonly stackId: string;
  /** Region the scan ran in, not taken from the stack itself */
  readonly region: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly description: string;
  readonly stackTags: Readonly<Record<string, string>>;
  readonly reasons: readonly string[];
}

/**
 * Output envelope for one scan.
 */
export interface StacksOutput {
  stacks: readonly DetectedStack[];
}

/**
 * Source of stack data consumed by the detector.
 *
 * Implementations must be safe for concurrent use by every worker in the
 * pool. The abort signal is forwarded to every I/O call.
 */
export interface StackDataSource {
  /**
   * List stacks in an active state.
   *
   * @throws Error if listing fails; this is the one scan-fatal condition
   */
  listCandidates(signal?: AbortSignal): Promise<StackCandidate[]>;

  /**
   * Fetch every resource of a stack.
   */
  getResources(stackName: string, signal?: AbortSignal): Promise<ResourceRecord[]>;

  /**
   * Fetch descriptive detail for a stack, or `undefined` when the stack
   * is not returned.
   */
  getDetail(stackName: string, signal?: AbortSignal): Promise<StackDetail | undefined>;
}

/**
 * Options for assuming an IAM role before scanning.
 */
export interface AssumeRoleOptions {
  roleArn: string;
  sessionName: string;
  durationSeconds: number;
  externalId?: string;
}

/**
 * Authentication settings for the CloudFormation client.
 */
export interface AuthConfig {
  region: string;
  profile?: string;
  assumeRole?: AssumeRoleOptions;
  /** SDK attempts per request, including the first */
  maxAttempts?: number;
}

/**
 * Validated configuration for one CLI run.
 */
export interface RunConfig {
  region: string;
  profile: string;
  output: OutputFormat;
  workers: number;
  maxAttempts: number;
  assumeRole?: AssumeRoleOptions;
}
