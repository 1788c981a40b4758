/**
 * Test fixtures and mock data factories.
 *
 * Provides reusable stack data for unit tests.
 */

import type {
  DetectedStack,
  ResourceRecord,
  StackCandidate,
  StackDetail,
} from "@/types";

export const MATCH_REASON = "Contains resource with logical ID 'ServerlessDeploymentBucket'";

/**
 * Creates a mock StackCandidate.
 *
 * @param name - Stack name
 * @param overrides - Optional overrides for specific properties
 * @returns Mock StackCandidate
 */
export function createCandidate(
  name: string,
  overrides: Partial<StackCandidate> = {}
): StackCandidate {
  return {
    name,
    stackId: `arn:aws:cloudformation:us-east-1:123456789012:stack/${name}/abc-123`,
    status: "CREATE_COMPLETE",
    createdAt: new Date("2024-01-15T10:30:00Z"),
    ...overrides,
  };
}

/**
 * Creates a mock ResourceRecord.
 */
export function createResource(
  logicalId: string,
  resourceType: string,
  overrides: Partial<ResourceRecord> = {}
): ResourceRecord {
  return {
    logicalId,
    resourceType,
    physicalId: `${logicalId.toLowerCase()}-physical`,
    status: "CREATE_COMPLETE",
    ...overrides,
  };
}

/**
 * Resources of a typical Serverless Framework stack.
 */
export function serverlessResources(): ResourceRecord[] {
  return [
    createResource("ServerlessDeploymentBucket", "AWS::S3::Bucket"),
    createResource("MyFunction", "AWS::Lambda::Function"),
  ];
}

/**
 * Resources of a stack deployed by some other tool.
 */
export function plainResources(): ResourceRecord[] {
  return [
    createResource("MyBucket", "AWS::S3::Bucket"),
    createResource("MyTable", "AWS::DynamoDB::Table"),
  ];
}

/**
 * Creates a mock StackDetail.
 */
export function createDetail(overrides: Partial<StackDetail> = {}): StackDetail {
  return {
    description: "My stack",
    createdAt: new Date("2024-01-15T10:30:00Z"),
    updatedAt: new Date("2024-02-01T08:00:00Z"),
    tags: { Owner: "team-a" },
    ...overrides,
  };
}

/**
 * Creates a mock DetectedStack.
 */
export function createDetectedStackFixture(
  overrides: Partial<DetectedStack> = {}
): DetectedStack {
  return {
    stackName: "my-api-dev",
    stackId: "arn:aws:cloudformation:us-east-1:123456789012:stack/my-api-dev/abc-123",
    region: "us-east-1",
    createdAt: new Date("2024-01-15T10:30:00Z"),
    updatedAt: new Date("2024-02-01T08:00:00Z"),
    description: "My stack",
    stackTags: { Owner: "team-a" },
    reasons: [MATCH_REASON],
    ...overrides,
  };
}
