/**
 * CloudFormation-backed stack data source.
 *
 * Lists active stacks and fetches per-stack resources and detail through the
 * AWS SDK. Failures are rethrown as classified AwsApiErrors; deciding which
 * failures are fatal is left to the detector.
 */

import {
  CloudFormationClient,
  DescribeStacksCommand,
  ListStackResourcesCommand,
  ListStacksCommand,
  type Stack,
  type StackResourceSummary,
  type StackStatus,
  type StackSummary,
} from "@aws-sdk/client-cloudformation";
import type {
  ResourceRecord,
  StackCandidate,
  StackDataSource,
  StackDetail,
} from "@/types";
import { classifyAwsError } from "@aws/errors";
import { setupLogger } from "@utils/logger";

const logger = setupLogger("find-serverless-stacks:cloudformation");

/**
 * Stack states considered deployed and stable.
 */
export const ACTIVE_STACK_STATUSES: readonly StackStatus[] = [
  "CREATE_COMPLETE",
  "UPDATE_COMPLETE",
  "UPDATE_ROLLBACK_COMPLETE",
];

export class CloudFormationStackSource implements StackDataSource {
  private readonly client: CloudFormationClient;
  private readonly region: string;

  /**
   * @param client - CloudFormation client; safe to share across workers
   * @param region - Region the client targets, used in error messages
   */
  constructor(client: CloudFormationClient, region: string) {
    this.client = client;
    this.region = region;
  }

  /**
   * Lists every stack in an active state.
   * Handles pagination from the ListStacks API.
   */
  async listCandidates(signal?: AbortSignal): Promise<StackCandidate[]> {
    const candidates: StackCandidate[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const command = new ListStacksCommand({
          StackStatusFilter: [...ACTIVE_STACK_STATUSES],
          NextToken: nextToken,
        });

        const response = await this.client.send(command, { abortSignal: signal });

        for (const summary of response.StackSummaries ?? []) {
          candidates.push(CloudFormationStackSource.toCandidate(summary));
        }

        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw classifyAwsError(error, this.region);
    }

    logger.debug({ region: this.region, count: candidates.length }, "Listed active stacks");
    return candidates;
  }

  /**
   * Fetches all resources of a stack.
   *
   * Uses ListStackResources rather than DescribeStackResources, which stops
   * at 100 resources.
   */
  async getResources(stackName: string, signal?: AbortSignal): Promise<ResourceRecord[]> {
    const resources: ResourceRecord[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const command = new ListStackResourcesCommand({
          StackName: stackName,
          NextToken: nextToken,
        });

        const response = await this.client.send(command, { abortSignal: signal });

        for (const summary of response.StackResourceSummaries ?? []) {
          resources.push(CloudFormationStackSource.toResource(summary));
        }

        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw classifyAwsError(error, this.region);
    }

    return resources;
  }

  /**
   * Fetches description, timestamps and tags of a stack.
   *
   * @returns Stack detail, or undefined when DescribeStacks returns no stack
   */
  async getDetail(stackName: string, signal?: AbortSignal): Promise<StackDetail | undefined> {
    try {
      const command = new DescribeStacksCommand({ StackName: stackName });
      const response = await this.client.send(command, { abortSignal: signal });

      const stack = response.Stacks?.[0];
      return stack ? CloudFormationStackSource.toDetail(stack) : undefined;
    } catch (error) {
      throw classifyAwsError(error, this.region);
    }
  }

  private static toCandidate(summary: StackSummary): StackCandidate {
    return {
      name: summary.StackName,
      stackId: summary.StackId,
      status: summary.StackStatus,
      createdAt: summary.CreationTime,
      updatedAt: summary.LastUpdatedTime,
    };
  }

  private static toResource(summary: StackResourceSummary): ResourceRecord {
    return {
      logicalId: summary.LogicalResourceId,
      resourceType: summary.ResourceType,
      physicalId: summary.PhysicalResourceId,
      status: summary.ResourceStatus,
    };
  }

  private static toDetail(stack: Stack): StackDetail {
    // Entries missing a key or value are dropped; empty values are kept
    const tags: Record<string, string> = {};
    for (const tag of stack.Tags ?? []) {
      if (tag.Key !== undefined && tag.Value !== undefined) {
        tags[tag.Key] = tag.Value;
      }
    }

    return {
      description: stack.Description,
      createdAt: stack.CreationTime,
      updatedAt: stack.LastUpdatedTime,
      tags,
    };
  }
}
