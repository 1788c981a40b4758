/**
 * Detection rules and the rule engine.
 *
 * A rule inspects one stack's resources (and optional detail) and reports
 * whether it looks like a Serverless Framework deployment. The engine runs
 * every registered rule and collects the reasons of those that matched.
 */

import type {
  DetectionVerdict,
  ResourceRecord,
  RuleResult,
  StackDetail,
} from "@/types";

/**
 * Interface that all detection rules must implement.
 *
 * Rules are shared by every worker in the pool, so `check` must be a pure
 * function of its inputs: no mutation, no state kept between calls, and no
 * throwing on missing optional fields.
 */
export interface DetectionRule {
  /**
   * Self-reported rule name. Not required to be unique.
   */
  readonly name: string;

  /**
   * Evaluate the rule against one stack.
   *
   * @param resources - Resources of the stack
   * @param detail - Stack detail, when it could be fetched
   */
  check(resources: readonly ResourceRecord[], detail: StackDetail | undefined): RuleResult;
}

export const SERVERLESS_DEPLOYMENT_BUCKET_ID = "ServerlessDeploymentBucket";
export const S3_BUCKET_RESOURCE_TYPE = "AWS::S3::Bucket";

const NO_MATCH: RuleResult = { matched: false, reason: "" };

/**
 * Check whether a stack contains the deployment bucket the Serverless
 * Framework generates. Logical ID and type must both match exactly.
 */
export function hasServerlessDeploymentBucket(resources: readonly ResourceRecord[]): boolean {
  return resources.some(
    (resource) =>
      resource.logicalId === SERVERLESS_DEPLOYMENT_BUCKET_ID &&
      resource.resourceType === S3_BUCKET_RESOURCE_TYPE
  );
}

/**
 * Matches stacks holding an S3 bucket with the logical ID
 * "ServerlessDeploymentBucket".
 */
export class ServerlessDeploymentBucketRule implements DetectionRule {
  readonly name = "ServerlessDeploymentBucket";

  check(resources: readonly ResourceRecord[]): RuleResult {
    if (hasServerlessDeploymentBucket(resources)) {
      return {
        matched: true,
        reason: `Contains resource with logical ID '${SERVERLESS_DEPLOYMENT_BUCKET_ID}'`,
      };
    }
    return NO_MATCH;
  }
}

/**
 * Default rule set used when no rules are supplied.
 */
export function defaultRules(): DetectionRule[] {
  return [new ServerlessDeploymentBucketRule()];
}

/**
 * Ordered, append-only collection of detection rules.
 *
 * Register rules before a scan starts; during a scan the engine is only read.
 */
export class RuleEngine {
  private readonly registered: DetectionRule[];

  constructor(rules: readonly DetectionRule[] = defaultRules()) {
    this.registered = [...rules];
  }

  /**
   * Registered rules in evaluation order.
   */
  get rules(): readonly DetectionRule[] {
    return this.registered;
  }

  /**
   * Append a rule. Duplicate names are allowed.
   */
  register(rule: DetectionRule): void {
    this.registered.push(rule);
  }

  /**
   * Run every rule in registration order and collect the reasons of all
   * rules that matched.
   *
   * @param resources - Resources of the stack
   * @param detail - Stack detail, when available
   * @returns Verdict that matches if at least one rule matched
   */
  evaluate(
    resources: readonly ResourceRecord[],
    detail?: StackDetail
  ): DetectionVerdict {
    const reasons: string[] = [];

    for (const rule of this.registered) {
      const result = rule.check(resources, detail);
      if (result.matched) {
        reasons.push(result.reason);
      }
    }

    return { isMatch: reasons.length > 0, reasons };
  }
}
