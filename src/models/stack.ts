/**
 * Result model construction.
 *
 * Builds the immutable DetectedStack reported for a matching stack and the
 * output envelope for a scan.
 */

import type {
  DetectedStack,
  StackCandidate,
  StackDetail,
  StacksOutput,
} from "@/types";

/**
 * Inputs for building a DetectedStack.
 */
export interface DetectedStackInput {
  candidate: StackCandidate;
  detail: StackDetail | undefined;
  reasons: readonly string[];
  region: string;
  /** Clock used for the creation-time fallback */
  now?: () => Date;
}

function isValidDate(value: Date | undefined): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Build a frozen DetectedStack from a candidate and its optional detail.
 *
 * Detail, when present, supplies description, tags and timestamps; otherwise
 * the candidate's timestamps are used with an empty description and no tags.
 * Timestamps are never left unset: a missing creation time becomes the
 * current time and a missing update time mirrors the creation time.
 *
 * @returns Frozen DetectedStack
 */
export function createDetectedStack(input: DetectedStackInput): DetectedStack {
  const { candidate, detail, reasons, region } = input;
  const now = input.now ?? (() => new Date());

  const source = detail ?? candidate;
  // Current time substitutes for an unknown creation time. Consumers cannot
  // distinguish it from a real timestamp.
  const createdAt = isValidDate(source.createdAt) ? source.createdAt : now();
  const updatedAt = isValidDate(source.updatedAt) ? source.updatedAt : createdAt;

  return Object.freeze({
    stackName: candidate.name ?? "",
    stackId: candidate.stackId ?? "",
    region,
    createdAt,
    updatedAt,
    description: detail?.description ?? "",
    stackTags: Object.freeze({ ...(detail?.tags ?? {}) }),
    reasons: Object.freeze([...reasons]),
  });
}

/**
 * Wrap detected stacks in the output envelope.
 */
export function toStacksOutput(stacks: readonly DetectedStack[]): StacksOutput {
  return { stacks };
}
