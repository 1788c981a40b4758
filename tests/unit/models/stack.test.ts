/**
 * Unit tests for models/stack.ts
 */

import { describe, it, expect } from "vitest";
import { createDetectedStack, toStacksOutput } from "@models/stack";
import {
  MATCH_REASON,
  createCandidate,
  createDetail,
  createDetectedStackFixture,
} from "../../helpers/fixtures";

const NOW = new Date("2025-06-01T12:00:00Z");
const now = (): Date => NOW;

describe("createDetectedStack", () => {
  it("should take description, tags and timestamps from detail", () => {
    const stack = createDetectedStack({
      candidate: createCandidate("my-api-dev", { createdAt: new Date("2020-01-01T00:00:00Z") }),
      detail: createDetail(),
      reasons: [MATCH_REASON],
      region: "us-east-1",
      now,
    });

    expect(stack).toEqual({
      stackName: "my-api-dev",
      stackId: "arn:aws:cloudformation:us-east-1:123456789012:stack/my-api-dev/abc-123",
      region: "us-east-1",
      createdAt: new Date("2024-01-15T10:30:00Z"),
      updatedAt: new Date("2024-02-01T08:00:00Z"),
      description: "My stack",
      stackTags: { Owner: "team-a" },
      reasons: [MATCH_REASON],
    });
  });

  it("should fall back to the candidate when detail is missing", () => {
    const stack = createDetectedStack({
      candidate: createCandidate("my-api-dev", {
        createdAt: new Date("2024-03-01T00:00:00Z"),
        updatedAt: new Date("2024-03-02T00:00:00Z"),
      }),
      detail: undefined,
      reasons: [MATCH_REASON],
      region: "us-east-1",
      now,
    });

    expect(stack.description).toBe("");
    expect(stack.stackTags).toEqual({});
    expect(stack.createdAt).toEqual(new Date("2024-03-01T00:00:00Z"));
    expect(stack.updatedAt).toEqual(new Date("2024-03-02T00:00:00Z"));
  });

  it("should use the creation time when the stack was never updated", () => {
    const stack = createDetectedStack({
      candidate: createCandidate("fresh"),
      detail: createDetail({ updatedAt: undefined }),
      reasons: [MATCH_REASON],
      region: "us-east-1",
      now,
    });

    expect(stack.updatedAt).toEqual(new Date("2024-01-15T10:30:00Z"));
  });

  it("should use the current time when no creation time is known", () => {
    const stack = createDetectedStack({
      candidate: createCandidate("unknown", { createdAt: undefined }),
      detail: undefined,
      reasons: [MATCH_REASON],
      region: "us-east-1",
      now,
    });

    expect(stack.createdAt).toEqual(NOW);
    expect(stack.updatedAt).toEqual(NOW);
  });

  it("should treat an invalid date as missing", () => {
    const stack = createDetectedStack({
      candidate: createCandidate("bad-date"),
      detail: createDetail({ createdAt: new Date("not a date"), updatedAt: undefined }),
      reasons: [MATCH_REASON],
      region: "us-east-1",
      now,
    });

    expect(stack.createdAt).toEqual(NOW);
    expect(stack.updatedAt).toEqual(NOW);
  });

  it("should not read candidate timestamps when detail is present", () => {
    const stack = createDetectedStack({
      candidate: createCandidate("mixed", { createdAt: new Date("2020-01-01T00:00:00Z") }),
      detail: createDetail({ createdAt: undefined, updatedAt: undefined }),
      reasons: [MATCH_REASON],
      region: "us-east-1",
      now,
    });

    expect(stack.createdAt).toEqual(NOW);
  });

  it("should default a missing name and ID to empty strings", () => {
    const stack = createDetectedStack({
      candidate: {},
      detail: undefined,
      reasons: [MATCH_REASON],
      region: "us-east-1",
      now,
    });

    expect(stack.stackName).toBe("");
    expect(stack.stackId).toBe("");
  });

  it("should copy reasons and tags so later changes do not leak in", () => {
    const reasons = [MATCH_REASON];
    const tags: Record<string, string> = { Owner: "team-a" };
    const stack = createDetectedStack({
      candidate: createCandidate("copy"),
      detail: createDetail({ tags }),
      reasons,
      region: "us-east-1",
      now,
    });

    reasons.push("late reason");
    tags.Extra = "late";

    expect(stack.reasons).toEqual([MATCH_REASON]);
    expect(stack.stackTags).toEqual({ Owner: "team-a" });
    expect(Object.isFrozen(stack)).toBe(true);
  });
});

describe("toStacksOutput", () => {
  it("should wrap stacks in the envelope", () => {
    const stack = createDetectedStackFixture();

    expect(toStacksOutput([stack])).toEqual({ stacks: [stack] });
  });

  it("should produce an empty envelope for no stacks", () => {
    expect(toStacksOutput([])).toEqual({ stacks: [] });
  });
});
