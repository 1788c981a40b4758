/**
 * Concurrent detector for Serverless Framework stacks.
 *
 * Lists candidate stacks once, then processes them with a fixed-size pool of
 * workers. A failure on one stack never aborts the scan; only a failed
 * listing call is reported to the caller.
 */

import type {
  DetectedStack,
  ResourceRecord,
  StackCandidate,
  StackDataSource,
  StackDetail,
} from "@/types";
import { createDetectedStack } from "@models/stack";
import { DetectionError } from "@detector/errors";
import { RuleEngine } from "@detector/rules";
import { setupLogger } from "@utils/logger";

const logger = setupLogger("find-serverless-stacks:detector");

export const DEFAULT_MAX_WORKERS = 10;

export interface DetectorOptions {
  /** Upper bound on concurrently processed stacks (default: 10) */
  maxWorkers?: number;
  /** Rule engine shared by all workers (default: built-in rules) */
  ruleEngine?: RuleEngine;
  /** Clock for timestamp fallbacks */
  now?: () => Date;
}

/**
 * Candidates waiting to be processed.
 *
 * Workers pull from the same queue; each candidate is handed out once.
 */
class CandidateQueue {
  private next = 0;

  constructor(private readonly candidates: readonly StackCandidate[]) {}

  take(): StackCandidate | undefined {
    if (this.next >= this.candidates.length) {
      return undefined;
    }
    return this.candidates[this.next++];
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Detector {
  private readonly source: StackDataSource;
  private readonly region: string;
  private readonly ruleEngine: RuleEngine;
  private readonly maxWorkers: number;
  private readonly now: () => Date;

  constructor(source: StackDataSource, region: string, options: DetectorOptions = {}) {
    const maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }

    this.source = source;
    this.region = region;
    this.ruleEngine = options.ruleEngine ?? new RuleEngine();
    this.maxWorkers = maxWorkers;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Identify every stack deployed by the Serverless Framework.
   *
   * Results are not ordered. Once `signal` aborts, workers stop taking new
   * stacks and in-flight stacks whose calls fail are skipped, so an aborted
   * scan resolves with a partial result rather than rejecting. Callers that
   * need to know whether the scan completed must check the signal.
   *
   * @param signal - Optional abort signal forwarded to every data source call
   * @returns Detected stacks
   * @throws {DetectionError} If the candidate listing fails
   */
  async detect(signal?: AbortSignal): Promise<DetectedStack[]> {
    let candidates: StackCandidate[];
    try {
      candidates = await this.source.listCandidates(signal);
    } catch (error) {
      throw new DetectionError("ListStacks", error);
    }

    const workerCount = Math.min(this.maxWorkers, candidates.length);
    logger.info(
      { region: this.region, candidates: candidates.length, workers: workerCount },
      "Starting stack detection"
    );

    if (workerCount === 0) {
      return [];
    }

    const queue = new CandidateQueue(candidates);
    const workers = Array.from({ length: workerCount }, () => this.runWorker(queue, signal));

    const workerResults = await Promise.all(workers);
    const detected = workerResults.flat();

    logger.info(
      { region: this.region, candidates: candidates.length, detected: detected.length },
      "Stack detection completed"
    );
    return detected;
  }

  /**
   * Process candidates until the queue is drained or the scan is aborted.
   *
   * @returns Stacks matched by this worker
   */
  private async runWorker(queue: CandidateQueue, signal?: AbortSignal): Promise<DetectedStack[]> {
    const matched: DetectedStack[] = [];

    for (let candidate = queue.take(); candidate; candidate = queue.take()) {
      if (signal?.aborted) {
        logger.debug("Scan aborted, worker stopping");
        break;
      }

      const stack = await this.processStack(candidate, signal);
      if (stack) {
        matched.push(stack);
      }
    }

    return matched;
  }

  /**
   * Fetch, evaluate and convert one stack.
   *
   * @returns DetectedStack, or undefined when the stack is skipped or does
   *   not match
   */
  private async processStack(
    candidate: StackCandidate,
    signal?: AbortSignal
  ): Promise<DetectedStack | undefined> {
    const stackName = candidate.name;
    if (!stackName) {
      logger.debug({ stackId: candidate.stackId }, "Skipping stack without a name");
      return undefined;
    }

    let resources: ResourceRecord[];
    try {
      resources = await this.source.getResources(stackName, signal);
    } catch (error) {
      logger.debug({ stackName, error: errorMessage(error) }, "Skipping stack, resources unavailable");
      return undefined;
    }

    let detail: StackDetail | undefined;
    try {
      detail = await this.source.getDetail(stackName, signal);
    } catch (error) {
      logger.debug({ stackName, error: errorMessage(error) }, "Stack detail unavailable, continuing without it");
      detail = undefined;
    }

    const verdict = this.ruleEngine.evaluate(resources, detail);
    if (!verdict.isMatch) {
      return undefined;
    }

    logger.debug({ stackName, reasons: verdict.reasons }, "Stack matched");
    return createDetectedStack({
      candidate,
      detail,
      reasons: verdict.reasons,
      region: this.region,
      now: this.now,
    });
  }
}
