/**
 * Errors raised by the detector.
 */

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Raised when a detection step fails in a way the scan cannot absorb.
 */
export class DetectionError extends Error {
  readonly operation: string;
  readonly stackName?: string;

  constructor(operation: string, cause: unknown, stackName?: string) {
    const subject = stackName === undefined ? "" : ` for stack "${stackName}"`;
    super(`detection error${subject} during ${operation}: ${describeCause(cause)}`, { cause });
    this.name = "DetectionError";
    this.operation = operation;
    this.stackName = stackName;
  }
}
