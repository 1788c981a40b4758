/**
 * Classification of AWS API failures.
 *
 * Wraps SDK errors in an AwsApiError carrying a coarse error type, so callers
 * can tell permission problems from throttling or network failures.
 */

export type AwsErrorType =
  | "PERMISSION_DENIED"
  | "INVALID_REGION"
  | "RATE_LIMIT"
  | "NETWORK_ERROR"
  | "STACK_NOT_FOUND"
  | "UNKNOWN_ERROR";

/**
 * Error raised by the CloudFormation data source.
 */
export class AwsApiError extends Error {
  readonly type: AwsErrorType;

  constructor(type: AwsErrorType, message: string, options?: ErrorOptions) {
    const causeMessage = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`${message}${causeMessage}`, options);
    this.name = "AwsApiError";
    this.type = type;
  }
}

const PERMISSION_ERRORS = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "UnauthorizedOperation",
  "ExpiredToken",
  "ExpiredTokenException",
  "InvalidClientTokenId",
  "UnrecognizedClientException",
]);

const RATE_LIMIT_ERRORS = new Set([
  "Throttling",
  "ThrottlingException",
  "RequestLimitExceeded",
  "TooManyRequestsException",
]);

const NETWORK_ERRORS = new Set(["AbortError", "TimeoutError"]);

const NETWORK_MESSAGE_PATTERNS = ["ENOTFOUND", "ECONNREFUSED", "ECONNRESET", "no such host", "timeout"];

/**
 * Map an SDK failure to an AwsApiError.
 *
 * @param error - Error thrown by the SDK
 * @param region - Region the client targets, used in messages
 * @returns Classified error; an AwsApiError is returned unchanged
 */
export function classifyAwsError(error: unknown, region: string): AwsApiError {
  if (error instanceof AwsApiError) {
    return error;
  }

  const name = error instanceof Error ? error.name : "";
  const message = error instanceof Error ? error.message : String(error);

  if (PERMISSION_ERRORS.has(name)) {
    return new AwsApiError("PERMISSION_DENIED", "insufficient AWS permissions", { cause: error });
  }

  if (RATE_LIMIT_ERRORS.has(name)) {
    return new AwsApiError("RATE_LIMIT", "AWS API rate limit exceeded", { cause: error });
  }

  if (name === "ValidationError" && message.includes("does not exist")) {
    return new AwsApiError("STACK_NOT_FOUND", "stack not found", { cause: error });
  }

  if (name === "InvalidParameterValue" && message.toLowerCase().includes("region")) {
    return new AwsApiError("INVALID_REGION", `invalid AWS region: ${region}`, { cause: error });
  }

  if (NETWORK_ERRORS.has(name) || NETWORK_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return new AwsApiError("NETWORK_ERROR", "network connectivity issue", { cause: error });
  }

  return new AwsApiError("UNKNOWN_ERROR", "unexpected AWS API error", { cause: error });
}

