/**
 * Structured errors for the stub client.
 * A mismatch is never hidden: every failure reaches the test that caused it.
 */

import type { RequestDescriptor } from "./types.js";
import { formatDescriptor } from "./types.js";

export type StubErrorCode =
  | "CONFIGURATION_ERROR"
  | "NO_MATCH"
  | "UNSUPPORTED_ATTRIBUTE"
  | "MALFORMED_CONTENT";

export interface StubErrorDetails {
  code: StubErrorCode;
  message: string;
  /** Request the caller made, when the error comes from a lookup */
  request?: RequestDescriptor;
  /** Next request an ordered sequence was waiting for */
  expected?: RequestDescriptor;
  /** Both sides of a duplicate registration */
  conflicts?: [ConflictingStub, ConflictingStub];
  /** Name passed to StubHttpClient.method */
  attribute?: string;
  /** Underlying cause (e.g. SyntaxError, ZodError) */
  cause?: unknown;
}

export interface ConflictingStub {
  request: RequestDescriptor;
  response: string;
}

export class StubClientError extends Error {
  readonly details: StubErrorDetails;

  constructor(details: StubErrorDetails) {
    super(details.message);
    this.name = "StubClientError";
    this.details = details;
    Object.setPrototypeOf(this, StubClientError.prototype);
  }

  get code(): StubErrorCode {
    return this.details.code;
  }

  toJSON(): StubErrorDetails {
    return { ...this.details, cause: undefined };
  }
}

export function configurationError(
  message: string,
  conflicts?: [ConflictingStub, ConflictingStub],
  cause?: unknown
): StubClientError {
  return new StubClientError({
    code: "CONFIGURATION_ERROR",
    message,
    conflicts,
    cause,
  });
}

/** Two stubs registered for the same request in an association list */
export function duplicateStubError(
  first: ConflictingStub,
  second: ConflictingStub
): StubClientError {
  return configurationError(
    `Duplicate requests and responses: ${formatDescriptor(first.request)}:${first.response} and ` +
      `${formatDescriptor(second.request)}:${second.response}`,
    [first, second]
  );
}

export function noMatchError(request: RequestDescriptor): StubClientError {
  return new StubClientError({
    code: "NO_MATCH",
    message: `No response mapped to ${formatDescriptor(request)}`,
    request,
  });
}

/** Request arrived out of order, or after the sequence ran out */
export function unexpectedRequestError(
  request: RequestDescriptor,
  expected?: RequestDescriptor
): StubClientError {
  const next = expected
    ? `expected ${formatDescriptor(expected)}`
    : "sequence exhausted";
  return new StubClientError({
    code: "NO_MATCH",
    message: `Not expecting request ${formatDescriptor(request)}; ${next}`,
    request,
    expected,
  });
}

export function unsupportedAttributeError(attribute: string): StubClientError {
  return new StubClientError({
    code: "UNSUPPORTED_ATTRIBUTE",
    message: `StubHttpClient has no attribute '${attribute}'`,
    attribute,
  });
}

export function malformedContentError(message: string, cause?: unknown): StubClientError {
  return new StubClientError({
    code: "MALFORMED_CONTENT",
    message,
    cause,
  });
}
