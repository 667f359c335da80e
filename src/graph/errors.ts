import { ERROR_CODES, type ErrorCode } from "../types.js";

/** Violation reported when a graph breaks one of the model invariants. */
export interface GraphModelViolation {
  /** Stable error code identifying the violated invariant. */
  code: ErrorCode;
  /** Human readable explanation of the issue. */
  message: string;
  /** JSON pointer to the offending location (`/<vertex>/<adjacent>`). */
  path: string;
  /** Optional hint describing how to resolve the violation. */
  hint?: string;
}

/**
 * Raised synchronously when a request cannot be served with the supplied
 * arguments (edge count out of range, invalid capacity, empty graph, …).
 */
export class GraphInvalidArgumentError extends Error {
  /** Stable error code surfaced to callers. */
  public readonly code: ErrorCode;

  /** Optional hint describing how to recover from the error. */
  public readonly hint?: string;

  /** Structured context attached to the failure. */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, options: { hint?: string; details?: Record<string, unknown> } = {}) {
    super(message);
    this.name = "GraphInvalidArgumentError";
    this.code = ERROR_CODES.GRAPH_INVALID_ARGUMENT;
    this.hint = options.hint;
    this.details = options.details;
  }
}

/** Error thrown when a graph violates the model invariants. */
export class GraphModelError extends Error {
  public readonly code: ErrorCode;
  public readonly details: { violations: GraphModelViolation[] };

  constructor(readonly violations: GraphModelViolation[]) {
    super(violations.map((violation) => `${violation.code}: ${violation.message}`).join("; "));
    this.name = "GraphModelError";
    this.code = violations[0]?.code ?? ERROR_CODES.GRAPH_INVALID_INPUT;
    this.details = { violations };
  }
}
