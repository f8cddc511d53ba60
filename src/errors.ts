/**
 * Error taxonomy for workspace setup.
 *
 * Filesystem failures are not wrapped: Node's own errors propagate to the
 * caller unchanged. Unreachable downloads are not errors at all; they are
 * logged and skipped.
 */

/** A required input is missing or invalid. Fatal, exit code 1. */
export class SetupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SetupError";
  }
}

/** A target file carries unbalanced or duplicated generated-section markers. */
export class MarkerError extends Error {
  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(message);
    this.name = "MarkerError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** True for a Node filesystem error with the given errno code. */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
