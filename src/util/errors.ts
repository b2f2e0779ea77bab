/**
 * Errors raised around the solvers: reading input files and parsing them.
 * The solvers themselves are total and never throw.
 */

export class PuzzleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PuzzleError";
    Object.setPrototypeOf(this, PuzzleError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Malformed input text
 */
export class ParseError extends PuzzleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "PARSE_ERROR", details);
    this.name = "ParseError";
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * Missing or unreadable input file
 */
export class InputError extends PuzzleError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Failed to read input file ${path}: ${reason}`, "IO_ERROR", {
      path,
    });
    this.name = "InputError";
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
