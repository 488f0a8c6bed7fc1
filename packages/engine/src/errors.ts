/**
 * Typed failures of a single file's transform. The engine hands these back as
 * values; the CLI reports them per file and moves on.
 */

export type TransformErrorKind = "parse" | "serialization" | "configuration";

export class TransformError extends Error {
  readonly kind: TransformErrorKind;

  constructor(kind: TransformErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Source text is not valid Python. Positions are 1-based. */
export class ParseError extends TransformError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super("parse", `${message} at line ${line}, column ${column}`);
    this.line = line;
    this.column = column;
  }
}

/** The rendered tree could not be turned back into valid text. */
export class SerializationError extends TransformError {
  constructor(message: string) {
    super("serialization", message);
  }
}

/** Rejected options: unknown empty-block policy or malformed target name. */
export class ConfigurationError extends TransformError {
  constructor(message: string) {
    super("configuration", message);
  }
}
