/**
 * Error taxonomy for the library tooling.
 *
 * Every error carries a `kind` discriminant so batch code can branch on it
 * without `instanceof` chains across module boundaries.
 */

export type KicadErrorKind = "SyntaxError" | "SchemaError" | "DanglingReferenceError" | "ConfigError";

export interface ErrorContext {
  file?: string;
  entity?: string;
  [key: string]: unknown;
}

export class KicadError extends Error {
  public readonly kind: KicadErrorKind;
  public readonly context: ErrorContext;

  constructor(kind: KicadErrorKind, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.kind = kind;
    this.context = context;
  }

  /** Merge extra context (typically the file it came from) into this error. */
  withContext(extra: ErrorContext): this {
    Object.assign(this.context, extra);
    return this;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      context: this.context,
    };
  }
}

/** Malformed S-expression text: unbalanced parentheses or an unterminated string. */
export class KicadSyntaxError extends KicadError {
  public readonly line: number;
  public readonly column: number;

  constructor(message: string, line: number, column: number, context: ErrorContext = {}) {
    super("SyntaxError", `${message} (line ${line}, column ${column})`, context);
    this.line = line;
    this.column = column;
  }
}

/** A known keyword-tagged list with the wrong arity or atom types. */
export class SchemaError extends KicadError {
  public readonly keyword: string;

  constructor(keyword: string, message: string, context: ErrorContext = {}) {
    super("SchemaError", message, context);
    this.keyword = keyword;
  }
}

/** A by-name reference (derived symbol parent, footprint link) with no target. */
export class DanglingReferenceError extends KicadError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string, message?: string, context: ErrorContext = {}) {
    super("DanglingReferenceError", message ?? `"${from}" references "${to}", which does not exist`, context);
    this.from = from;
    this.to = to;
  }
}

export class ConfigError extends KicadError {
  constructor(message: string, context: ErrorContext = {}) {
    super("ConfigError", message, context);
  }
}

export function isKicadError(err: unknown): err is KicadError {
  return err instanceof KicadError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
