// errors.ts

export type ErrorCode =
  | "DESCRIPTOR"
  | "NOT_FOUND"
  | "MULTIPLE_RESULTS"
  | "MIGRATION"
  | "CONFIG"
  | "UNBOUND";

export class OrmError extends Error {
  code: ErrorCode;
  details?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options: { details?: unknown; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
  }
}

/** A column or record type declaration that can never produce valid DDL. */
export class DescriptorError extends OrmError {
  constructor(message: string) {
    super("DESCRIPTOR", message);
  }
}

export class NotFound extends OrmError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class MultipleResults extends OrmError {
  constructor(message: string) {
    super("MULTIPLE_RESULTS", message);
  }
}

export class MigrationError extends OrmError {
  constructor(message: string, cause?: unknown) {
    super("MIGRATION", message, { cause });
  }
}

export class ConfigError extends OrmError {
  constructor(message: string, details?: unknown) {
    super("CONFIG", message, { details });
  }
}

export class UnboundModelError extends OrmError {
  constructor(model: string) {
    super("UNBOUND", `${model} is not bound to this connection.`);
  }
}

export function isOrmError(e: unknown): e is OrmError {
  return e instanceof OrmError;
}
