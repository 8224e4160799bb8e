export type StampverErrorCode =
  | "PARSE"
  | "FORMAT"
  | "CONVERSION"
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "CONFIG";

export class StampverError extends Error {
  readonly code: StampverErrorCode;

  constructor(code: StampverErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// version or build declaration missing from the constants file
export class ParseError extends StampverError {
  constructor(message: string) {
    super("PARSE", message);
  }
}

// version does not have exactly three components
export class FormatError extends StampverError {
  constructor(message: string) {
    super("FORMAT", message);
  }
}

// a version or build component is not a decimal integer
export class ConversionError extends StampverError {
  constructor(message: string) {
    super("CONVERSION", message);
  }
}

export class InvalidArgumentError extends StampverError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class NotFoundError extends StampverError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class ConfigError extends StampverError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
