// Error types raised by AeroTrace parsers, models and configuration

export class HeaderParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HeaderParseError';
  }
}

export class ChecksumError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChecksumError';
  }
}

export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

export class UnsupportedFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFormatError';
  }
}

export class ModelValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelValidationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type AeroTraceError =
  | HeaderParseError
  | ChecksumError
  | FormatError
  | UnsupportedFormatError
  | ModelValidationError
  | ConfigError;

export function isAeroTraceError(e: unknown): e is AeroTraceError {
  return e instanceof HeaderParseError ||
    e instanceof ChecksumError ||
    e instanceof FormatError ||
    e instanceof UnsupportedFormatError ||
    e instanceof ModelValidationError ||
    e instanceof ConfigError;
}
