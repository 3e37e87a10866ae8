export class BooklogError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BooklogError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** The camera or a completion service could not be reached, timed out or refused the request. */
export class TransportError extends BooklogError {
  constructor(source: string, message: string, options?: ErrorOptions) {
    super(message, `TRANSPORT_${source.toUpperCase()}`, options);
    this.name = 'TransportError';
  }
}

export class CameraError extends TransportError {
  constructor(message: string, options?: ErrorOptions) {
    super('CAMERA', message, options);
    this.name = 'CameraError';
  }
}

export class LLMError extends TransportError {
  constructor(message: string, options?: ErrorOptions) {
    super('LLM', message, options);
    this.name = 'LLMError';
  }
}

/** Oracle output that is not a JSON object even after the repair pass. */
export class ParseError extends BooklogError {
  public readonly rawText: string;

  constructor(message: string, rawText: string, options?: ErrorOptions) {
    super(message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
    this.rawText = rawText;
  }
}

export class SchemaMismatchError extends BooklogError {
  public readonly missingColumns: string[];

  constructor(message: string, missingColumns: string[], options?: ErrorOptions) {
    super(message, 'SCHEMA_MISMATCH', options);
    this.name = 'SchemaMismatchError';
    this.missingColumns = missingColumns;
  }
}

export class PersistenceError extends BooklogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'PERSISTENCE_ERROR', options);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends BooklogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class OperatorInputError extends BooklogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'OPERATOR_INPUT', options);
    this.name = 'OperatorInputError';
  }
}

/** One-line, operator-facing rendering of any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
