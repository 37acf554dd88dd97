export class NewscheckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'NewscheckError';
  }
}

export class InvalidInputError extends NewscheckError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class ExtractionError extends NewscheckError {
  constructor(message: string, cause?: Error) {
    super(message, 'EXTRACTION_ERROR', cause);
    this.name = 'ExtractionError';
  }
}

export class SynthesisError extends NewscheckError {
  constructor(message: string, cause?: Error) {
    super(message, 'SYNTHESIS_ERROR', cause);
    this.name = 'SynthesisError';
  }
}

export class VerificationCancelledError extends NewscheckError {
  constructor(message = 'Verification was cancelled') {
    super(message, 'VERIFICATION_CANCELLED');
    this.name = 'VerificationCancelledError';
  }
}

export class LlmError extends NewscheckError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class SearchError extends NewscheckError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'SEARCH_ERROR', cause);
    this.name = 'SearchError';
  }
}

export class RequestTimeoutError extends NewscheckError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, 'REQUEST_TIMEOUT');
    this.name = 'RequestTimeoutError';
  }
}

export class SchemaValidationError extends NewscheckError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends NewscheckError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
