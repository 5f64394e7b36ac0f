export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number | string) {
    super(404, 'NOT_FOUND', `${resource} with id ${id} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}

/**
 * A text-generation provider failed: transport error, non-success status,
 * timeout or empty response. Aborts the pipeline before anything is written.
 */
export class GenerationError extends AppError {
  constructor(message: string, details?: unknown, code = 'GENERATION_ERROR') {
    super(500, code, message, details);
  }
}

/** The provider answered, but no usable JSON array of proposals could be extracted. */
export class GenerationParseError extends GenerationError {
  constructor(message: string, details?: unknown) {
    super(message, details, 'GENERATION_PARSE_ERROR');
  }
}

/** A store write failed. Writes already committed for the request stay in place. */
export class PersistenceError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'PERSISTENCE_ERROR', message, details);
  }
}

/**
 * Video enrichment could not attach media to a proposal. Never leaves the
 * enrichment service; the proposal keeps empty media fields.
 */
export class EnrichmentFailure extends Error {
  constructor(message: string, public readonly reason?: unknown) {
    super(message);
    this.name = 'EnrichmentFailure';
  }
}
