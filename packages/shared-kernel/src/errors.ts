export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Optimistic write lost against a newer version of the same record */
export class ConcurrentUpdateError extends AppError {
  constructor(resource: string, id: string | number) {
    super(409, 'CONCURRENT_UPDATE', `${resource} '${id}' was modified concurrently`);
    this.name = 'ConcurrentUpdateError';
  }
}

export class ValidationError extends AppError {
  constructor(details: unknown) {
    super(400, 'VALIDATION_ERROR', 'Validation failed', details);
  }
}

