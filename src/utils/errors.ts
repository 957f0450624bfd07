import type { Response } from 'express';

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: string[],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(errors: string[]) {
    super(400, `Validation failed: ${errors.join(', ')}`, errors);
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Writes the JSON error body for a caught error. Unknown errors are 500s and
 * their message is withheld in production.
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json(
      error.details ? { error: error.message, details: error.details } : { error: error.message },
    );
    return;
  }

  res.status(500).json({
    error: process.env.NODE_ENV === 'production' ? 'Internal server error' : getErrorMessage(error),
  });
}
