import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { logger } from './logger';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_ERROR'
  | 'EMBEDDING_ERROR'
  | 'STORE_UNAVAILABLE'
  | 'LLM_ERROR'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  public statusCode: number;
  public code: ErrorCode;
  public isOperational: boolean;
  public details?: unknown;

  constructor(message: string, statusCode: number, code: ErrorCode = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }

  static fromZod(error: ZodError, message = 'Invalid request body'): ValidationError {
    return new ValidationError(message, error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    })));
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(message: string) {
    super(message, 415, 'UNSUPPORTED_FORMAT');
  }
}

export class ExtractionError extends AppError {
  constructor(message: string) {
    super(message, 422, 'EXTRACTION_ERROR');
  }
}

export class EmbeddingError extends AppError {
  constructor(message = 'Embedding service unavailable, try again later') {
    super(message, 502, 'EMBEDDING_ERROR');
  }
}

export class LlmError extends AppError {
  constructor(message = 'Language model service unavailable, try again later') {
    super(message, 502, 'LLM_ERROR');
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message = 'Job store is temporarily unavailable, please retry shortly') {
    super(message, 503, 'STORE_UNAVAILABLE');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isJsonSyntaxError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

// body-parser tags oversized bodies with this type.
function isBodyTooLarge(err: Error): boolean {
  return 'type' in err && err.type === 'entity.too.large';
}

export const handleError = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof AppError) {
    const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Application error', { message: err.message, statusCode: err.statusCode, code: err.code, path: req.path });
    return res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(err.details !== undefined ? { details: err.details } : {})
    });
  }

  if (err instanceof ZodError) {
    const validation = ValidationError.fromZod(err);
    return res.status(400).json({ error: validation.message, code: validation.code, details: validation.details });
  }

  if (err instanceof MulterError) {
    logger.warn('Upload rejected', { code: err.code, field: err.field, path: req.path });
    if (err.code === 'LIMIT_FILE_SIZE') {
      return res.status(413).json({ error: 'Uploaded file is too large', code: 'PAYLOAD_TOO_LARGE' });
    }
    return res.status(400).json({ error: `Invalid upload: ${err.message}`, code: 'VALIDATION_ERROR' });
  }

  if (isBodyTooLarge(err)) {
    logger.warn('Request body rejected', { path: req.path });
    return res.status(413).json({ error: 'Request body is too large', code: 'PAYLOAD_TOO_LARGE' });
  }

  if (isJsonSyntaxError(err)) {
    return res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
  }

  // Log unexpected errors
  logger.error('Unexpected error', err);

  res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL_ERROR'
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Route not found',
    code: 'NOT_FOUND'
  });
};
