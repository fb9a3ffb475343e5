import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import { describeIssues } from '../validation/optimizeRequest';
import { requestLogger } from './requestLogger';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

// Error response interface
export interface ErrorResponse {
  error: string;
  message: string;
  details?: string | string[];
  timestamp: string;
  path: string;
  method: string;
  requestId?: string;
}

/**
 * Error with a known HTTP status. `fields` are merged into the response body
 * next to the standard error fields.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 400,
    public details?: string | string[],
    public fields: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

// express.json() reports malformed bodies as a SyntaxError tagged with a type
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

// Add request ID to requests
export function addRequestId(req: Request, res: Response, next: NextFunction): void {
  req.requestId = uuidv4();
  res.setHeader('X-Request-ID', req.requestId);
  next();
}

export function buildErrorResponse(
  req: Request,
  error: string,
  message: string,
  details?: string | string[]
): ErrorResponse {
  return {
    error,
    message,
    details,
    timestamp: new Date().toISOString(),
    path: req.path,
    method: req.method,
    requestId: req.requestId || 'unknown'
  };
}

// Main error handling middleware
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = req.requestId || 'unknown';

  if (error instanceof ApiError && error.statusCode < 500) {
    requestLogger.warn(`${error.code} in ${req.method} ${req.path}`, { message: error.message }, requestId);
  } else {
    requestLogger.error(`Error in ${req.method} ${req.path}`, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      body: requestLogger.sanitizeBody(req.body),
      query: req.query,
      params: req.params
    }, requestId);
  }

  let statusCode: number;
  let errorCode: string;
  let message: string;
  let details: string | string[] | undefined;
  let fields: Record<string, unknown> = {};

  if (error instanceof ApiError) {
    statusCode = error.statusCode;
    errorCode = error.code;
    message = error.message;
    details = error.details;
    fields = error.fields;
  } else if (error instanceof ZodError) {
    statusCode = 400;
    errorCode = 'VALIDATION_ERROR';
    message = 'Invalid request data';
    details = describeIssues(error);
  } else if (isBodyParseError(error)) {
    statusCode = 400;
    errorCode = 'INVALID_JSON';
    message = 'Invalid JSON in request body';
    details = 'Request body must be valid JSON';
  } else if (error instanceof Error) {
    statusCode = 500;
    errorCode = 'INTERNAL_SERVER_ERROR';
    message = 'An unexpected error occurred';
    details = process.env.NODE_ENV === 'development' ? error.message : undefined;
  } else {
    statusCode = 500;
    errorCode = 'UNKNOWN_ERROR';
    message = 'An unexpected error occurred';
    details = 'Unknown error type';
  }

  res.status(statusCode).json({ ...buildErrorResponse(req, errorCode, message, details), ...fields });
}

// 404 handler for unmatched routes
export function notFoundHandler(req: Request, res: Response, _next: NextFunction): void {
  requestLogger.warn(`404 - Route not found: ${req.method} ${req.path}`, {
    method: req.method,
    path: req.path,
    query: req.query
  }, req.requestId);

  res
    .status(404)
    .json(buildErrorResponse(req, 'NOT_FOUND', 'Route not found', `No route found for ${req.method} ${req.path}`));
}
