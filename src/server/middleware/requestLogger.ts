import { Request, Response, NextFunction } from 'express';

type HttpLogLevel = 'INFO' | 'WARN' | 'ERROR';

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'key', 'auth'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function levelForStatus(statusCode: number): HttpLogLevel {
  if (statusCode >= 500) return 'ERROR';
  if (statusCode >= 400) return 'WARN';
  return 'INFO';
}

/**
 * HTTP-side logger for the route API: one line per request and per response,
 * tagged with the request ID. Muted when NODE_ENV is "test".
 */
class RequestLogger {
  private readonly service: string;
  private readonly muted: boolean;

  constructor(service: string) {
    this.service = service;
    this.muted = process.env.NODE_ENV === 'test';
  }

  info(message: string, data?: unknown, requestId?: string): void {
    this.write('INFO', message, data, requestId);
  }

  warn(message: string, data?: unknown, requestId?: string): void {
    this.write('WARN', message, data, requestId);
  }

  error(message: string, data?: unknown, requestId?: string): void {
    this.write('ERROR', message, data, requestId);
  }

  logApiOperation(operation: string, data?: unknown, requestId?: string): void {
    this.info(`API Operation: ${operation}`, data, requestId);
  }

  /** Copy of a JSON body with credential-like fields masked */
  sanitizeBody(body: unknown): unknown {
    if (!isRecord(body)) {
      return body;
    }
    const sanitized: Record<string, unknown> = { ...body };
    for (const field of SENSITIVE_FIELDS) {
      if (sanitized[field]) {
        sanitized[field] = '[REDACTED]';
      }
    }
    return sanitized;
  }

  logRequest(req: Request, res: Response, next: NextFunction): void {
    const requestId = req.requestId || 'unknown';
    const startTime = Date.now();

    this.info('Incoming request', {
      method: req.method,
      path: req.path,
      query: req.query,
      body: this.sanitizeBody(req.body),
      userAgent: req.get('User-Agent'),
      ip: req.ip || req.socket.remoteAddress
    }, requestId);

    res.on('finish', () => {
      this.write(levelForStatus(res.statusCode), 'Request completed', {
        statusCode: res.statusCode,
        responseTime: Date.now() - startTime
      }, requestId);
    });

    next();
  }

  private write(level: HttpLogLevel, message: string, data?: unknown, requestId?: string): void {
    if (this.muted) return;

    const line = `[${new Date().toISOString()}] [${level}] [${this.service}]${requestId ? ` [${requestId}]` : ''} ${message}`;
    const payload = data !== undefined ? JSON.stringify(data) : '';

    if (level === 'ERROR') {
      console.error(line, payload);
    } else if (level === 'WARN') {
      console.warn(line, payload);
    } else {
      console.info(line, payload);
    }
  }
}

export const requestLogger = new RequestLogger('route-api');

export const requestLoggingMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  requestLogger.logRequest(req, res, next);
};
