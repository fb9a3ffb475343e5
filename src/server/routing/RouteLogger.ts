/**
 * Console logger for route computation. Lines look like
 * `[ROUTE:INFO] [RouteBuilder] [req:1a2b3c4d] Route complete {"stops":7}`.
 * One process-wide threshold applies to every instance.
 */

export enum RouteLogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

type LogData = Record<string, unknown>;

const LEVEL_NAMES = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

let threshold: RouteLogLevel = RouteLogLevel.INFO;

export function setGlobalRouteLogLevel(level: RouteLogLevel): void {
  threshold = level;
}

/** Level for a name such as "debug"; unknown names give undefined */
export function parseRouteLogLevel(value: string | undefined): RouteLogLevel | undefined {
  if (!value) return undefined;
  const index = LEVEL_NAMES.findIndex((name) => name === value.trim().toUpperCase());
  return index >= 0 ? index : undefined;
}

function emit(level: RouteLogLevel, line: string): void {
  if (level === RouteLogLevel.ERROR) {
    console.error(line);
  } else if (level === RouteLogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export class RouteLogger {
  private readonly tag: string;

  constructor(
    private readonly context: string,
    private readonly requestId?: string,
  ) {
    this.tag = requestId ? `[${context}] [req:${requestId.slice(0, 8)}]` : `[${context}]`;
  }

  /** Copy that tags every line with a request */
  withRequest(requestId: string): RouteLogger {
    return new RouteLogger(this.context, requestId);
  }

  /** Copy under another context, keeping the request tag */
  forContext(context: string): RouteLogger {
    return new RouteLogger(context, this.requestId);
  }

  isEnabled(level: RouteLogLevel): boolean {
    return level >= threshold;
  }

  trace(message: string, data?: LogData): void {
    this.write(RouteLogLevel.TRACE, message, data);
  }

  debug(message: string, data?: LogData): void {
    this.write(RouteLogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.write(RouteLogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write(RouteLogLevel.WARN, message, data);
  }

  error(message: string, data?: LogData): void {
    this.write(RouteLogLevel.ERROR, message, data);
  }

  private write(level: RouteLogLevel, message: string, data?: LogData): void {
    if (!this.isEnabled(level)) return;
    const suffix = data ? ` ${JSON.stringify(data)}` : '';
    emit(level, `[ROUTE:${LEVEL_NAMES[level]}] ${this.tag} ${message}${suffix}`);
  }
}
