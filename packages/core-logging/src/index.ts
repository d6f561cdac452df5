export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  service?: string;
  component?: string;
  client?: string;
  method?: string;
  url?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type Logger = {
  debug: (message: string, context?: LoggerContext) => void;
  info: (message: string, context?: LoggerContext) => void;
  warn: (message: string, context?: LoggerContext) => void;
  error: (message: string, context?: LoggerContext) => void;
  child: (context: LoggerContext) => Logger;
};

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  const fromEnv = process.env.LOADWIRE_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Errors do not survive JSON.stringify, so keep the fields worth grepping for.
 */
export function serializeError(error: unknown): Record<string, unknown> | string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return Object.fromEntries(
    Object.entries({ name: error.name, message: error.message, code }).filter(([, value]) => value !== undefined)
  );
}

function serializeEntry(level: LogLevel, message: string, context?: LoggerContext) {
  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...context,
    ...(context?.error !== undefined ? { error: serializeError(context.error) } : {})
  };

  return Object.fromEntries(
    Object.entries(entry).filter(([, value]) => value !== undefined && value !== null)
  );
}

export function createLogger(baseContext: LoggerContext = {}, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[resolveLevel(options)];

  const write = (level: LogLevel, message: string, context?: LoggerContext) => {
    if (options.silent || LEVEL_ORDER[level] < threshold) return;
    const payload = serializeEntry(level, message, { ...baseContext, ...context });
    // stdout only; the level travels in the payload
    console.log(JSON.stringify(payload));
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (context) => createLogger({ ...baseContext, ...context }, options)
  };
}
