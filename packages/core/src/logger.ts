export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

export type LogTransport = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalTransports: LogTransport[] = [];
let globalMinLevel: LogLevel = 'info';

/** Every entry that passes the level filter reaches each transport. Returns a remover. */
export function addLogTransport(transport: LogTransport): () => void {
  globalTransports.push(transport);
  return () => {
    globalTransports = globalTransports.filter((t) => t !== transport);
  };
}

/** Entries below `level` are dropped before any transport sees them. */
export function setLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function formatData(data: unknown): string {
  if (data instanceof Error) return data.message;
  return JSON.stringify(data);
}

/** Registered at load. debug and info go to stdout; warn and error to stderr with a level tag. */
export function consoleTransport(entry: LogEntry): void {
  const prefix = `[${entry.scope}]`;
  const msg = entry.data !== undefined
    ? `${prefix} ${entry.message} ${formatData(entry.data)}`
    : `${prefix} ${entry.message}`;

  switch (entry.level) {
    case 'debug':
    case 'info':
      process.stdout.write(`${msg}\n`);
      break;
    case 'warn':
      process.stderr.write(`WARN ${msg}\n`);
      break;
    case 'error':
      process.stderr.write(`ERROR ${msg}\n`);
      break;
  }
}

function emit(entry: LogEntry): void {
  if (LOG_LEVELS[entry.level] < LOG_LEVELS[globalMinLevel]) return;
  for (const transport of globalTransports) {
    try {
      transport(entry);
    } catch (err) {
      // A broken transport must not break the caller
      process.stderr.write(`ERROR [Logger] transport failed: ${String(err)}\n`);
    }
  }
}

/**
 * Create a scoped logger. Each module creates one:
 *   const log = createLogger('AssignmentService');
 *   log.info('Task assigned', { taskId, userId });
 */
export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: unknown): void {
    emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

// Register console transport by default
addLogTransport(consoleTransport);
