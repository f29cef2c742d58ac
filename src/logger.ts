export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

let threshold: LogLevel = 'info';
const recent: string[] = [];
const RECENT_LIMIT = 500;

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

// last `limit` lines, oldest first; served by GET /api/logs
export function recentLogs(limit = 100): string[] {
  return recent.slice(-limit);
}

function emit(level: LogLevel, scope: string, message: string) {
  if (LEVELS[level] < LEVELS[threshold]) return;
  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} [${scope}] ${message}`;
  recent.push(line);
  if (recent.length > RECENT_LIMIT) recent.splice(0, recent.length - RECENT_LIMIT);

  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message) => emit('debug', scope, message),
    info: (message) => emit('info', scope, message),
    warn: (message) => emit('warn', scope, message),
    error: (message, err) => {
      const detail = err === undefined ? '' : `: ${err instanceof Error ? err.message : String(err)}`;
      emit('error', scope, `${message}${detail}`);
    },
  };
}
