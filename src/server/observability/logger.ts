export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function write(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }

  const line = JSON.stringify({
    level,
    message,
    ...context,
    timestamp: new Date().toISOString()
  });

  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (message: string, context: Record<string, unknown> = {}): void => write('debug', message, context),
  info: (message: string, context: Record<string, unknown> = {}): void => write('info', message, context),
  warn: (message: string, context: Record<string, unknown> = {}): void => write('warn', message, context),
  error: (message: string, context: Record<string, unknown> = {}): void => write('error', message, context)
};
