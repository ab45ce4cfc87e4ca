/**
 * Logging
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

let globalLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/**
 * Create a logger whose lines are prefixed with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;
    const tag = level === 'info' ? '' : ` ${level.toUpperCase()}`;
    console.error(`[${scope}]${tag} ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}
