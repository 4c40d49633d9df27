/**
 * Scoped console logger
 *
 * Every line is prefixed with `[bdh:<scope>]` so server, monitor and MCP
 * output can be told apart in a shared log stream. Level comes from
 * BDH_LOG_LEVEL and defaults to info.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let threshold: LogLevel = isLogLevel(process.env.BDH_LOG_LEVEL) ? process.env.BDH_LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function createLogger(scope: string): Logger {
  const prefix = `[bdh:${scope}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

  // stdout is reserved for the MCP stdio transport, so everything goes to stderr
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.error(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.error(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
