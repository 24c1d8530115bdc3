export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger with ISO timestamps. Warnings and errors go to stderr.
 * @param level - Minimum level printed
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const min = LOG_LEVELS[level];
  const line = (lvl: LogLevel, message: string) =>
    `${new Date().toISOString()} [${lvl.toUpperCase()}] ${message}`;

  return {
    debug: (message) => {
      if (min <= LOG_LEVELS.debug) console.log(line("debug", message));
    },
    info: (message) => {
      if (min <= LOG_LEVELS.info) console.log(line("info", message));
    },
    warn: (message) => {
      if (min <= LOG_LEVELS.warn) console.warn(line("warn", message));
    },
    error: (message) => {
      if (min <= LOG_LEVELS.error) console.error(line("error", message));
    },
  };
}

const noop = () => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
