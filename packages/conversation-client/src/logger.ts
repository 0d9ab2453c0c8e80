/**
 * Logger — scoped, level-filtered logging.
 *
 * Clients take an optional Logger and default to the silent one, so
 * library use stays quiet unless the caller wires a console logger in.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Derive a logger whose scope is `<parent>:<scope>` */
  child(scope: string): Logger;
}

/** Where console output goes; tests swap it for a collector */
export interface LogSink {
  (level: Exclude<LogLevel, "silent">, line: string): void;
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

export function createConsoleLogger(
  scope: string,
  level: LogLevel = "info",
  sink: LogSink = consoleSink,
): Logger {
  const threshold = LEVEL_ORDER[level];

  function emit(msgLevel: Exclude<LogLevel, "silent">, message: string): void {
    if (LEVEL_ORDER[msgLevel] < threshold) return;
    const time = new Date().toISOString().slice(11, 19);
    sink(msgLevel, `${time} ${msgLevel.toUpperCase().padEnd(5)} [${scope}] ${message}`);
  }

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (childScope) => createConsoleLogger(`${scope}:${childScope}`, level, sink),
  };
}

export function createSilentLogger(): Logger {
  const silent: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
    child: () => silent,
  };
  return silent;
}
