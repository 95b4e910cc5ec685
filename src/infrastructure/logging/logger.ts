export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const LEVEL_ORDER: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export type LogSink = (line: string) => void;

export function createLogger(
  config: { logLevel: LogLevel },
  name = "deepseek-retry",
  sink: LogSink = (line) => console.error(line),
): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    level !== "silent" &&
    LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(target);
  const write = (target: LogLevel, message: string) => {
    if (!enabled(target)) return;
    sink(
      `${new Date().toISOString()} - ${name} - ${target.toUpperCase()} - ${message}`,
    );
  };

  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
  };
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
