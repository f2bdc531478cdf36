export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

const logLevelRank: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
};

export type LogSink = {
  write: (chunk: string) => unknown;
};

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const shouldLog = (configuredLevel: LogLevel, messageLevel: MessageLevel): boolean => {
  if (configuredLevel === "silent") {
    return false;
  }

  return logLevelRank[messageLevel] <= logLevelRank[configuredLevel];
};

// every line of a multi-line message (block dumps) carries the prefix
const formatLines = (messageLevel: MessageLevel, message: string): string =>
  message
    .split("\n")
    .map((line) => `[churnlog] ${messageLevel.toUpperCase()} ${line}\n`)
    .join("");

export const createStderrLogger = (level: LogLevel, sink: LogSink = process.stderr): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const method =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (shouldLog(level, messageLevel)) {
        sink.write(formatLines(messageLevel, message));
      }
    };

  return {
    error: method("error"),
    warn: method("warn"),
    info: method("info"),
    debug: method("debug"),
  };
};

export const parseLogLevel = (value: string | undefined, fallback: LogLevel = "info"): LogLevel => {
  switch (value) {
    case "silent":
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return fallback;
  }
};
