export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const key = (value ?? "").trim().toLowerCase();
  if (key === "warning") {
    return "warn";
  }
  if (key === "debug" || key === "info" || key === "warn" || key === "error") {
    return key;
  }
  return "warn";
}

export function createLogger(
  level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
): Logger {
  const enabled = (candidate: LogLevel) =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    debug: (message) => {
      if (enabled("debug")) console.error(style.dim(`debug: ${message}`));
    },
    info: (message) => {
      if (enabled("info")) console.error(`info: ${message}`);
    },
    warn: (message) => {
      if (enabled("warn")) console.error(style.yellow(`warn: ${message}`));
    },
    error: (message) => {
      if (enabled("error")) console.error(style.red(message));
    },
  };
}

function useColor(): boolean {
  return Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
}

const color = (code: string, text: string) =>
  useColor() ? `${code}${text}\x1b[0m` : text;

export const style = {
  bold: (text: string) => color("\x1b[1m", text),
  dim: (text: string) => color("\x1b[2m", text),
  red: (text: string) => color("\x1b[31m", text),
  green: (text: string) => color("\x1b[32m", text),
  yellow: (text: string) => color("\x1b[33m", text),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
