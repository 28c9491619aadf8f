type LogContext = Record<string, unknown>;

type LogLevel = "debug" | "info" | "warn" | "error";

type LoggerFn = (message: string, context?: LogContext) => void;

const weights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in weights;
}

function shouldEmit(level: LogLevel): boolean {
  const envLevel = String(process.env.MINESWEEPER_LOG_LEVEL ?? "").toLowerCase().trim();
  if (envLevel === "silent" || envLevel === "none" || envLevel === "off") {
    return false;
  }
  const threshold = isLogLevel(envLevel) ? weights[envLevel] : weights.warn;
  return weights[level] >= threshold;
}

// stdout carries the CLI's board output, so logs go to stderr
const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (!shouldEmit(level)) return;
  const logger = level === "warn" ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(`[${level}] ${message}`, context);
    return;
  }
  logger(`[${level}] ${message}`);
};

export const logDebug: LoggerFn = (message, context) => emit("debug", message, context);
export const logInfo: LoggerFn = (message, context) => emit("info", message, context);
export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
