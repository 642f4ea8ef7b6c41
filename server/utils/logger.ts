import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import path from "path";

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const colors = {
  error: "red",
  warn: "yellow",
  info: "green",
  http: "magenta",
  debug: "blue",
};

winston.addColors(colors);

const env = process.env.NODE_ENV || "development";
const isTest = env === "test";

const level = () => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return env === "development" ? "debug" : "info";
};

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}] ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const logsDir = path.join(process.cwd(), "logs");

const consoleTransport = new winston.transports.Console({
  silent: isTest,
  format: combine(
    colorize({ all: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    errors({ stack: true }),
    consoleFormat
  ),
});

const fileTransports = () => [
  new winston.transports.File({
    filename: path.join(logsDir, "combined.log"),
    format: combine(timestamp(), errors({ stack: true }), json()),
    maxsize: 5242880, // 5MB
    maxFiles: 5,
  }),
  new winston.transports.File({
    filename: path.join(logsDir, "error.log"),
    level: "error",
    format: combine(timestamp(), errors({ stack: true }), json()),
  }),
];

const logger = winston.createLogger({
  level: level(),
  levels,
  defaultMeta: { service: "chat-helpdesk-bridge" },
  transports: isTest ? [consoleTransport] : [consoleTransport, ...fileTransports()],
});

// Daily rotation in production
if (env === "production") {
  logger.add(
    new DailyRotateFile({
      filename: path.join(logsDir, "application-%DATE%.log"),
      datePattern: "YYYY-MM-DD",
      zippedArchive: true,
      maxSize: "20m",
      maxFiles: "14d",
      format: combine(timestamp(), errors({ stack: true }), json()),
    })
  );
}

export type LogMetadata = Record<string, unknown>;

export const logError = (message: string, error?: unknown, metadata?: LogMetadata) => {
  logger.error(message, {
    error: error instanceof Error ? error.message : error,
    stack: error instanceof Error ? error.stack : undefined,
    ...metadata,
  });
};

export const logInfo = (message: string, metadata?: LogMetadata) => {
  logger.info(message, metadata);
};

export const logWarn = (message: string, metadata?: LogMetadata) => {
  logger.warn(message, metadata);
};

export const logDebug = (message: string, metadata?: LogMetadata) => {
  logger.debug(message, metadata);
};

export const logHttp = (message: string, metadata?: LogMetadata) => {
  logger.http(message, metadata);
};

export default logger;
