// src/utils/logger.ts
import path from "path";
import winston from "winston";

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    return `${timestamp} ${level}: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ""}`;
  })
);

export const logger = winston.createLogger({
  level: "info",
  format: logFormat,
  defaultMeta: { service: "quiz-api" },
  silent: process.env.NODE_ENV === "test",
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

export type LogSettings = {
  level: string;
  /** Adds JSON file output (combined + errors) under this directory. */
  dir?: string;
};

/** Apply validated settings once the app config is loaded. */
export function configureLogger(settings: LogSettings): void {
  logger.level = settings.level;

  if (settings.dir) {
    // winston creates the directory
    logger.add(
      new winston.transports.File({
        filename: path.join(settings.dir, "combined.log"),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
    logger.add(
      new winston.transports.File({
        filename: path.join(settings.dir, "error.log"),
        level: "error",
        maxsize: 5242880,
        maxFiles: 5,
      })
    );
  }
}

export default logger;
