import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} [${level}] ${stack ?? message}${extra}`;
});

export const logger = winston.createLogger({
  level: process.env.PLOTFORGE_LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
  format: combine(errors({ stack: true }), timestamp(), logFormat),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "debug"],
      format: combine(colorize(), timestamp(), logFormat),
    }),
  ],
});

export type Logger = winston.Logger;

export function plotLogger(name: string): Logger {
  return logger.child({ plot: name });
}

export function setLogLevel(level: string): void {
  logger.level = level;
}
