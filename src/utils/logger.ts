/**
 * Structured logger using Winston.
 * Tags every line with the engine component that wrote it.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const tag = typeof component === "string" ? `[${component}]` : "[engine]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level} ${tag} ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  // Quiet under the test runner unless a level is asked for explicitly
  silent: process.env.NODE_ENV === "test" && process.env.LOG_LEVEL === undefined,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** Create a child logger tagged with a component name */
export function agentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
