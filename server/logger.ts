/**
 * Structured logging built on Winston.
 *
 * One root logger for the service and child loggers per module. Output is
 * colorized and human readable in development, JSON lines in production.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, json } = winston.format;

const devFormat = combine(
  colorize(),
  timestamp({ format: "HH:mm:ss" }),
  printf(({ level, message, timestamp, module, ...meta }) => {
    const moduleTag = module ? `[${String(module)}]` : "[playground]";
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
  })
);

const prodFormat = combine(timestamp(), json());

const isProduction = process.env.NODE_ENV === "production";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: isProduction ? prodFormat : devFormat,
  defaultMeta: { module: "playground" },
  transports: [new winston.transports.Console()],
});

/**
 * Create a child logger tagged with a module name.
 *
 * @example
 * const log = createLogger("orchestrator");
 * log.info("Pipelines selected", { pipelines: ["structural"] });
 */
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

/**
 * Log a finished HTTP request. `meta` carries a small summary of the
 * response, never the whole body: extraction payloads run to megabytes.
 */
export function logRequest(
  method: string,
  path: string,
  status: number,
  duration: number,
  meta?: Record<string, unknown>
): void {
  const entry: Record<string, unknown> = {
    method,
    path,
    status,
    duration,
  };

  if (meta) {
    entry.response = meta;
  }

  logger.info(`${method} ${path} ${status} in ${duration}ms`, entry);
}

export default logger;
