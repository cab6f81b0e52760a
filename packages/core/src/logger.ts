import pino from "pino";
import type { Logger } from "pino";

import { loadLoggingConfig, type FormatConfig } from "./config";

export type { Logger };

/**
 * Builds a JSON logger tagged with the service name.
 */
export const createLogger = (
  config: Pick<FormatConfig, "logLevel" | "serviceName">
): Logger =>
  pino({
    level: config.logLevel,
    base: {
      service: config.serviceName,
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

/**
 * Main logger instance
 */
export const logger = createLogger(loadLoggingConfig());

export const componentLogger = (component: string, parent: Logger = logger): Logger =>
  parent.child({ component });
