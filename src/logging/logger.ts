/**
 * flowbind – Service loggers
 *
 * Level resolution, first match wins:
 *
 *   LOG_LEVEL                  explicit override
 *   NODE_ENV=test              TEST_LOG_LEVEL, else "error" (and silent
 *                              unless TEST_LOG_LEVEL is set)
 *   FLOWBIND_DEBUG=true        "debug"
 *   otherwise                  the service's configured level
 *
 * License: Apache-2.0
 */

import winston from 'winston';
import { loggingConfig } from '../config/logging';

export type ServiceName = keyof typeof loggingConfig.services;

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}] [${String(service)}] ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  }),
);

export function resolveLogLevel(serviceName: ServiceName): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.FLOWBIND_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

/**
 * Console logger tagged with `{ service: serviceName }`.
 */
export function createServiceLogger(serviceName: ServiceName): winston.Logger {
  const level = resolveLogLevel(serviceName);

  return winston.createLogger({
    levels: loggingConfig.levels,
    level,
    defaultMeta: { service: serviceName },
    silent: process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL,
    transports: [new winston.transports.Console({ format: consoleFormat, level })],
  });
}
