/**
 * flowbind – Logging configuration
 *
 * License: Apache-2.0
 */

import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  colors: config.npm.colors,

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true,
  },

  services: {
    registry: {
      level: 'warn',
    },
    evaluator: {
      level: 'warn',
    },
    template: {
      level: 'warn',
    },
  },
} as const;
