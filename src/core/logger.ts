import pino from 'pino';
import { config } from './config';

// Diagnostics go to stderr; stdout is reserved for the report.
export const logger = pino(
  {
    name: 'inventory-fill',
    level: config.LOG_LEVEL,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);
