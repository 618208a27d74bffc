import { pino } from 'pino';
import type { Logger } from 'pino';
import { config } from '../config.js';

export type { Logger };

export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: 'h264-fanout-relay' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
