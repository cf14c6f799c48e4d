import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino(
  config.logPretty
    ? { level: config.logLevel, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : { level: config.logLevel }
);
