import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  level: config.LOG_LEVEL ?? (config.isTest ? 'silent' : config.isDevelopment ? 'debug' : 'info'),
  transport: config.isDevelopment
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
  redact: ['password', 'config.mysql.password'],
});
