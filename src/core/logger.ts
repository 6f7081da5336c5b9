import winston from 'winston';
import { config } from './config';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level}: ${message}${extra}`;
});

export const logger = winston.createLogger({
  level: config.logging.level,
  format: combine(timestamp(), errors({ stack: true }), json()),
  transports: [
    new winston.transports.Console({
      format: config.server.env === 'production'
        ? combine(timestamp(), json())
        : combine(colorize(), timestamp(), devFormat),
      silent: config.server.env === 'test',
    }),
  ],
});
