import winston from 'winston';
import { config } from './config';

const consoleFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
});

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.server.env === 'test',
  format:
    config.server.env === 'production'
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
          consoleFormat
        ),
  transports: [new winston.transports.Console()],
});
