import * as winston from 'winston';
import { AppConfig } from '../config/config';

// stdout is reserved for prompts and receipts, so every level goes to stderr
export function createLogger(config: AppConfig): winston.Logger {
  return winston.createLogger({
    level: config.logLevel,
    silent: config.nodeEnv === 'test',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
        const contextStr = context ? `[${String(context)}] ` : '';
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${String(level)}: ${contextStr}${String(message)}${metaStr}`;
      }),
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: Object.keys(winston.config.npm.levels),
      }),
    ],
  });
}
