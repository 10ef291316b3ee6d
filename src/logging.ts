// src/logging.ts
// What: Application logger.
// How: Creates a pino logger. In development, uses the pino-pretty transport for readable logs; tests run silent
//      unless LOG_LEVEL says otherwise.

import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env.NODE_ENV ?? 'development';
const isDev = env === 'development';
const isTest = env === 'test';

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
};

function createLogger(): Logger {
  if (!isDev) return pino(baseOptions);
  // Pretty transport is optional at runtime; fall back to JSON lines if it cannot be loaded.
  try {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  } catch {
    return pino(baseOptions);
  }
}

const logger: Logger = createLogger();

export default logger;
