import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

export interface LoggerOptions {
  level?: string;
  /** Also append warn-and-above records to this file (the installation's error log). */
  errorLogPath?: string;
}

const redact = {
  paths: [
    'headers.authorization',
    'headers.Authorization',
    'accessToken',
    'refreshToken',
    'access_token',
    'refresh_token',
    'client_secret',
    'clientSecret',
    'token'
  ],
  censor: '[REDACTED]'
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || process.env.LOG_LEVEL || (isDev ? 'debug' : 'info');

  const targets: TransportTargetOptions[] = [
    isDev
      ? {
          target: 'pino-pretty',
          level,
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
          }
        }
      : { target: 'pino/file', level, options: { destination: 1 } }
  ];

  if (options.errorLogPath) {
    targets.push({
      target: 'pino/file',
      level: 'warn',
      options: { destination: options.errorLogPath, mkdir: true }
    });
  }

  return pino({
    level,
    transport: { targets },
    redact
  });
}
