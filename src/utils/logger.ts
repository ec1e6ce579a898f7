import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

export const logger = pino({
  name: 'strategy-backtester',
  level: process.env.LOG_LEVEL || 'info',
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname,name',
        },
      }
    : undefined,
  redact: {
    paths: ['apiKey', 'token', '*.apiKey', '*.token', 'headers.authorization'],
    censor: '[REDACTED]',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export function createLogger(name: string) {
  return logger.child({ module: name });
}
