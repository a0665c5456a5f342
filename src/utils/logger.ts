import pino from 'pino';

export function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function buildLoggerOptions(): pino.LoggerOptions {
  const level = process.env.LOG_LEVEL || 'info';
  if (process.env.NODE_ENV === 'development') {
    return {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level };
}

const baseLogger = pino(buildLoggerOptions());

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return baseLogger.child({ ...context });
}
