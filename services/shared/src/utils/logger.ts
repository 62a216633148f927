import pino, { Logger, LoggerOptions } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

const loggerConfig: LoggerOptions = {
     level: process.env.LOG_LEVEL || 'info',
     formatters: {
          level: (label: string) => ({ level: label }),
     },
     serializers: {
          err: pino.stdSerializers.err,
          error: pino.stdSerializers.err,
     },
     base: {
          service: process.env.SERVICE_NAME || 'order-service',
          environment: process.env.NODE_ENV || 'production',
     },
};

if (isDevelopment) {
     loggerConfig.transport = {
          target: 'pino-pretty',
          options: {
               colorize: true,
               translateTime: 'HH:MM:ss Z',
               ignore: 'pid,hostname',
          },
     };
}

export const logger = pino(loggerConfig);

export function createChildLogger(context: Record<string, unknown>): Logger {
     return logger.child(context);
}
