import pino from 'pino';
import { config } from '../config/env';

export const logger = pino({
  level: config.LOG_LEVEL,
  base: {
    env: config.NODE_ENV,
    service: 'agent-orchestrator',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: ['*.password', '*.token', '*.key', '*.secret', '*.apiKey'],
    remove: true,
  },
  // stdout carries the final answer in the CLI, so logs go to stderr.
  transport:
    config.NODE_ENV === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
});

export const childLogger = (bindings: Record<string, unknown>) => logger.child(bindings);

export type Logger = typeof logger;
