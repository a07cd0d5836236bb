import { pino, type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';
const isTest = process.env['VITEST'] !== undefined;

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isDev ? 'debug' : 'info';
}

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: process.env['BRIDGELINE_LOG_LEVEL'] ?? defaultLevel(),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// stdout carries command output, so logs always go to stderr
if (isDev && !isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export const logger = options.transport ? pino(options) : pino(options, pino.destination(2));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
