/**
 * Structured logging with pino
 */
import { createRequire } from 'node:module';
import pino, { type Logger } from 'pino';

const require = createRequire(import.meta.url);
const isDev = process.env.NODE_ENV === 'development';

/**
 * pino-pretty is a dev dependency; fall back to JSON lines when it is absent.
 */
function isPinoPrettyAvailable(): boolean {
  if (!isDev) return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

const options = {
  level: getLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'pdf-harvest',
  },
};

export const logger = isPinoPrettyAvailable()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

const children = new Set<Logger>();

/**
 * Child logger tagged with the component name.
 */
export function moduleLogger(module: string): Logger {
  const child = logger.child({ module });
  children.add(child);
  return child;
}

/**
 * Change the level of the root logger and of every module logger.
 * pino children copy the level at creation, so they are updated one by one.
 * An explicit LOG_LEVEL in the environment wins.
 */
export function setLogLevel(level: LogLevel): void {
  if (process.env.LOG_LEVEL) return;
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
