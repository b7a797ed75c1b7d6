/**
 * Structured Logger
 *
 * Pino-based logging for the analysis engine.
 * - Production: JSON to stdout with Cloud Logging compatible `severity`
 * - Development: human-oriented stdout via the pino/file transport
 * - Console-style call signatures are accepted (`logger.warn('msg', err)`)
 */

import pino from 'pino';
import { version as APP_VERSION } from '../../package.json';

const SERVICE_NAME = 'perf-consensus-engine';

const SEVERITY_BY_LEVEL: Record<string, string> = {
  trace: 'DEBUG',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

/** Ordering key for lines written within the same millisecond */
let sequence = 0;

function createPinoLogger(): pino.Logger {
  const isDev = process.env.NODE_ENV === 'development';
  const level = process.env.LOG_LEVEL || (isDev ? 'debug' : 'info');
  const base = { service: SERVICE_NAME, version: APP_VERSION };

  if (isDev) {
    return pino({
      level,
      base,
      timestamp: pino.stdTimeFunctions.isoTime,
      transport: {
        target: 'pino/file',
        options: { destination: 1 },
      },
    });
  }

  return pino({
    level,
    base,
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level(label: string) {
        return {
          severity: SEVERITY_BY_LEVEL[label] || 'DEFAULT',
          level: label,
        };
      },
      log(obj: Record<string, unknown>) {
        const enriched: Record<string, unknown> = {
          ...obj,
          insertId: `${Date.now()}-${sequence++}`,
        };

        const err = obj.err;
        if (err instanceof Error && err.stack) {
          enriched.stack_trace = err.stack;
        }

        return enriched;
      },
    },
  });
}

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void;

export type Logger = {
  warn: LogMethod;
  error: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  level: string;
};

type LevelName = 'warn' | 'error' | 'info' | 'debug' | 'fatal';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Adapts pino's `(obj, msg)` signature to also take `(msg, extra)`.
 * A trailing Error becomes `err` so pino serializes the stack.
 */
function wrap(instance: pino.Logger): Logger {
  const method = (name: LevelName): LogMethod => (msgOrObj, ...args) => {
    const [first] = args;

    if (isRecord(msgOrObj) && typeof first === 'string') {
      instance[name](msgOrObj, first);
      return;
    }

    if (typeof msgOrObj === 'string') {
      if (args.length === 0) {
        instance[name](msgOrObj);
      } else if (first instanceof Error) {
        instance[name]({ err: first }, msgOrObj);
      } else {
        instance[name]({ extra: first }, msgOrObj);
      }
      return;
    }

    if (isRecord(msgOrObj)) {
      instance[name](msgOrObj);
      return;
    }

    instance[name]({ extra: msgOrObj });
  };

  return {
    warn: method('warn'),
    error: method('error'),
    info: method('info'),
    debug: method('debug'),
    fatal: method('fatal'),
    child: (bindings) => wrap(instance.child(bindings)),
    get level() {
      return instance.level;
    },
    set level(value: string) {
      instance.level = value;
    },
  };
}

const rootLogger = createPinoLogger();

export const logger: Logger = wrap(rootLogger);

export function createChildLogger(
  context: Record<string, string | number | boolean>
): Logger {
  return wrap(rootLogger.child(context));
}

