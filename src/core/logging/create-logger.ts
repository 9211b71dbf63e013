import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Log level from FEATUREKIT_LOG_LEVEL.
 *
 * trace | debug | info | warn | error | fatal | silent
 * Default: silent (definitions load inside user programs and notebooks)
 */
export function getLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env['FEATUREKIT_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}

/**
 * Root pino logger: JSON lines, synchronously to stderr so stdout stays free
 * for exported manifests.
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: getLogLevel(),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
