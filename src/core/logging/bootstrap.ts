import pino from 'pino';
import type { Logger } from './types.js';
import { getLogLevel } from './create-logger.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Bootstrap logger for code that runs BEFORE the DI container exists
 * (container initialization itself). After that, inject ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: getLogLevel(),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
