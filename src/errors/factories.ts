import type { AppError, ConfigIssue, ConfigInvalidError, NotInitializedError, UnexpectedError } from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  notInitialized: (service: string): NotInitializedError => ({
    _tag: 'NotInitialized',
    service,
    message: `${service} requested before the container was initialized`,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
