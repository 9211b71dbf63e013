import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** The container was asked for a service before `initializeContainer` ran. */
export type NotInitializedError = Readonly<{
  readonly _tag: 'NotInitialized';
  readonly service: string;
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | NotInitializedError | UnexpectedError;

/**
 * Branded type for validated config.
 * Callers can require a validated value without re-checking it.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
