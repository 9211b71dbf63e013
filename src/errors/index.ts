export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  NotInitializedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, formatSpecError, formatRegistrationError } from './formatter.js';
