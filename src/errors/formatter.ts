import type { AppError } from './app-error.js';
import type { RegistrationError, SpecError } from '../domain/spec/spec-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'NotInitialized':
      return error.message;

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

/** One line per problem; input issues are listed under the headline. */
export function formatSpecError(error: SpecError): string {
  if (error.code === 'INVALID_INPUT') {
    return ['invalid input:', ...error.issues.map((i) => `  - ${i.path}: ${i.message}`)].join('\n');
  }
  return `[${error.code}] ${error.message}`;
}

export function formatRegistrationError(error: RegistrationError): string {
  return `in ${error.declaredName}: ${formatSpecError(error.cause)}`;
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
