/**
 * Redaction configuration for pino.
 *
 * Builder options and data-source references are free-form and may carry
 * credentials for the platform; never log them in clear.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',

    // builder options travel with specs
    'builder.options.*',
    'spec.builder.options.*',
    'options.builder.options.*',
  ],
  censor: '[REDACTED]',
};
