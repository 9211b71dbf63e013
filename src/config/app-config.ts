/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { NAME_PATTERN } from '../domain/spec/schemas.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type NamespaceName = Brand<string, 'NamespaceName'>;

/**
 * What publishing a spec whose FQN is already taken does.
 * `replace` suits notebooks and hot reloads, where definitions re-run.
 */
export type ConflictPolicy = { readonly kind: 'replace' } | { readonly kind: 'reject' };

export interface AppConfig {
  readonly specs: {
    readonly defaultNamespace: NamespaceName;
  };
  readonly registry: {
    readonly onConflict: ConflictPolicy;
  };
  readonly manifest: {
    readonly apiVersion: string;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const EnvSchema = z.object({
  FEATUREKIT_DEFAULT_NAMESPACE: z
    .string()
    .regex(NAME_PATTERN, 'FEATUREKIT_DEFAULT_NAMESPACE must match [a-zA-Z_][a-zA-Z0-9_-]*')
    .default('default'),

  FEATUREKIT_ON_CONFLICT: z.enum(['replace', 'reject']).default('replace'),

  FEATUREKIT_MANIFEST_API_VERSION: z
    .string()
    .regex(/^[a-z0-9.-]+\/v[0-9a-z]+$/, 'FEATUREKIT_MANIFEST_API_VERSION must look like group/version')
    .default('featurekit.dev/v1alpha1'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const onConflict: ConflictPolicy =
    env.FEATUREKIT_ON_CONFLICT === 'reject' ? { kind: 'reject' } : { kind: 'replace' };

  return {
    specs: { defaultNamespace: env.FEATUREKIT_DEFAULT_NAMESPACE as NamespaceName },
    registry: { onConflict },
    manifest: { apiVersion: env.FEATUREKIT_MANIFEST_API_VERSION },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
