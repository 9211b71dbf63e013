import { describe, it, expect, beforeEach } from 'vitest';
import { container } from 'tsyringe';
import {
  getFeatureLab,
  initializeContainer,
  isInitialized,
  resetContainer,
} from '../../../src/di/container.js';
import { DI } from '../../../src/di/tokens.js';
import { defineFeature } from '../../../src/application/staging/option-staging.js';
import type { SpecRegistry } from '../../../src/ports/spec-registry.port.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('DI container', () => {
  beforeEach(() => {
    resetContainer();
  });

  it('refuses to hand out services before initialization', () => {
    expect(isInitialized()).toBe(false);
    const error = expectErr(getFeatureLab(), 'uninitialized');
    expect(error).toEqual({
      _tag: 'NotInitialized',
      service: 'FeatureLab',
      message: 'FeatureLab requested before the container was initialized',
    });
  });

  it('returns invalid configuration as an error', async () => {
    const error = expectErr(
      await initializeContainer({ env: { FEATUREKIT_ON_CONFLICT: 'merge' } }),
      'invalid config'
    );
    expect(error._tag).toBe('ConfigInvalid');
    expect(isInitialized()).toBe(false);
  });

  it('wires the lab to configuration from the environment', async () => {
    expectOk(
      await initializeContainer({ env: { FEATUREKIT_DEFAULT_NAMESPACE: 'team', FEATUREKIT_LOG_LEVEL: 'silent' } }),
      'init'
    );
    const lab = expectOk(getFeatureLab(), 'lab');

    const handle = expectOk(
      lab.register(defineFeature(() => 1, { name: 'f', primitive: 'int' }), {
        keys: 'user_id',
        staleness: '1h',
        freshness: '1h',
      }),
      'register'
    );
    expect(handle.spec.fqn).toBe('team.f');
    expect(container.resolve<SpecRegistry>(DI.Specs.Registry)).toBe(lab.registry);
  });

  it('shares one initialization and one lab', async () => {
    const [first, second] = await Promise.all([
      initializeContainer({ env: {} }),
      initializeContainer({ env: {} }),
    ]);
    expect(first.isOk() && second.isOk()).toBe(true);
    expect(isInitialized()).toBe(true);
    expect(expectOk(getFeatureLab(), 'first')).toBe(expectOk(getFeatureLab(), 'second'));
  });
});
