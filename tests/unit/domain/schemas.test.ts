import { describe, it, expect } from 'vitest';
import {
  DurationSchema,
  FeatureInputSchema,
  FeatureSetInputSchema,
  KeysSchema,
  toInputIssues,
} from '../../../src/domain/spec/schemas.js';

describe('DurationSchema', () => {
  it('accepts single and compound durations and a bare zero', () => {
    for (const value of ['5s', '1h30m', '1d', '250ms', '1.5h', '10us', '0']) {
      expect(DurationSchema.safeParse(value).success).toBe(true);
    }
  });

  it('rejects anything else', () => {
    for (const value of ['', '5', '00', 's', '1 h', '1w', '-1s']) {
      expect(DurationSchema.safeParse(value).success).toBe(false);
    }
  });
});

describe('KeysSchema', () => {
  it('wraps a single key', () => {
    expect(KeysSchema.parse('user_id')).toEqual(['user_id']);
    expect(KeysSchema.parse(['user_id', 'item_id'])).toEqual(['user_id', 'item_id']);
  });

  it('requires at least one non-empty key', () => {
    const empty = KeysSchema.safeParse([]);
    expect(empty.success).toBe(false);
    if (!empty.success) {
      expect(toInputIssues(empty.error)).toEqual([{ path: '(root)', message: 'at least one key is required' }]);
    }

    const blank = KeysSchema.safeParse('');
    expect(blank.success).toBe(false);
    if (!blank.success) {
      expect(toInputIssues(blank.error)).toEqual([{ path: '0', message: 'key must not be empty' }]);
    }
  });
});

describe('FeatureInputSchema', () => {
  const valid = {
    name: 'clicks',
    namespace: 'default',
    keys: 'user_id',
    staleness: '1h',
    freshness: '',
  };

  it('accepts an empty freshness', () => {
    const parsed = FeatureInputSchema.safeParse(valid);
    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data.keys).toEqual(['user_id']);
    }
  });

  it('reports issues by path', () => {
    const parsed = FeatureInputSchema.safeParse({ ...valid, name: 'bad.name', keys: [] });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(toInputIssues(parsed.error)).toEqual([
        { path: 'name', message: 'must match [a-zA-Z_][a-zA-Z0-9_-]*' },
        { path: 'keys', message: 'at least one key is required' },
      ]);
    }
  });
});

describe('FeatureSetInputSchema', () => {
  it('leaves optional fields out', () => {
    expect(FeatureSetInputSchema.parse({ name: 'serving' })).toEqual({ name: 'serving' });
  });

  it('requires the timeout to be a duration', () => {
    expect(FeatureSetInputSchema.safeParse({ name: 'serving', timeout: '' }).success).toBe(false);
  });
});
