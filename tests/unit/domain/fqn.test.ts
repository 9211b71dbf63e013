import { describe, it, expect } from 'vitest';
import { AggrFn } from '../../../src/domain/spec/aggregation.js';
import { baseFqnOf, formatFqn, normalizeFqn, parseFqn } from '../../../src/domain/spec/fqn.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('parseFqn', () => {
  it('parses every form of the grammar', () => {
    expect(expectOk(parseFqn('clicks'), 'bare name')).toEqual({ name: 'clicks' });
    expect(expectOk(parseFqn('ads.clicks'), 'qualified')).toEqual({ namespace: 'ads', name: 'clicks' });
    expect(expectOk(parseFqn('ads.clicks+sum'), 'with aggregation')).toEqual({
      namespace: 'ads',
      name: 'clicks',
      aggrFn: AggrFn.Sum,
    });
    expect(expectOk(parseFqn('clicks+count'), 'bare with aggregation')).toEqual({
      name: 'clicks',
      aggrFn: AggrFn.Count,
    });
  });

  it('rejects too many segments', () => {
    const error = expectErr(parseFqn('a.b.c'), 'three segments');
    expect(error.code).toBe('INVALID_FQN');
    expect(error.message).toBe("invalid FQN 'a.b.c': expected [namespace.]name[+aggrfn]");
  });

  it('rejects bad names and namespaces', () => {
    expect(expectErr(parseFqn('ads.'), 'empty name').message).toBe("invalid FQN 'ads.': invalid name ''");
    expect(expectErr(parseFqn('9x.clicks'), 'bad namespace').message).toBe(
      "invalid FQN '9x.clicks': invalid namespace '9x'"
    );
  });

  it('rejects unknown aggregation suffixes', () => {
    expect(expectErr(parseFqn('ads.clicks+median'), 'median').message).toBe(
      "invalid FQN 'ads.clicks+median': unknown aggregation 'median'"
    );
    expect(expectErr(parseFqn('ads.clicks+unknown'), 'sentinel').code).toBe('INVALID_FQN');
  });
});

describe('formatting and normalization', () => {
  it('formats with and without suffix', () => {
    expect(formatFqn('ads', 'clicks')).toBe('ads.clicks');
    expect(formatFqn('ads', 'clicks', AggrFn.Max)).toBe('ads.clicks+max');
  });

  it('fills in the default namespace', () => {
    expect(expectOk(normalizeFqn('clicks+sum', 'default'), 'normalize')).toBe('default.clicks+sum');
    expect(expectOk(normalizeFqn('ads.clicks', 'default'), 'normalize')).toBe('ads.clicks');
  });

  it('drops the suffix for the base FQN', () => {
    const parsed = expectOk(parseFqn('clicks+avg'), 'parse');
    expect(baseFqnOf(parsed, 'default')).toBe('default.clicks');
  });
});
