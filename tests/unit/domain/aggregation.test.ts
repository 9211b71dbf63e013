import { describe, it, expect } from 'vitest';
import { AggrFn, isAggrFn, parseAggrFn, supports } from '../../../src/domain/spec/aggregation.js';

describe('AggrFn', () => {
  it('parses suffixes', () => {
    expect(parseAggrFn('sum')).toBe(AggrFn.Sum);
    expect(parseAggrFn(' Distinct_Count ')).toBe(AggrFn.DistinctCount);
    expect(parseAggrFn('median')).toBe(AggrFn.Unknown);
    expect(isAggrFn('approx_distinct_count')).toBe(true);
    expect(isAggrFn('SUM')).toBe(false);
  });

  it('restricts arithmetic functions to numbers', () => {
    for (const fn of [AggrFn.Sum, AggrFn.Avg, AggrFn.Max, AggrFn.Min]) {
      expect(supports(fn, 'int')).toBe(true);
      expect(supports(fn, 'float')).toBe(true);
      expect(supports(fn, 'string')).toBe(false);
      expect(supports(fn, '[]int')).toBe(false);
    }
  });

  it('counts any scalar', () => {
    expect(supports(AggrFn.Count, 'timestamp')).toBe(true);
    expect(supports(AggrFn.Count, 'bool')).toBe(true);
    expect(supports(AggrFn.Count, '[]string')).toBe(false);
  });

  it('counts distinct values of hashable scalars', () => {
    expect(supports(AggrFn.DistinctCount, 'string')).toBe(true);
    expect(supports(AggrFn.ApproxDistinctCount, 'bool')).toBe(true);
    expect(supports(AggrFn.DistinctCount, 'timestamp')).toBe(false);
  });

  it('supports nothing for the unknown sentinel', () => {
    expect(supports(AggrFn.Unknown, 'int')).toBe(false);
  });
});
