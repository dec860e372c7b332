import { describe, it, expect } from 'vitest';
import { canonicalize, serializeIndex, hasChanged } from '../../src/application/change-detection.js';
import type { EarningsIndex } from '../../src/domain/index.js';
import { makeIndexed } from '../helpers.js';

describe('canonicalize', () => {
  it('sorts keys at every depth and keeps array order', () => {
    const value = { b: 1, a: { d: [{ z: 1, y: 2 }, 3], c: null } };

    expect(JSON.stringify(canonicalize(value))).toBe('{"a":{"c":null,"d":[{"y":2,"z":1},3]},"b":1}');
  });

  it('returns primitives unchanged', () => {
    expect(canonicalize('x')).toBe('x');
    expect(canonicalize(4)).toBe(4);
    expect(canonicalize(null)).toBeNull();
  });
});

describe('serializeIndex', () => {
  it('writes sorted keys with two-space indent and a trailing newline', () => {
    const index: EarningsIndex = {
      MSFT: makeIndexed({ symbol: 'MSFT', date: '2024-04-25' }),
    };

    expect(serializeIndex(index)).toBe(
      [
        '{',
        '  "MSFT": {',
        '    "date": "2024-04-25",',
        '    "metadata": {},',
        '    "sameDayCount": 1,',
        '    "symbol": "MSFT",',
        '    "time": "tbd"',
        '  }',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('serializes an empty index as {}', () => {
    expect(serializeIndex({})).toBe('{}\n');
  });
});

describe('hasChanged', () => {
  const aapl = makeIndexed({ symbol: 'AAPL', date: '2024-05-01', metadata: { hour: 'amc', epsEstimate: 1.5 } });
  const msft = makeIndexed({ symbol: 'MSFT', date: '2024-04-25' });

  it('reports a change when there is no previous index', () => {
    expect(hasChanged(null, {})).toBe(true);
  });

  it('ignores key order at every level', () => {
    const previous: EarningsIndex = { AAPL: aapl, MSFT: msft };
    const reordered: EarningsIndex = {
      MSFT: { time: 'tbd', symbol: 'MSFT', sameDayCount: 1, metadata: {}, date: '2024-04-25' },
      AAPL: { ...aapl, metadata: { epsEstimate: 1.5, hour: 'amc' } },
    };

    expect(hasChanged(previous, reordered)).toBe(false);
  });

  it('detects a moved date', () => {
    expect(hasChanged({ AAPL: aapl }, { AAPL: { ...aapl, date: '2024-05-02' } })).toBe(true);
  });

  it('detects a metadata revision', () => {
    expect(hasChanged({ AAPL: aapl }, { AAPL: { ...aapl, metadata: { hour: 'amc', epsEstimate: 1.6 } } })).toBe(true);
  });

  it('detects added and removed symbols', () => {
    expect(hasChanged({ AAPL: aapl }, { AAPL: aapl, MSFT: msft })).toBe(true);
    expect(hasChanged({ AAPL: aapl, MSFT: msft }, { AAPL: aapl })).toBe(true);
  });

  it('reports no change for two empty indexes', () => {
    expect(hasChanged({}, {})).toBe(false);
  });
});
