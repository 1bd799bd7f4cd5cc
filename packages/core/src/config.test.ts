import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from './config';

describe('resolveConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveConfig()).toEqual({
      confidenceFloor: 0.5,
      confidenceScale: 'probability',
      duplicateIou: 0.9,
      oracleTimeoutMs: 30_000,
      historyDepth: 50,
    });
  });

  it('merges overrides without touching the defaults', () => {
    const config = resolveConfig({ confidenceFloor: 0.3, confidenceScale: 'logit' });
    expect(config.confidenceFloor).toBe(0.3);
    expect(config.confidenceScale).toBe('logit');
    expect(config.duplicateIou).toBe(0.9);
    expect(DEFAULT_CONFIG.confidenceFloor).toBe(0.5);
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveConfig({ confidenceFloor: 1.5 })).toThrow(RangeError);
    expect(() => resolveConfig({ confidenceFloor: Number.NaN })).toThrow(RangeError);
    expect(() => resolveConfig({ duplicateIou: 0 })).toThrow(RangeError);
    expect(() => resolveConfig({ oracleTimeoutMs: -1 })).toThrow(RangeError);
    expect(() => resolveConfig({ historyDepth: 0 })).toThrow('historyDepth must be at least 1');
  });
});
