/**
 * @module config
 * Default engine configuration and validation of overrides.
 */

import type { ConfidenceScale, MezoConfig } from '@mezo/types';

/** Defaults used when a field is not overridden. */
export const DEFAULT_CONFIG: Readonly<MezoConfig> = Object.freeze({
  confidenceFloor: 0.5,
  confidenceScale: 'probability',
  duplicateIou: 0.9,
  oracleTimeoutMs: 30_000,
  historyDepth: 50,
});

const CONFIDENCE_SCALES: readonly ConfidenceScale[] = ['probability', 'percent', 'logit'];

/**
 * Merge overrides onto {@link DEFAULT_CONFIG}.
 *
 * @throws {RangeError} If a value is outside its valid range.
 */
export function resolveConfig(overrides: Partial<MezoConfig> = {}): MezoConfig {
  const config: MezoConfig = { ...DEFAULT_CONFIG, ...overrides };

  if (!(config.confidenceFloor >= 0 && config.confidenceFloor <= 1)) {
    throw new RangeError('confidenceFloor must be within [0, 1]');
  }
  if (!CONFIDENCE_SCALES.includes(config.confidenceScale)) {
    throw new RangeError(`confidenceScale must be one of ${CONFIDENCE_SCALES.join(', ')}`);
  }
  if (!(config.duplicateIou > 0 && config.duplicateIou <= 1)) {
    throw new RangeError('duplicateIou must be within (0, 1]');
  }
  if (!Number.isFinite(config.oracleTimeoutMs) || config.oracleTimeoutMs <= 0) {
    throw new RangeError('oracleTimeoutMs must be a positive number');
  }
  if (!Number.isInteger(config.historyDepth) || config.historyDepth < 1) {
    throw new RangeError('historyDepth must be at least 1');
  }

  return config;
}
