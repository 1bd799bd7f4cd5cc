/**
 * @module config
 * Tunables of the segmentation engine.
 */

/** Scale in which an oracle reports confidence. */
export type ConfidenceScale = 'probability' | 'percent' | 'logit';

/** Engine configuration. Every field has a default; see `resolveConfig`. */
export interface MezoConfig {
  /** Proposals below this normalized confidence are dropped. */
  confidenceFloor: number;
  /** How the oracle's raw scores map onto [0, 1]. */
  confidenceScale: ConfidenceScale;
  /** Proposals overlapping a better one at or above this IoU are dropped. */
  duplicateIou: number;
  /** Oracle calls slower than this fail as unavailable. */
  oracleTimeoutMs: number;
  /** Maximum number of operations kept for undo. */
  historyDepth: number;
}
