/**
 * @module oracle
 * Boundary types for the external segmentation model.
 * Any model that satisfies {@link SegmentationOracle} is substitutable.
 */

import type { Rect, Size } from './common';
import type { RasterImage } from './image';
import type { MaskBitmap } from './mask';
import type { Prompt } from './prompt';

/** Full-frame mask; any non-zero byte is foreground. */
export interface DenseMaskEncoding {
  kind: 'dense';
  data: Uint8Array;
  size: Size;
}

/**
 * Run-length mask over `bounds`, row-major.
 * Runs alternate background/foreground, starting with background.
 */
export interface RleMaskEncoding {
  kind: 'rle';
  bounds: Rect;
  runs: number[];
}

/** Mask encodings the oracle may return. */
export type OracleMaskEncoding = DenseMaskEncoding | RleMaskEncoding;

/** One candidate in an oracle response, in the model's own confidence scale. */
export interface RawProposal {
  mask: OracleMaskEncoding;
  score: number;
}

/** Request sent to the oracle. */
export interface OracleRequest {
  image: RasterImage;
  prompt: Prompt;
}

/** The external segmentation model (black box). */
export interface SegmentationOracle {
  /**
   * Propose candidate masks for a prompt.
   * @param request - Image reference and prompt.
   * @param signal - Aborted when the caller no longer wants the result.
   * @returns Ordered candidate list.
   */
  predict(request: OracleRequest, signal?: AbortSignal): Promise<RawProposal[]>;
}

/** A normalized candidate, ready to be reviewed and accepted into a Mask Store. */
export interface ProposedMask {
  /** Region clipped to the image and cropped to its set pixels. */
  bitmap: MaskBitmap;
  /** Confidence in [0, 1]. */
  confidence: number;
  /** Number of set pixels. */
  area: number;
}
