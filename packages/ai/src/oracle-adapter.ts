/**
 * @module oracle-adapter
 * Translates raw oracle output into candidate masks for review.
 *
 * The adapter is a pure translation layer around a {@link SegmentationOracle}:
 * it bounds the call in time, maps scores onto [0, 1], converts every mask to
 * a clipped {@link MaskBitmap}, filters weak and duplicate proposals and
 * orders the rest. It never touches a Mask Store.
 */

import type {
  ConfidenceScale,
  MaskBitmap,
  MezoConfig,
  OracleMaskEncoding,
  Prompt,
  ProposedMask,
  RasterImage,
  RawProposal,
  SegmentationOracle,
  Size,
} from '@mezo/types';
import {
  OracleUnavailableError,
  bitmapArea,
  bitmapFromDense,
  bitmapIou,
  cropToContent,
  decodeRle,
  resolveConfig,
} from '@mezo/core';

/** Options for a single {@link SegmentationOracleAdapter.propose} call. */
export interface ProposeOptions {
  /** Aborting it cancels the call. */
  signal?: AbortSignal;
}

/** Adapter settings; see {@link MezoConfig}. */
export type OracleAdapterConfig = Pick<
  MezoConfig,
  'confidenceFloor' | 'confidenceScale' | 'duplicateIou' | 'oracleTimeoutMs'
>;

/**
 * Map a raw score onto [0, 1].
 * @returns The normalized confidence, or null for a non-finite score.
 */
export function normalizeScore(score: number, scale: ConfidenceScale): number | null {
  if (!Number.isFinite(score)) return null;
  const value = scale === 'percent' ? score / 100 : scale === 'logit' ? 1 / (1 + Math.exp(-score)) : score;
  return Math.min(1, Math.max(0, value));
}

/** Nearest-neighbour resample of a full-frame mask. */
function resampleDense(data: Uint8Array, from: Size, to: Size): Uint8Array {
  const out = new Uint8Array(to.width * to.height);
  for (let y = 0; y < to.height; y++) {
    const sy = Math.min(Math.floor((y * from.height) / to.height), from.height - 1);
    for (let x = 0; x < to.width; x++) {
      const sx = Math.min(Math.floor((x * from.width) / to.width), from.width - 1);
      out[y * to.width + x] = data[sy * from.width + sx] !== 0 ? 1 : 0;
    }
  }
  return out;
}

/**
 * Convert one oracle mask to a bitmap clipped to the image.
 * @returns The bitmap, or null when no pixel is set inside the image.
 * @throws {Error} If the encoding is malformed.
 */
export function toImageBitmap(mask: OracleMaskEncoding, image: Size): MaskBitmap | null {
  if (mask.kind === 'rle') {
    return cropToContent(decodeRle(mask), image);
  }

  const { data, size } = mask;
  if (!(size.width > 0 && size.height > 0) || data.length !== size.width * size.height) {
    throw new Error(`Dense mask of ${data.length} bytes does not match ${size.width}x${size.height}`);
  }
  const dense =
    size.width === image.width && size.height === image.height ? data : resampleDense(data, size, image);
  return bitmapFromDense(dense, image);
}

/** Error message of an unknown thrown value. */
function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wraps a segmentation oracle with normalization, filtering and a deadline.
 *
 * Usage:
 * ```ts
 * const adapter = new SegmentationOracleAdapter(oracle, { confidenceFloor: 0.6 });
 * const candidates = await adapter.propose(image, { kind: 'auto' }, { signal });
 * ```
 */
export class SegmentationOracleAdapter {
  readonly config: Readonly<OracleAdapterConfig>;
  private readonly oracle: SegmentationOracle;

  /**
   * @param oracle - The model to call.
   * @param config - Overrides of the defaults in `DEFAULT_CONFIG`.
   * @throws {RangeError} If a setting is out of range.
   */
  constructor(oracle: SegmentationOracle, config: Partial<OracleAdapterConfig> = {}) {
    const { confidenceFloor, confidenceScale, duplicateIou, oracleTimeoutMs } = resolveConfig(config);
    this.oracle = oracle;
    this.config = { confidenceFloor, confidenceScale, duplicateIou, oracleTimeoutMs };
  }

  /**
   * Ask the oracle for candidates and normalize them.
   *
   * @returns Candidates sorted by confidence, highest first; possibly empty.
   * @throws {OracleUnavailableError} If the oracle fails, returns a malformed
   *   response, exceeds `oracleTimeoutMs`, or the signal is aborted.
   */
  async propose(image: RasterImage, prompt: Prompt, options: ProposeOptions = {}): Promise<ProposedMask[]> {
    const raw = await this.call(image, prompt, options.signal);
    try {
      return this.normalize(raw, image);
    } catch (err) {
      throw new OracleUnavailableError('failed', `Malformed oracle response: ${messageOf(err)}`, { cause: err });
    }
  }

  /** Run the oracle under a deadline, racing it against cancellation. */
  private async call(image: RasterImage, prompt: Prompt, signal?: AbortSignal): Promise<RawProposal[]> {
    if (signal?.aborted) {
      throw new OracleUnavailableError('cancelled', 'Segmentation request was cancelled');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.oracleTimeoutMs);
    const forward = (): void => controller.abort();
    signal?.addEventListener('abort', forward, { once: true });

    try {
      return await new Promise<RawProposal[]>((resolve, reject) => {
        controller.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        void this.oracle.predict({ image, prompt }, controller.signal).then(resolve, reject);
      });
    } catch (err) {
      if (timedOut) {
        throw new OracleUnavailableError(
          'timeout',
          `Segmentation oracle did not answer within ${this.config.oracleTimeoutMs} ms`,
        );
      }
      if (controller.signal.aborted) {
        throw new OracleUnavailableError('cancelled', 'Segmentation request was cancelled');
      }
      throw new OracleUnavailableError('failed', `Segmentation oracle failed: ${messageOf(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    }
  }

  /** Score, convert, filter, sort and de-duplicate raw proposals. */
  private normalize(raw: readonly RawProposal[], image: RasterImage): ProposedMask[] {
    if (!Array.isArray(raw)) {
      throw new Error('expected an array of proposals');
    }
    const { confidenceFloor, confidenceScale, duplicateIou } = this.config;

    const candidates: ProposedMask[] = [];
    for (const proposal of raw) {
      const confidence = normalizeScore(proposal.score, confidenceScale);
      if (confidence === null || confidence < confidenceFloor) continue;
      const bitmap = toImageBitmap(proposal.mask, image);
      if (!bitmap) continue;
      candidates.push({ bitmap, confidence, area: bitmapArea(bitmap) });
    }

    // Stable sort: equal confidences keep the oracle's order.
    candidates.sort((a, b) => b.confidence - a.confidence);

    const kept: ProposedMask[] = [];
    for (const candidate of candidates) {
      if (kept.every((k) => bitmapIou(k.bitmap, candidate.bitmap) < duplicateIou)) {
        kept.push(candidate);
      }
    }
    return kept;
  }
}
