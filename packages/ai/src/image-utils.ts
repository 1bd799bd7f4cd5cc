/**
 * @module image-utils
 * Tensor conversion utilities for SAM-style encoder/decoder models.
 *
 * The encoder expects:
 * - Input size: 1024x1024 (longest side scaled to fit, zero padded)
 * - Normalization: ImageNet mean/std
 * - Format: NCHW Float32Array
 */

import type { Point, Prompt, RasterImage, Size } from '@mezo/types';

/** ImageNet normalization constants. */
const IMAGENET_MEAN = [0.485, 0.456, 0.406];
const IMAGENET_STD = [0.229, 0.224, 0.225];

/** Target input size for the encoder. */
export const SAM_INPUT_SIZE = 1024;

/** Decoder point labels. */
export const SAM_LABEL = {
  padding: -1,
  background: 0,
  foreground: 1,
  boxTopLeft: 2,
  boxBottomRight: 3,
} as const;

/** A prompt point in image coordinates with its decoder label. */
export interface SamPoint {
  x: number;
  y: number;
  label: number;
}

/**
 * Preprocess an RGBA image for encoder input.
 * 1. Resize to fit within 1024x1024 (maintaining aspect ratio)
 * 2. Normalize with ImageNet mean/std
 * 3. Convert to NCHW Float32Array
 *
 * @returns Preprocessed tensor and the size of the resized image inside it.
 */
export function preprocessImage(image: RasterImage): { tensor: Float32Array; resizedSize: Size } {
  const { width, height, data } = image;
  const scale = Math.min(SAM_INPUT_SIZE / width, SAM_INPUT_SIZE / height);
  const resizedWidth = Math.round(width * scale);
  const resizedHeight = Math.round(height * scale);

  const plane = SAM_INPUT_SIZE * SAM_INPUT_SIZE;
  const tensor = new Float32Array(3 * plane);

  for (let y = 0; y < resizedHeight; y++) {
    for (let x = 0; x < resizedWidth; x++) {
      // Nearest-neighbor sampling from the source image
      const srcX = Math.min(Math.floor(x / scale), width - 1);
      const srcY = Math.min(Math.floor(y / scale), height - 1);
      const srcIdx = (srcY * width + srcX) * 4;
      const dstIdx = y * SAM_INPUT_SIZE + x;

      for (let c = 0; c < 3; c++) {
        tensor[c * plane + dstIdx] = (data[srcIdx + c] / 255 - IMAGENET_MEAN[c]) / IMAGENET_STD[c];
      }
    }
  }

  return { tensor, resizedSize: { width: resizedWidth, height: resizedHeight } };
}

/**
 * Translate a point or box prompt into decoder points.
 *
 * Point prompts get a trailing padding point, as the decoder expects when no
 * box is given. Auto prompts have no single point set; see {@link gridPoints}.
 */
export function promptToPoints(prompt: Exclude<Prompt, { kind: 'auto' }>): SamPoint[] {
  if (prompt.kind === 'box') {
    const { x, y, width, height } = prompt.box;
    return [
      { x, y, label: SAM_LABEL.boxTopLeft },
      { x: x + width, y: y + height, label: SAM_LABEL.boxBottomRight },
    ];
  }
  return [
    {
      x: prompt.position.x,
      y: prompt.position.y,
      label: prompt.label === 'foreground' ? SAM_LABEL.foreground : SAM_LABEL.background,
    },
    { x: 0, y: 0, label: SAM_LABEL.padding },
  ];
}

/**
 * Centres of a `perSide` x `perSide` grid of cells over the image, used to
 * segment the whole image with one foreground point per cell.
 */
export function gridPoints(size: Size, perSide: number): Point[] {
  const points: Point[] = [];
  for (let row = 0; row < perSide; row++) {
    for (let col = 0; col < perSide; col++) {
      points.push({
        x: ((col + 0.5) * size.width) / perSide,
        y: ((row + 0.5) * size.height) / perSide,
      });
    }
  }
  return points;
}

/**
 * Create prompt tensors for the decoder.
 * Converts image-space points to the resized input space; padding points
 * are passed through unscaled.
 *
 * @returns Coords (Nx2 Float32) and labels (N Float32) tensors.
 */
export function createPointTensors(
  points: readonly SamPoint[],
  originalSize: Size,
  resizedSize: Size,
): { coords: Float32Array; labels: Float32Array } {
  const n = points.length;
  const coords = new Float32Array(n * 2);
  const labels = new Float32Array(n);

  const scaleX = resizedSize.width / originalSize.width;
  const scaleY = resizedSize.height / originalSize.height;

  for (let i = 0; i < n; i++) {
    const padding = points[i].label === SAM_LABEL.padding;
    coords[i * 2] = padding ? 0 : points[i].x * scaleX;
    coords[i * 2 + 1] = padding ? 0 : points[i].y * scaleY;
    labels[i] = points[i].label;
  }

  return { coords, labels };
}

/**
 * Post-process decoder output into a binary mask.
 * Applies sigmoid and threshold to logits.
 *
 * @param logits - Raw mask logits from the decoder (one mask plane).
 * @param maskSize - Dimensions of the logits plane.
 * @param originalSize - Target output dimensions.
 * @param threshold - Sigmoid threshold for binarization (default 0.5).
 * @returns Binary mask (0 or 1) at original resolution.
 */
export function postprocessMask(
  logits: Float32Array,
  maskSize: Size,
  originalSize: Size,
  threshold = 0.5,
): Uint8Array {
  const mask = new Uint8Array(originalSize.width * originalSize.height);

  const scaleX = maskSize.width / originalSize.width;
  const scaleY = maskSize.height / originalSize.height;

  for (let y = 0; y < originalSize.height; y++) {
    for (let x = 0; x < originalSize.width; x++) {
      const srcX = Math.min(Math.floor(x * scaleX), maskSize.width - 1);
      const srcY = Math.min(Math.floor(y * scaleY), maskSize.height - 1);
      const logit = logits[srcY * maskSize.width + srcX];

      const prob = 1 / (1 + Math.exp(-logit));
      mask[y * originalSize.width + x] = prob >= threshold ? 1 : 0;
    }
  }

  return mask;
}

/**
 * Confidence fallback for decoders that emit no IoU prediction.
 * Uses the mean absolute logit value as a proxy.
 */
export function calculateConfidence(logits: Float32Array): number {
  if (logits.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < logits.length; i++) {
    sum += Math.abs(logits[i]);
  }
  const meanAbsLogit = sum / logits.length;
  // Map to 0-1 range using sigmoid-like curve
  return 1 / (1 + Math.exp(-meanAbsLogit + 3));
}
