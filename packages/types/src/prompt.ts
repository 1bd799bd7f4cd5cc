/**
 * @module prompt
 * Prompt descriptors sent to the segmentation oracle.
 */

import type { Point, Rect } from './common';

/** A single click; `foreground` includes the pixel, `background` excludes it. */
export interface PointPrompt {
  kind: 'point';
  /** Pixel coordinate in image space. */
  position: Point;
  /** Whether the click marks the region or its surroundings. */
  label: 'foreground' | 'background';
}

/** A bounding box around the region of interest. */
export interface BoxPrompt {
  kind: 'box';
  box: Rect;
}

/** Whole-image automatic segmentation. */
export interface AutoPrompt {
  kind: 'auto';
}

/** Any prompt accepted by the oracle. */
export type Prompt = PointPrompt | BoxPrompt | AutoPrompt;
