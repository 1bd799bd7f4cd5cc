/**
 * @module common
 * Geometry and colour primitives shared by every package.
 * Coordinates are image pixels with the origin at the top-left corner.
 */

/** Overlay colour: 0-255 channels, alpha in [0, 1]. */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** A position in image space; may be fractional for prompts and cut paths. */
export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned pixel rectangle, `x`/`y` being its top-left pixel. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Image or mask dimensions. */
export interface Size {
  width: number;
  height: number;
}
