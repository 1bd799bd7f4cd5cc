/**
 * @module image
 * Raster image shared by the library, the editor and the oracle.
 */

/**
 * An immutable RGBA raster loaded once per editing session.
 * Owned by the library; every other component holds a reference, never a copy.
 */
export interface RasterImage {
  /** Width in pixels. */
  readonly width: number;
  /** Height in pixels. */
  readonly height: number;
  /** RGBA pixel data, `width * height * 4` bytes. */
  readonly data: Uint8Array;
}
