/**
 * @mezo/library
 *
 * Persistent sample library: images, calibration and saved mask state.
 *
 * @packageDocumentation
 */

export { FileLibraryIndex } from './library-index';
export type { FileLibraryIndexOptions } from './library-index';
