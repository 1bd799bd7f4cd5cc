/**
 * @mezo/core
 *
 * Mask Store, edit history, classification and persistence primitives.
 *
 * @packageDocumentation
 */

// Errors
export {
  MezoError,
  InvalidMaskError,
  NotFoundError,
  OracleUnavailableError,
  BusyError,
  CorruptStateError,
  SessionStateError,
  DuplicateNameError,
} from './errors';
export type { OracleFailureReason } from './errors';

// Configuration
export { DEFAULT_CONFIG, resolveConfig } from './config';

// Ids
export { generateId } from './uuid';

// Categories
export { MESOPHASE_CATEGORIES, isMesophaseCategory, isMaskLabel } from './categories';

// Mask geometry
export {
  assertWellFormed,
  createBitmap,
  cloneBitmap,
  bitmapArea,
  bitmapContains,
  cropToContent,
  bitmapFromDense,
  bitmapToDense,
  forEachSetPixel,
  unionBitmaps,
  subtractBitmaps,
  intersectionArea,
  bitmapIou,
  rectBitmap,
  circleBitmap,
  polygonBitmap,
  connectedComponents,
  splitBitmap,
} from './mask-geometry';

// Run-length encoding
export { encodeRle, decodeRle } from './mask-encoding';

// Mask Store
export { MaskStore, validateSnapshot } from './mask-store';
export type { MaskStoreOptions } from './mask-store';

// Edit history (undo/redo)
export { EditHistoryImpl } from './edit-history';

// Event bus
export { EventBusImpl } from './event-bus';

// Classification
export { computeClassification, resolveLayering } from './classification';
export type { ResolvedLayering } from './classification';

// Overlay rendering
export { renderOverlay, DEFAULT_PALETTE } from './overlay';
export type { OverlayOptions } from './overlay';

// Calibrated report
export { buildReport, assertCalibration, DEFAULT_CALIBRATION } from './report';
export type { RegionRow, SampleReport } from './report';

// Persistence
export { encodeSnapshot, decodeSnapshot, SNAPSHOT_FORMAT, SNAPSHOT_VERSION } from './snapshot-codec';
export { encodePng, decodePng } from './png-codec';
