/**
 * @mezo/ai
 *
 * Segmentation oracle adapter and a SAM-style oracle on ONNX Runtime Web.
 *
 * @packageDocumentation
 */

// Oracle adapter
export { SegmentationOracleAdapter, normalizeScore, toImageBitmap } from './oracle-adapter';
export type { OracleAdapterConfig, ProposeOptions } from './oracle-adapter';

// SAM oracle
export { SamOracle } from './sam-oracle';
export type { OnnxSession, OnnxTensor, OnnxRuntime, SamOracleConfig } from './sam-oracle';
export { createSamOracle } from './provider-factory';
export type { CreateSamOracleOptions } from './provider-factory';

// Image utilities
export {
  preprocessImage,
  promptToPoints,
  gridPoints,
  createPointTensors,
  postprocessMask,
  calculateConfidence,
  SAM_INPUT_SIZE,
  SAM_LABEL,
} from './image-utils';
export type { SamPoint } from './image-utils';

// Mask refinement
export { applyBrushStroke, adjustBoundary } from './mask-refinement';
export type { BrushConfig, BrushMode } from './mask-refinement';
