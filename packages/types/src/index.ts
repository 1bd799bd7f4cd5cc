/**
 * @mezo/types
 *
 * Shared type definitions for Mezo.
 * This package contains zero runtime code: only TypeScript interfaces
 * and types that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Color, Point, Rect, Size } from './common';

// Raster image
export type { RasterImage } from './image';

// Masks
export type {
  ManualMask,
  Mask,
  MaskBitmap,
  MaskInput,
  MaskLabel,
  MaskLayering,
  MaskSource,
  MaskStoreSnapshot,
  MesophaseCategory,
  OracleMask,
} from './mask';

// Prompts
export type { AutoPrompt, BoxPrompt, PointPrompt, Prompt } from './prompt';

// Segmentation oracle boundary
export type {
  DenseMaskEncoding,
  OracleMaskEncoding,
  OracleRequest,
  ProposedMask,
  RawProposal,
  RleMaskEncoding,
  SegmentationOracle,
} from './oracle';

// Edit operations (undo/redo)
export type { EditHistory, EditOperation, EditOperationKind } from './command';

// Classification
export type { CategoryTally, ClassificationResult, UnclassifiedTally } from './classification';

// Sample library
export type {
  Calibration,
  LibraryIndex,
  NewSample,
  OpenedSample,
  SampleRecord,
  SampleSummary,
} from './library';

// Session
export type {
  Advisory,
  AdvisoryKind,
  CandidateEdit,
  ManualShape,
  ReviewCandidate,
  SessionMode,
  SessionState,
} from './session';

// Configuration
export type { ConfidenceScale, MezoConfig } from './config';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
