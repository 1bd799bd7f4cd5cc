/**
 * @module library
 * Sample library records.
 */

import type { RasterImage } from './image';
import type { MaskStoreSnapshot } from './mask';

/** Spatial calibration and porosity of a sample image. */
export interface Calibration {
  /** Length of the scale bar in pixels. */
  pixels: number;
  /** Length of the same scale bar in micrometers. */
  micrometers: number;
  /** Pore fraction of the image area, in [0, 1). */
  porosity: number;
}

/** A library entry. */
export interface SampleRecord {
  /** Unique sample id (UUID). */
  id: string;
  /** Unique display name. */
  name: string;
  /** Free-text description. */
  description: string;
  /** Image file name inside the sample directory. */
  imageFile: string;
  /** Image dimensions. */
  width: number;
  height: number;
  /** ISO 8601 creation time. */
  createdAt: string;
  /** ISO 8601 time of the last save. */
  lastModified: string;
  /** Whether a mask snapshot has ever been saved. */
  hasSnapshot: boolean;
  calibration: Calibration;
}

/** Summary row for library listings. */
export type SampleSummary = Pick<
  SampleRecord,
  'id' | 'name' | 'description' | 'createdAt' | 'lastModified' | 'hasSnapshot'
>;

/** Result of opening a sample. */
export interface OpenedSample {
  record: SampleRecord;
  image: RasterImage;
  /** Persisted mask state, or null if the sample was never analyzed. */
  snapshot: MaskStoreSnapshot | null;
}

/** Input for adding a sample to the library. */
export interface NewSample {
  name: string;
  description?: string;
  image: RasterImage;
  calibration?: Partial<Calibration>;
}

/** The sample library. */
export interface LibraryIndex {
  add(sample: NewSample): Promise<SampleRecord>;
  open(sampleId: string): Promise<OpenedSample>;
  openImage(sampleId: string): Promise<{ record: SampleRecord; image: RasterImage }>;
  save(sampleId: string, snapshot: MaskStoreSnapshot): Promise<SampleRecord>;
  updateCalibration(sampleId: string, calibration: Partial<Calibration>): Promise<SampleRecord>;
  delete(sampleId: string): Promise<void>;
  list(): Promise<SampleSummary[]>;
}
