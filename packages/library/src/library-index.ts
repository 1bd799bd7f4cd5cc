/**
 * @module library-index
 * File-based sample library.
 *
 * Layout of the data directory:
 * ```
 * {root}/samples/{sampleId}/record.json   sample metadata
 * {root}/samples/{sampleId}/image.png     source image
 * {root}/samples/{sampleId}/masks.mezo    mask snapshot (after the first save)
 * ```
 *
 * Every file is replaced atomically (temp file, fsync, rename). Reads and
 * mutations of one sample run one at a time, so an open sees a record and
 * snapshot written by the same save; adds are serialized library-wide so
 * that names stay unique.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  Calibration,
  LibraryIndex,
  MaskStoreSnapshot,
  NewSample,
  OpenedSample,
  RasterImage,
  SampleRecord,
  SampleSummary,
} from '@mezo/types';
import {
  CorruptStateError,
  DEFAULT_CALIBRATION,
  DuplicateNameError,
  InvalidMaskError,
  NotFoundError,
  assertCalibration,
  decodePng,
  decodeSnapshot,
  encodePng,
  encodeSnapshot,
  generateId,
} from '@mezo/core';

const SAMPLES_DIR = 'samples';
const RECORD_FILE = 'record.json';
const IMAGE_FILE = 'image.png';
const SNAPSHOT_FILE = 'masks.mezo';

/** Queue key for library-wide operations. */
const INDEX_KEY = '';

/** Sample ids double as directory names. */
const SAMPLE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Options for {@link FileLibraryIndex}. */
export interface FileLibraryIndexOptions {
  /** Clock used for timestamps. */
  now?: () => Date;
  /** Id factory for new samples. */
  createId?: () => string;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate the parsed contents of a record file. */
function parseRecord(value: unknown): SampleRecord {
  if (!isRecord(value) || !isRecord(value['calibration'])) {
    throw new Error('record is not an object');
  }
  const { id, name, description, imageFile, width, height, createdAt, lastModified, hasSnapshot } = value;
  const { pixels, micrometers, porosity } = value['calibration'];
  if (
    typeof id !== 'string' ||
    typeof name !== 'string' ||
    typeof description !== 'string' ||
    typeof imageFile !== 'string' ||
    typeof width !== 'number' ||
    typeof height !== 'number' ||
    typeof createdAt !== 'string' ||
    typeof lastModified !== 'string' ||
    typeof hasSnapshot !== 'boolean' ||
    typeof pixels !== 'number' ||
    typeof micrometers !== 'number' ||
    typeof porosity !== 'number'
  ) {
    throw new Error('record has missing or mistyped fields');
  }
  return {
    id,
    name,
    description,
    imageFile,
    width,
    height,
    createdAt,
    lastModified,
    hasSnapshot,
    calibration: { pixels, micrometers, porosity },
  };
}

function toSummary(record: SampleRecord): SampleSummary {
  const { id, name, description, createdAt, lastModified, hasSnapshot } = record;
  return { id, name, description, createdAt, lastModified, hasSnapshot };
}

/**
 * Write a file atomically: the data goes to a temp file beside the target,
 * is flushed to disk, then renamed over the target.
 */
async function writeFileAtomic(file: string, data: Uint8Array | string): Promise<void> {
  const tmp = `${file}.${generateId()}.tmp`;
  try {
    const handle = await fs.open(tmp, 'w');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * {@link LibraryIndex} over a directory on disk.
 *
 * Usage:
 * ```ts
 * const library = new FileLibraryIndex('/data/mezo');
 * const record = await library.add({ name: 'Pitch A-12', image });
 * const { snapshot } = await library.open(record.id);
 * await library.save(record.id, store.snapshot());
 * ```
 */
export class FileLibraryIndex implements LibraryIndex {
  readonly rootDir: string;
  private readonly now: () => Date;
  private readonly createId: () => string;
  private readonly queues = new Map<string, Promise<void>>();

  constructor(rootDir: string, options: FileLibraryIndexOptions = {}) {
    this.rootDir = rootDir;
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? generateId;
  }

  /**
   * Add a sample and store its image.
   *
   * @throws {DuplicateNameError} If another sample has the same name.
   * @throws {RangeError} If the name is empty or the calibration is invalid.
   */
  add(sample: NewSample): Promise<SampleRecord> {
    const name = sample.name.trim();
    if (name.length === 0) {
      return Promise.reject(new RangeError('Sample name must not be empty'));
    }
    const calibration: Calibration = { ...DEFAULT_CALIBRATION, ...sample.calibration };
    try {
      assertCalibration(calibration);
    } catch (err) {
      return Promise.reject(err);
    }

    return this.serialize(INDEX_KEY, async () => {
      const existing = await this.readAllRecords();
      if (existing.some((r) => r.name === name)) {
        throw new DuplicateNameError(name);
      }

      const png = encodePng(sample.image);
      const id = this.createId();
      const timestamp = this.now().toISOString();
      const record: SampleRecord = {
        id,
        name,
        description: sample.description ?? '',
        imageFile: IMAGE_FILE,
        width: sample.image.width,
        height: sample.image.height,
        createdAt: timestamp,
        lastModified: timestamp,
        hasSnapshot: false,
        calibration,
      };

      const dir = this.sampleDir(id);
      await fs.mkdir(dir, { recursive: true });
      try {
        await writeFileAtomic(path.join(dir, IMAGE_FILE), png);
        await this.writeRecord(record);
      } catch (err) {
        await fs.rm(dir, { recursive: true, force: true });
        throw err;
      }
      return record;
    });
  }

  /**
   * Load a sample with its image and mask snapshot.
   *
   * @throws {NotFoundError} If the id is unknown.
   * @throws {CorruptStateError} If the record, image or snapshot is unreadable.
   */
  open(sampleId: string): Promise<OpenedSample> {
    return this.serialize(sampleId, () => this.readSample(sampleId));
  }

  /**
   * Load a sample's image without its snapshot.
   *
   * @throws {NotFoundError} If the id is unknown.
   * @throws {CorruptStateError} If the record or image is unreadable.
   */
  openImage(sampleId: string): Promise<{ record: SampleRecord; image: RasterImage }> {
    return this.serialize(sampleId, () => this.readImage(sampleId));
  }

  private async readSample(sampleId: string): Promise<OpenedSample> {
    const { record, image } = await this.readImage(sampleId);
    if (!record.hasSnapshot) {
      return { record, image, snapshot: null };
    }

    let data: Uint8Array;
    try {
      data = await fs.readFile(path.join(this.sampleDir(sampleId), SNAPSHOT_FILE));
    } catch (err) {
      throw new CorruptStateError(`Mask snapshot of sample ${sampleId} is missing`, { cause: err });
    }
    const snapshot = decodeSnapshot(data, { width: record.width, height: record.height });
    return { record, image, snapshot };
  }

  private async readImage(sampleId: string): Promise<{ record: SampleRecord; image: RasterImage }> {
    const record = await this.readRecord(sampleId);
    let image: RasterImage;
    try {
      image = decodePng(await fs.readFile(path.join(this.sampleDir(sampleId), record.imageFile)));
    } catch (err) {
      throw new CorruptStateError(`Image of sample ${sampleId} is unreadable`, { cause: err });
    }
    if (image.width !== record.width || image.height !== record.height) {
      throw new CorruptStateError(`Image of sample ${sampleId} does not match its record`);
    }
    return { record, image };
  }

  /**
   * Persist a mask snapshot. Saves to one sample are applied in call order.
   *
   * @returns The updated record.
   * @throws {NotFoundError} If the id is unknown.
   * @throws {InvalidMaskError} If the snapshot is for another image size.
   */
  save(sampleId: string, snapshot: MaskStoreSnapshot): Promise<SampleRecord> {
    return this.serialize(sampleId, async () => {
      const record = await this.readRecord(sampleId);
      if (snapshot.width !== record.width || snapshot.height !== record.height) {
        throw new InvalidMaskError(
          `Snapshot is ${snapshot.width}x${snapshot.height}, sample is ${record.width}x${record.height}`,
        );
      }

      await writeFileAtomic(path.join(this.sampleDir(sampleId), SNAPSHOT_FILE), encodeSnapshot(snapshot));
      const updated: SampleRecord = {
        ...record,
        hasSnapshot: true,
        lastModified: this.now().toISOString(),
      };
      await this.writeRecord(updated);
      return updated;
    });
  }

  /**
   * Change the scale and/or porosity of a sample.
   *
   * @throws {NotFoundError} If the id is unknown.
   * @throws {RangeError} If the resulting calibration is invalid.
   */
  updateCalibration(sampleId: string, calibration: Partial<Calibration>): Promise<SampleRecord> {
    return this.serialize(sampleId, async () => {
      const record = await this.readRecord(sampleId);
      const merged: Calibration = { ...record.calibration, ...calibration };
      assertCalibration(merged);
      const updated: SampleRecord = {
        ...record,
        calibration: merged,
        lastModified: this.now().toISOString(),
      };
      await this.writeRecord(updated);
      return updated;
    });
  }

  /**
   * Remove a sample with its image and snapshot.
   * @throws {NotFoundError} If the id is unknown.
   */
  delete(sampleId: string): Promise<void> {
    return this.serialize(sampleId, async () => {
      await this.readRecord(sampleId);
      await fs.rm(this.sampleDir(sampleId), { recursive: true, force: true });
    });
  }

  /** Summaries of every sample, oldest first. */
  async list(): Promise<SampleSummary[]> {
    const records = await this.readAllRecords();
    return records
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.name.localeCompare(b.name))
      .map(toSummary);
  }

  // ── Internals ──

  private sampleDir(sampleId: string): string {
    return path.join(this.rootDir, SAMPLES_DIR, sampleId);
  }

  private async readRecord(sampleId: string): Promise<SampleRecord> {
    if (!SAMPLE_ID_PATTERN.test(sampleId)) {
      throw new NotFoundError('sample', sampleId);
    }

    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.sampleDir(sampleId), RECORD_FILE), 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new NotFoundError('sample', sampleId);
      }
      throw err;
    }

    try {
      const record = parseRecord(JSON.parse(raw));
      if (record.id !== sampleId) {
        throw new Error(`record belongs to ${record.id}`);
      }
      return record;
    } catch (err) {
      throw new CorruptStateError(`Record of sample ${sampleId} is unreadable`, { cause: err });
    }
  }

  private writeRecord(record: SampleRecord): Promise<void> {
    return writeFileAtomic(path.join(this.sampleDir(record.id), RECORD_FILE), JSON.stringify(record, null, 2));
  }

  /** Every readable record; unreadable entries are logged and skipped. */
  private async readAllRecords(): Promise<SampleRecord[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(path.join(this.rootDir, SAMPLES_DIR));
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const records: SampleRecord[] = [];
    for (const entry of entries) {
      try {
        records.push(await this.readRecord(entry));
      } catch (err) {
        if (!(err instanceof NotFoundError || err instanceof CorruptStateError)) throw err;
        console.warn(`[library] Skipping sample directory "${entry}":`, err.message);
      }
    }
    return records;
  }

  /** Run `task` after every earlier task queued under the same key. */
  private serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, settled);
    void settled.then(() => {
      if (this.queues.get(key) === settled) this.queues.delete(key);
    });
    return run;
  }
}
