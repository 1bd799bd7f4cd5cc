/**
 * @module snapshot-codec
 * Persisted form of a Mask Store snapshot: a ZIP container holding a single
 * `manifest.json` with run-length encoded masks.
 *
 * The manifest names its format and version, and the ZIP entry carries a
 * CRC, so any damaged or foreign file is reported as a {@link CorruptStateError}
 * rather than decoded into a wrong state.
 *
 * Dependencies:
 * - fflate: ZIP compression/decompression (sync API)
 */

import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';
import type { Mask, MaskStoreSnapshot, Rect, Size } from '@mezo/types';
import { isMaskLabel } from './categories';
import { CorruptStateError, InvalidMaskError } from './errors';
import { bitmapArea } from './mask-geometry';
import { decodeRle, encodeRle } from './mask-encoding';
import { validateSnapshot } from './mask-store';

/** Identifies Mezo mask snapshots. */
export const SNAPSHOT_FORMAT = 'mezo-mask-store';
/** Current snapshot manifest version. */
export const SNAPSHOT_VERSION = 1;

const MANIFEST_ENTRY = 'manifest.json';

/** A mask as written to the manifest. */
interface PersistedMask {
  id: string;
  source: Mask['source'];
  confidence?: number;
  label: Mask['label'];
  order: number;
  bounds: Rect;
  runs: number[];
}

/** Top-level manifest. */
interface SnapshotManifest {
  format: typeof SNAPSHOT_FORMAT;
  version: number;
  width: number;
  height: number;
  nextOrder: number;
  activeId: string | null;
  masks: PersistedMask[];
}

/**
 * Serializes a snapshot into the persisted container.
 *
 * @returns ZIP file data.
 */
export function encodeSnapshot(snapshot: MaskStoreSnapshot): Uint8Array {
  const manifest: SnapshotManifest = {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    width: snapshot.width,
    height: snapshot.height,
    nextOrder: snapshot.nextOrder,
    activeId: snapshot.activeId,
    masks: snapshot.masks.map((mask) => {
      const { bounds, runs } = encodeRle(mask.bitmap);
      return {
        id: mask.id,
        source: mask.source,
        ...(mask.source === 'oracle' ? { confidence: mask.confidence } : {}),
        label: mask.label,
        order: mask.order,
        bounds,
        runs,
      };
    }),
  };

  return zipSync({ [MANIFEST_ENTRY]: strToU8(JSON.stringify(manifest)) });
}

// ── Manifest parsing ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new CorruptStateError(`Snapshot field "${key}" must be a number`);
  }
  return value;
}

function readString(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new CorruptStateError(`Snapshot field "${key}" must be a string`);
  }
  return value;
}

function readBounds(value: unknown): Rect {
  if (!isRecord(value)) {
    throw new CorruptStateError('Mask bounds are missing');
  }
  return {
    x: readNumber(value, 'x'),
    y: readNumber(value, 'y'),
    width: readNumber(value, 'width'),
    height: readNumber(value, 'height'),
  };
}

function readMask(value: unknown, image: Size): Mask {
  if (!isRecord(value)) {
    throw new CorruptStateError('Mask entry must be an object');
  }
  const id = readString(value, 'id');
  const label = value['label'];
  if (!isMaskLabel(label)) {
    throw new CorruptStateError(`Mask ${id} has an unknown label`);
  }
  const runs = value['runs'];
  if (!Array.isArray(runs) || !runs.every((r): r is number => typeof r === 'number')) {
    throw new CorruptStateError(`Mask ${id} has invalid runs`);
  }

  const bounds = readBounds(value['bounds']);
  if (bounds.x < 0 || bounds.y < 0 || bounds.x + bounds.width > image.width || bounds.y + bounds.height > image.height) {
    throw new CorruptStateError(`Mask ${id} extends outside the image`);
  }
  const bitmap = decodeRle({ bounds, runs });
  const base = {
    id,
    label,
    order: readNumber(value, 'order'),
    bitmap,
    area: bitmapArea(bitmap),
  };

  const source = value['source'];
  if (source === 'oracle') {
    return { ...base, source, confidence: readNumber(value, 'confidence') };
  }
  if (source === 'manual-edit') {
    return { ...base, source };
  }
  throw new CorruptStateError(`Mask ${id} has an unknown source`);
}

function readManifest(value: unknown, expected: Size | undefined): MaskStoreSnapshot {
  if (!isRecord(value)) {
    throw new CorruptStateError('Snapshot manifest must be an object');
  }
  if (value['format'] !== SNAPSHOT_FORMAT) {
    throw new CorruptStateError('Not a Mezo mask snapshot');
  }
  const version = readNumber(value, 'version');
  if (version !== SNAPSHOT_VERSION) {
    throw new CorruptStateError(`Unsupported snapshot version ${version}`);
  }
  const activeId = value['activeId'];
  if (activeId !== null && typeof activeId !== 'string') {
    throw new CorruptStateError('Snapshot field "activeId" must be a string or null');
  }
  const masks = value['masks'];
  if (!Array.isArray(masks)) {
    throw new CorruptStateError('Snapshot field "masks" must be an array');
  }
  const image = { width: readNumber(value, 'width'), height: readNumber(value, 'height') };
  if (expected && (image.width !== expected.width || image.height !== expected.height)) {
    throw new CorruptStateError(
      `Mask snapshot is ${image.width}x${image.height}, image is ${expected.width}x${expected.height}`,
    );
  }

  return {
    ...image,
    nextOrder: readNumber(value, 'nextOrder'),
    activeId,
    masks: masks.map((mask) => readMask(mask, image)),
  };
}

/**
 * Decodes a persisted snapshot.
 *
 * @param expected - Size of the image the snapshot belongs to, when known.
 * @throws {CorruptStateError} If the data is not a valid snapshot container,
 *   the snapshot is for another image size, or it violates a Mask Store
 *   invariant.
 */
export function decodeSnapshot(data: Uint8Array, expected?: Size): MaskStoreSnapshot {
  let manifestJson: string;
  try {
    const entry = unzipSync(data)[MANIFEST_ENTRY];
    if (!entry) {
      throw new CorruptStateError('Snapshot is missing manifest.json');
    }
    manifestJson = strFromU8(entry);
  } catch (err) {
    if (err instanceof CorruptStateError) throw err;
    throw new CorruptStateError('Snapshot is not a readable archive', { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(manifestJson);
  } catch (err) {
    throw new CorruptStateError('Snapshot manifest is not valid JSON', { cause: err });
  }

  try {
    const snapshot = readManifest(parsed, expected);
    validateSnapshot(snapshot);
    return snapshot;
  } catch (err) {
    if (err instanceof CorruptStateError) throw err;
    if (err instanceof InvalidMaskError) {
      throw new CorruptStateError(`Snapshot is inconsistent: ${err.message}`, { cause: err });
    }
    throw new CorruptStateError('Snapshot could not be decoded', { cause: err });
  }
}
