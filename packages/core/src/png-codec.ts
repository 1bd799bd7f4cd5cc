/**
 * @module png-codec
 * Minimal PNG encoder/decoder using fflate for zlib compression.
 * Pure JS, with no browser or native image APIs.
 *
 * Encoding always writes 8-bit RGBA. Decoding accepts 8-bit greyscale,
 * greyscale + alpha, RGB and RGBA (non-interlaced), the formats microscope
 * cameras usually export, and always yields RGBA.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { RasterImage } from '@mezo/types';

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Channels per pixel by PNG colour type. */
const CHANNELS: Readonly<Record<number, number>> = { 0: 1, 2: 3, 4: 2, 6: 4 };

/** Write one chunk at `offset`; returns the offset after it. */
function writeChunk(out: Uint8Array, offset: number, type: string, payload: Uint8Array): number {
  write32(out, offset, payload.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(payload, typeStart + 4);
  const end = typeStart + 4 + payload.length;
  write32(out, end, crc32(out, typeStart, end));
  return end + 4;
}

/**
 * Encodes an RGBA raster as a PNG file (filter type 0).
 *
 * @returns PNG file data.
 */
export function encodePng(image: RasterImage): Uint8Array {
  const { data, width, height } = image;
  if (data.length !== width * height * 4) {
    throw new Error(
      `Image data length (${data.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  const rowBytes = width * 4;
  const raw = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    raw.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }
  const compressed = zlibSync(raw);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // colour type: RGBA

  const out = new Uint8Array(8 + 25 + 12 + compressed.length + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = writeChunk(out, 8, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

/**
 * Decodes a PNG file into an RGBA raster.
 *
 * @throws If the signature, header or filter data are invalid, or the format
 *   is not one of the supported 8-bit colour types.
 */
export function decodePng(png: Uint8Array): RasterImage {
  if (png.length < 8 || PNG_SIGNATURE.some((byte, i) => png[i] !== byte)) {
    throw new Error('Invalid PNG signature');
  }

  let width = 0;
  let height = 0;
  let channels = 0;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    const type = String.fromCharCode(png[offset + 4], png[offset + 5], png[offset + 6], png[offset + 7]);
    const start = offset + 8;
    if (start + length + 4 > png.length) {
      throw new Error(`Truncated PNG chunk ${type}`);
    }

    if (type === 'IHDR') {
      width = read32(png, start);
      height = read32(png, start + 4);
      const bitDepth = png[start + 8];
      const colorType = png[start + 9];
      const interlace = png[start + 12];
      if (bitDepth !== 8 || !(colorType in CHANNELS) || interlace !== 0) {
        throw new Error(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}, interlace=${interlace}`,
        );
      }
      channels = CHANNELS[colorType];
    } else if (type === 'IDAT') {
      idatChunks.push(png.subarray(start, start + length));
    } else if (type === 'IEND') {
      break;
    }
    offset = start + length + 4;
  }

  if (width === 0 || height === 0) {
    throw new Error('PNG missing IHDR chunk');
  }

  const combined = new Uint8Array(idatChunks.reduce((sum, c) => sum + c.length, 0));
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  const raw = unzlibSync(combined);
  const rowBytes = width * channels;
  if (raw.length < height * (1 + rowBytes)) {
    throw new Error('PNG image data is truncated');
  }

  // Reverse scanline filters into a packed buffer of `channels` bytes per pixel.
  const packed = new Uint8Array(height * rowBytes);
  for (let y = 0; y < height; y++) {
    const filterType = raw[y * (1 + rowBytes)];
    const src = y * (1 + rowBytes) + 1;
    const dst = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const a = x >= channels ? packed[dst + x - channels] : 0;
      const b = y > 0 ? packed[dst - rowBytes + x] : 0;
      const c = x >= channels && y > 0 ? packed[dst - rowBytes + x - channels] : 0;
      const value = raw[src + x];

      switch (filterType) {
        case 0:
          packed[dst + x] = value;
          break;
        case 1:
          packed[dst + x] = (value + a) & 0xff;
          break;
        case 2:
          packed[dst + x] = (value + b) & 0xff;
          break;
        case 3:
          packed[dst + x] = (value + ((a + b) >> 1)) & 0xff;
          break;
        case 4:
          packed[dst + x] = (value + paethPredictor(a, b, c)) & 0xff;
          break;
        default:
          throw new Error(`Unsupported PNG filter type: ${filterType}`);
      }
    }
  }

  return { width, height, data: expandToRgba(packed, width * height, channels) };
}

/** Convert packed greyscale / grey-alpha / RGB / RGBA pixels to RGBA. */
function expandToRgba(packed: Uint8Array, pixelCount: number, channels: number): Uint8Array {
  if (channels === 4) return packed;
  const rgba = new Uint8Array(pixelCount * 4);
  for (let i = 0; i < pixelCount; i++) {
    const s = i * channels;
    const d = i * 4;
    if (channels === 3) {
      rgba[d] = packed[s];
      rgba[d + 1] = packed[s + 1];
      rgba[d + 2] = packed[s + 2];
      rgba[d + 3] = 255;
    } else {
      rgba[d] = rgba[d + 1] = rgba[d + 2] = packed[s];
      rgba[d + 3] = channels === 2 ? packed[s + 1] : 255;
    }
  }
  return rgba;
}

/**
 * Paeth predictor function used in PNG filter type 4.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}
