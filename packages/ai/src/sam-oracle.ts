/**
 * @module sam-oracle
 * Segment-Anything style oracle running an encoder/decoder pair of ONNX models.
 *
 * Architecture:
 * - Encoder: Runs once per image (1024x1024 RGB → image embeddings)
 * - Decoder: Runs per prompt (points/box + embeddings → mask logits + IoU scores)
 *
 * Model files required:
 * - an image encoder (e.g. `mobile_sam_encoder.onnx`)
 * - a prompt decoder with mask head (e.g. `mobile_sam_decoder.onnx`)
 *
 * @see {@link @mezo/types!SegmentationOracle}
 */

import type {
  OracleRequest,
  RasterImage,
  RawProposal,
  SegmentationOracle,
  Size,
} from '@mezo/types';
import {
  preprocessImage,
  promptToPoints,
  gridPoints,
  createPointTensors,
  postprocessMask,
  calculateConfidence,
  SAM_INPUT_SIZE,
  SAM_LABEL,
  type SamPoint,
} from './image-utils';

/** ONNX Runtime session interface (duck-typed for testability). */
export interface OnnxSession {
  run(feeds: Record<string, OnnxTensor>): Promise<Record<string, OnnxTensor>>;
  release(): Promise<void>;
}

/** ONNX tensor interface. */
export interface OnnxTensor {
  data: Float32Array;
  dims: readonly number[];
}

/** Factory for creating ONNX sessions and tensors. */
export interface OnnxRuntime {
  createSession(modelPath: string): Promise<OnnxSession>;
  createTensor(type: 'float32', data: Float32Array, dims: number[]): OnnxTensor;
}

/** Configuration for the SAM oracle. */
export interface SamOracleConfig {
  /** Path to the encoder ONNX model. */
  encoderModelPath: string;
  /** Path to the decoder ONNX model. */
  decoderModelPath: string;
  /** ONNX Runtime implementation, resolved on first use. */
  loadRuntime: () => Promise<OnnxRuntime>;
  /** Points per side of the grid used for `auto` prompts (default 4). */
  autoGridSize?: number;
}

interface Sessions {
  onnx: OnnxRuntime;
  encoder: OnnxSession;
  decoder: OnnxSession;
}

interface Embedding {
  image: RasterImage;
  tensor: OnnxTensor;
  resizedSize: Size;
}

const DEFAULT_AUTO_GRID_SIZE = 4;

/**
 * SAM segmentation oracle.
 *
 * Usage:
 * ```ts
 * const oracle = new SamOracle(config);
 * const proposals = await oracle.predict({
 *   image,
 *   prompt: { kind: 'point', position: { x: 400, y: 300 }, label: 'foreground' },
 * });
 * ```
 */
export class SamOracle implements SegmentationOracle {
  private config: SamOracleConfig;
  private sessions: Promise<Sessions> | null = null;
  private embedding: Embedding | null = null;

  constructor(config: SamOracleConfig) {
    if (config.autoGridSize !== undefined && !(Number.isInteger(config.autoGridSize) && config.autoGridSize > 0)) {
      throw new RangeError('autoGridSize must be a positive integer');
    }
    this.config = config;
  }

  /** Whether the models have been requested. */
  get isLoaded(): boolean {
    return this.sessions !== null;
  }

  /** Load encoder and decoder models. Called implicitly by the first prediction. */
  async initialize(): Promise<void> {
    await this.load();
  }

  private load(): Promise<Sessions> {
    if (!this.sessions) {
      const { loadRuntime, encoderModelPath, decoderModelPath } = this.config;
      const loading = (async () => {
        const onnx = await loadRuntime();
        const encoder = await onnx.createSession(encoderModelPath);
        const decoder = await onnx.createSession(decoderModelPath);
        return { onnx, encoder, decoder };
      })();
      // A failed load is retried by the next call.
      void loading.catch((err: unknown) => {
        console.warn('[oracle] Failed to load segmentation models:', err);
        if (this.sessions === loading) this.sessions = null;
      });
      this.sessions = loading;
    }
    return this.sessions;
  }

  /** @inheritdoc */
  async predict(request: OracleRequest, signal?: AbortSignal): Promise<RawProposal[]> {
    signal?.throwIfAborted();
    const sessions = await this.load();
    signal?.throwIfAborted();
    const embedding = await this.embed(sessions, request.image);

    const { prompt, image } = request;
    const pointSets: SamPoint[][] =
      prompt.kind === 'auto'
        ? gridPoints(image, this.config.autoGridSize ?? DEFAULT_AUTO_GRID_SIZE).map((p) => [
            { ...p, label: SAM_LABEL.foreground },
            { x: 0, y: 0, label: SAM_LABEL.padding },
          ])
        : [promptToPoints(prompt)];

    const proposals: RawProposal[] = [];
    for (const points of pointSets) {
      signal?.throwIfAborted();
      proposals.push(...(await this.decode(sessions, embedding, points)));
    }
    return proposals;
  }

  /** Run the encoder, reusing the embedding when the image has not changed. */
  private async embed(sessions: Sessions, image: RasterImage): Promise<Embedding> {
    if (this.embedding?.image === image) {
      return this.embedding;
    }

    const { tensor, resizedSize } = preprocessImage(image);
    const input = sessions.onnx.createTensor('float32', tensor, [1, 3, SAM_INPUT_SIZE, SAM_INPUT_SIZE]);
    const result = await sessions.encoder.run({ image: input });
    const embedded = result['image_embeddings'] ?? result['output'];
    if (!embedded) {
      throw new Error('Encoder produced no image embeddings');
    }

    this.embedding = { image, tensor: embedded, resizedSize };
    return this.embedding;
  }

  /** Run the decoder for one point set; every emitted mask becomes a proposal. */
  private async decode(
    sessions: Sessions,
    embedding: Embedding,
    points: readonly SamPoint[],
  ): Promise<RawProposal[]> {
    const { onnx, decoder } = sessions;
    const originalSize = { width: embedding.image.width, height: embedding.image.height };
    const { coords, labels } = createPointTensors(points, originalSize, embedding.resizedSize);

    const feeds: Record<string, OnnxTensor> = {
      image_embeddings: embedding.tensor,
      point_coords: onnx.createTensor('float32', coords, [1, points.length, 2]),
      point_labels: onnx.createTensor('float32', labels, [1, points.length]),
      has_mask_input: onnx.createTensor('float32', new Float32Array([0]), [1]),
      mask_input: onnx.createTensor('float32', new Float32Array(256 * 256), [1, 1, 256, 256]),
      orig_im_size: onnx.createTensor(
        'float32',
        new Float32Array([originalSize.height, originalSize.width]),
        [2],
      ),
    };

    const result = await decoder.run(feeds);

    const keys = Object.keys(result);
    const masksKey = 'masks' in result ? 'masks' : (keys.find((k) => k.includes('mask')) ?? keys[0]);
    const scoresKey = keys.find((k) => k.includes('iou') || k.includes('score'));
    const masks = result[masksKey];
    if (!masks) {
      throw new Error('Decoder produced no masks');
    }
    const scores = scoresKey ? result[scoresKey]?.data : undefined;

    const dims = masks.dims;
    const maskSize = { width: dims[dims.length - 1], height: dims[dims.length - 2] };
    const plane = maskSize.width * maskSize.height;
    const count = plane > 0 ? Math.floor(masks.data.length / plane) : 0;

    const proposals: RawProposal[] = [];
    for (let n = 0; n < count; n++) {
      const logits = masks.data.subarray(n * plane, (n + 1) * plane);
      proposals.push({
        mask: { kind: 'dense', data: postprocessMask(logits, maskSize, originalSize), size: originalSize },
        score: scores?.[n] ?? calculateConfidence(logits),
      });
    }
    return proposals;
  }

  /** Release ONNX sessions and the cached embedding. */
  async dispose(): Promise<void> {
    const pending = this.sessions;
    this.sessions = null;
    this.embedding = null;
    if (pending) {
      const { encoder, decoder } = await pending;
      await Promise.all([encoder.release(), decoder.release()]);
    }
  }
}
