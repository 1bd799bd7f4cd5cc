import { describe, it, expect, vi } from 'vitest';
import * as ort from 'onnxruntime-web';
import { createSamOracle } from './provider-factory';

vi.mock('onnxruntime-web', () => {
  const session = {
    run: vi.fn().mockResolvedValue({}),
    release: vi.fn().mockResolvedValue(undefined),
  };
  class Tensor {
    constructor(
      readonly type: string,
      readonly data: Float32Array,
      readonly dims: number[],
    ) {}
  }
  return {
    InferenceSession: { create: vi.fn().mockResolvedValue(session) },
    Tensor,
  };
});

describe('createSamOracle', () => {
  it('should load the default models through onnxruntime-web', async () => {
    const oracle = createSamOracle();
    await oracle.initialize();

    expect(vi.mocked(ort.InferenceSession.create)).toHaveBeenCalledWith('/models/mobile_sam_encoder.onnx');
    expect(vi.mocked(ort.InferenceSession.create)).toHaveBeenCalledWith('/models/mobile_sam_decoder.onnx');
  });

  it('should honour custom model paths', async () => {
    const oracle = createSamOracle({
      encoderModelPath: '/data/enc.onnx',
      decoderModelPath: '/data/dec.onnx',
    });
    await oracle.initialize();

    expect(vi.mocked(ort.InferenceSession.create)).toHaveBeenCalledWith('/data/enc.onnx');
  });

  it('should not load the runtime before it is needed', () => {
    const oracle = createSamOracle();
    expect(oracle.isLoaded).toBe(false);
  });
});
