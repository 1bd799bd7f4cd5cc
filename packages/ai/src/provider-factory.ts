import type { Tensor } from 'onnxruntime-web';
import { SamOracle, type OnnxRuntime, type OnnxSession, type OnnxTensor } from './sam-oracle';

export interface CreateSamOracleOptions {
  runtime?: 'onnx';
  encoderModelPath?: string;
  decoderModelPath?: string;
  autoGridSize?: number;
}

const DEFAULT_ENCODER_MODEL_PATH = '/models/mobile_sam_encoder.onnx';
const DEFAULT_DECODER_MODEL_PATH = '/models/mobile_sam_decoder.onnx';

async function createOnnxRuntime(): Promise<OnnxRuntime> {
  // Loaded on first prediction so that importing @mezo/ai stays cheap.
  const ort = await import('onnxruntime-web');
  return {
    async createSession(modelPath: string): Promise<OnnxSession> {
      const session = await ort.InferenceSession.create(modelPath);
      return {
        run: async (feeds: Record<string, OnnxTensor>): Promise<Record<string, OnnxTensor>> => {
          const outputs = await session.run(feeds as unknown as Record<string, Tensor>);
          return outputs as unknown as Record<string, OnnxTensor>;
        },
        release: async (): Promise<void> => {
          await session.release();
        },
      };
    },
    createTensor(type: 'float32', data: Float32Array, dims: number[]): OnnxTensor {
      return new ort.Tensor(type, data, dims) as unknown as OnnxTensor;
    },
  };
}

export function createSamOracle(options: CreateSamOracleOptions = {}): SamOracle {
  const runtime = options.runtime ?? 'onnx';
  if (runtime !== 'onnx') {
    throw new Error(`Unsupported segmentation runtime: ${String(runtime)}`);
  }

  return new SamOracle({
    encoderModelPath: options.encoderModelPath ?? DEFAULT_ENCODER_MODEL_PATH,
    decoderModelPath: options.decoderModelPath ?? DEFAULT_DECODER_MODEL_PATH,
    loadRuntime: createOnnxRuntime,
    autoGridSize: options.autoGridSize,
  });
}
