import { Injectable } from '@nestjs/common';
import { EmbeddingError } from '../../common/errors/skyvision.errors';
import { isNumberArray } from '../../common/utils/vector.util';

export const CLIP_BACKEND_LOADER = Symbol('CLIP_BACKEND_LOADER');

/**
 * A loaded multimodal model. Text and image vectors come out of the same
 * projection space, so they can be compared with each other.
 */
export interface ClipBackend {
  readonly modelName: string;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedImage(data: Uint8Array): Promise<number[]>;
}

export interface ClipBackendLoader {
  load(modelName: string): Promise<ClipBackend>;
}

type Invoke = (...args: unknown[]) => unknown;

// transformers.js tokenizers, processors and models are callable objects
function callable(value: unknown, what: string): Invoke {
  if (typeof value !== 'function') {
    throw new EmbeddingError(`${what} is not callable`);
  }
  return (...args: unknown[]) => Reflect.apply(value, undefined, args);
}

@Injectable()
export class TransformersClipLoader implements ClipBackendLoader {
  async load(modelName: string): Promise<ClipBackend> {
    // Dynamic import of @xenova/transformers (ES Module); processes that never embed skip onnxruntime
    const {
      AutoProcessor,
      AutoTokenizer,
      CLIPTextModelWithProjection,
      CLIPVisionModelWithProjection,
      RawImage,
    } = await import('@xenova/transformers');

    // Downloads the ONNX weights on first use, cached afterwards
    const [tokenizer, processor, textModel, visionModel] = await Promise.all([
      AutoTokenizer.from_pretrained(modelName),
      AutoProcessor.from_pretrained(modelName),
      CLIPTextModelWithProjection.from_pretrained(modelName, { quantized: true }),
      CLIPVisionModelWithProjection.from_pretrained(modelName, { quantized: true }),
    ]);
    const tokenize = callable(tokenizer, 'tokenizer');
    const preprocess = callable(processor, 'processor');
    const runText = callable(textModel, 'text model');
    const runVision = callable(visionModel, 'vision model');

    return {
      modelName,
      async embedTexts(texts: string[]): Promise<number[][]> {
        const inputs = tokenize(texts, { padding: true, truncation: true });
        const output: unknown = await runText(inputs);
        return readEmbeddings(output, 'text_embeds');
      },
      async embedImage(data: Uint8Array): Promise<number[]> {
        const image = await RawImage.fromBlob(new Blob([data]));
        const inputs: unknown = await preprocess(image);
        const output: unknown = await runVision(inputs);
        const [vector] = readEmbeddings(output, 'image_embeds');
        if (!vector) {
          throw new EmbeddingError('Vision model returned no embedding');
        }
        return vector;
      },
    };
  }
}

function readEmbeddings(output: unknown, key: 'text_embeds' | 'image_embeds'): number[][] {
  if (typeof output !== 'object' || output === null || !(key in output)) {
    throw new EmbeddingError(`Model output has no ${key}`);
  }
  const tensor: unknown = Reflect.get(output, key);
  if (
    typeof tensor !== 'object' ||
    tensor === null ||
    !('tolist' in tensor) ||
    typeof tensor.tolist !== 'function'
  ) {
    throw new EmbeddingError(`Model output ${key} is not a tensor`);
  }
  const rows: unknown = tensor.tolist();
  if (!Array.isArray(rows) || !rows.every(isNumberArray)) {
    throw new EmbeddingError(`Model output ${key} is not a matrix of numbers`);
  }
  return rows;
}
