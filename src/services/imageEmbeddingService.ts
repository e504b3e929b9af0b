import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import crypto from 'crypto';

import type { ReferencePhoto } from '../types';
import { ModelUnavailable, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('ImageEmbeddingService');

export type ImageFormat = ReferencePhoto['format'];

export interface EmbeddingModelOptions {
  modelId: string;
  cacheDir?: string;
  localModelPath?: string;
  allowRemoteModels: boolean;
}

/** A loaded model. Shared read-only for the rest of the process. */
export interface EmbeddingModelHandle {
  readonly modelId: string;
  embed(image: Buffer, format: ImageFormat): Promise<Float32Array>;
}

type FeatureExtractor = (input: string) => Promise<{ data: unknown }>;

export type EmbeddingModelFactory = (options: EmbeddingModelOptions) => Promise<EmbeddingModelHandle>;

class TransformersEmbeddingModel implements EmbeddingModelHandle {
  constructor(
    readonly modelId: string,
    private readonly extractor: FeatureExtractor
  ) {}

  async embed(image: Buffer, format: ImageFormat): Promise<Float32Array> {
    // Transformers.js RawImage reads file paths reliably, so go through a temp file.
    const tmpDir = path.join(os.tmpdir(), 'civiceye');
    await fs.mkdir(tmpDir, { recursive: true });

    const filePath = path.join(tmpDir, `${crypto.randomBytes(16).toString('hex')}.${format}`);
    await fs.writeFile(filePath, image);

    try {
      const tensor = await this.extractor(filePath);
      return l2Normalize(toFloat32Array(tensor.data));
    } finally {
      fs.unlink(filePath).catch((error: unknown) => {
        log.warn('Failed to remove temporary image', { filePath, error: describeError(error) });
      });
    }
  }
}

export const loadEmbeddingModel: EmbeddingModelFactory = async (options) => {
  try {
    // Dynamic import keeps the heavy runtime out of processes that never rank.
    const { pipeline, env } = await import('@huggingface/transformers');

    if (options.cacheDir) {
      env.cacheDir = options.cacheDir;
    }
    if (options.localModelPath) {
      env.localModelPath = options.localModelPath;
      env.allowLocalModels = true;
    }
    env.allowRemoteModels = options.allowRemoteModels;

    log.info('Loading image embedding model', {
      modelId: options.modelId,
      localModelPath: options.localModelPath,
      allowRemoteModels: options.allowRemoteModels,
    });
    const extractor: FeatureExtractor = await pipeline('image-feature-extraction', options.modelId);
    return new TransformersEmbeddingModel(options.modelId, extractor);
  } catch (error) {
    throw new ModelUnavailable(options.modelId, error);
  }
};

export type ModelLoaderState = 'idle' | 'loading' | 'ready' | 'unavailable';

/**
 * Loads the embedding model at most once per process. A failed load is kept,
 * so similarity ranking stays disabled instead of retrying on every search.
 */
export class EmbeddingModelLoader {
  private loadPromise: Promise<EmbeddingModelHandle | null> | null = null;
  private currentState: ModelLoaderState = 'idle';
  private lastFailure: ModelUnavailable | null = null;

  constructor(
    private readonly options: EmbeddingModelOptions,
    private readonly factory: EmbeddingModelFactory = loadEmbeddingModel
  ) {}

  get state(): ModelLoaderState {
    return this.currentState;
  }

  get failure(): ModelUnavailable | null {
    return this.lastFailure;
  }

  load(): Promise<EmbeddingModelHandle | null> {
    if (!this.loadPromise) {
      this.currentState = 'loading';
      this.loadPromise = this.factory(this.options).then(
        (handle) => {
          this.currentState = 'ready';
          log.info('Image embedding model ready', { modelId: handle.modelId });
          return handle;
        },
        (error: unknown) => {
          this.currentState = 'unavailable';
          this.lastFailure = error instanceof ModelUnavailable ? error : new ModelUnavailable(this.options.modelId, error);
          log.warn('Similarity ranking disabled', { reason: this.lastFailure.message });
          return null;
        }
      );
    }
    return this.loadPromise;
  }
}

function toFloat32Array(data: unknown): Float32Array {
  if (data instanceof Float32Array) {
    return data;
  }
  if (data instanceof Float64Array) {
    return Float32Array.from(data);
  }
  if (Array.isArray(data) && data.every((value): value is number => typeof value === 'number')) {
    return Float32Array.from(data);
  }
  throw new Error('Embedding model returned a non-numeric tensor');
}

export function l2Normalize(vec: Float32Array): Float32Array {
  let sum = 0;
  for (let i = 0; i < vec.length; i++) {
    const v = vec[i] ?? 0;
    sum += v * v;
  }
  const norm = Math.sqrt(sum) || 1;

  const out = new Float32Array(vec.length);
  for (let i = 0; i < vec.length; i++) {
    out[i] = (vec[i] ?? 0) / norm;
  }
  return out;
}

export function dot(a: Float32Array, b: Float32Array): number {
  const n = Math.min(a.length, b.length);
  let s = 0;
  for (let i = 0; i < n; i++) {
    s += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return s;
}
