import type { MapThumbnail, ReferencePhoto, SimilarityScore } from '../types';
import { describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { EmbeddingModelHandle, ImageFormat, dot, l2Normalize } from './imageEmbeddingService';

const logger = createLogger('SimilarityRanker');

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimensions differ (${a.length} vs ${b.length})`);
  }
  const score = dot(l2Normalize(a), l2Normalize(b));
  return Math.min(1, Math.max(-1, score));
}

/**
 * Stable sort, highest score first. Items without a score keep their relative
 * order after every scored item.
 */
export function rankBySimilarity<T>(items: readonly T[], scoreOf: (item: T) => number | undefined): T[] {
  return items
    .map((item, index) => ({ item, index, score: scoreOf(item) }))
    .sort((a, b) => {
      if (a.score === undefined && b.score === undefined) {
        return a.index - b.index;
      }
      if (a.score === undefined) {
        return 1;
      }
      if (b.score === undefined) {
        return -1;
      }
      return b.score - a.score || a.index - b.index;
    })
    .map(({ item }) => item);
}

export type ScoringOutcome =
  | { status: 'scored'; scores: Map<string, SimilarityScore> }
  | { status: 'reference_failed'; reason: string };

export class SimilarityRanker {
  constructor(private readonly model: EmbeddingModelHandle) {}

  get modelId(): string {
    return this.model.modelId;
  }

  async score(reference: ReferencePhoto, thumbnails: readonly MapThumbnail[]): Promise<ScoringOutcome> {
    let referenceEmbedding: Float32Array;
    try {
      referenceEmbedding = await this.model.embed(reference.bytes, reference.format);
    } catch (error) {
      const reason = describeError(error);
      logger.warn('Failed to embed reference photo', { reason });
      return { status: 'reference_failed', reason };
    }

    const results = await Promise.all(
      thumbnails.map(async (thumbnail): Promise<SimilarityScore | null> => {
        try {
          const embedding = await this.model.embed(thumbnail.imageBytes, formatFromContentType(thumbnail.contentType));
          return { sourceRecordId: thumbnail.sourceRecordId, score: cosineSimilarity(referenceEmbedding, embedding) };
        } catch (error) {
          logger.warn('Failed to embed map thumbnail', {
            recordId: thumbnail.sourceRecordId,
            error: describeError(error),
          });
          return null;
        }
      })
    );

    const scores = new Map<string, SimilarityScore>();
    for (const result of results) {
      if (result) {
        scores.set(result.sourceRecordId, result);
      }
    }
    logger.info('Similarity scores computed', { modelId: this.model.modelId, scored: scores.size, candidates: thumbnails.length });
    return { status: 'scored', scores };
  }
}

function formatFromContentType(contentType: string): ImageFormat {
  return contentType === 'image/jpeg' || contentType === 'image/jpg' ? 'jpg' : 'png';
}
