import type {
  AddressQueryInput,
  AddressQueryRequest,
  AddressRecord,
  MapThumbnail,
  ReferencePhoto,
  ResultEntry,
  SearchResult,
} from '../types';
import { ThumbnailUnavailable, describeError } from '../utils/errors';
import { distanceBetween, externalMapUrl } from '../utils/location';
import { createLogger } from '../utils/logger';
import type { AddressLookupCache } from './addressLookupCache';
import type { CredentialStore } from './credentialStore';
import type { EmbeddingModelLoader } from './imageEmbeddingService';
import type { MapThumbnailService } from './mapThumbnailService';
import { AddressLookup, validateAddressQuery } from './overpassAddressService';
import { SimilarityRanker, rankBySimilarity } from './similarityRanker';

const logger = createLogger('SearchPresenter');

export const NO_MATCHES_WARNING = 'No addresses found for that postal code and house number combination.';
export const SIMILARITY_DISABLED_WARNING =
  'Visual similarity is unavailable: the image embedding model could not be loaded. Results are shown in query order.';
export const REFERENCE_NOT_SCORED_WARNING =
  'The reference photo could not be compared with the map images. Results are shown in query order.';

export interface SearchPresenterOptions {
  addressLookup: AddressLookup;
  thumbnails: MapThumbnailService;
  postalCodePattern: RegExp;
  modelLoader?: EmbeddingModelLoader;
  cache?: AddressLookupCache;
  credentialStore?: CredentialStore;
}

export class SearchPresenter {
  private thumbnails: MapThumbnailService;
  private similarityWarningIssued = false;

  constructor(private readonly options: SearchPresenterOptions) {
    this.thumbnails = options.thumbnails;
  }

  async search(input: AddressQueryInput, referencePhoto?: ReferencePhoto): Promise<SearchResult> {
    const request = validateAddressQuery(input, this.options.postalCodePattern);
    const warnings: string[] = [];

    const records = await this.options.addressLookup.findAddresses(request);
    if (records.length === 0) {
      return { request, entries: [], rankedBySimilarity: false, warnings: [NO_MATCHES_WARNING], photoLocation: referencePhoto?.location };
    }

    const entries = await Promise.all(records.map((record) => this.buildEntry(record, referencePhoto)));

    let rankedBySimilarity = false;
    if (referencePhoto) {
      const ranker = await this.loadRanker();
      if (!ranker) {
        if (!this.similarityWarningIssued) {
          this.similarityWarningIssued = true;
          warnings.push(SIMILARITY_DISABLED_WARNING);
        }
      } else {
        rankedBySimilarity = await this.applySimilarity(ranker, referencePhoto, entries, warnings);
      }
    }

    const ordered = rankedBySimilarity ? rankBySimilarity(entries, (entry) => entry.similarity?.score) : entries;

    logger.info('Search finished', {
      postalCode: request.postalCode,
      houseNumber: request.houseNumber,
      results: ordered.length,
      withThumbnail: ordered.filter((entry) => entry.thumbnail).length,
      rankedBySimilarity,
    });

    return { request, entries: ordered, rankedBySimilarity, warnings, photoLocation: referencePhoto?.location };
  }

  invalidateCache(input?: AddressQueryInput): number {
    if (!this.options.cache) {
      return 0;
    }
    const request: AddressQueryRequest | undefined = input
      ? validateAddressQuery(input, this.options.postalCodePattern)
      : undefined;
    return this.options.cache.invalidate(request);
  }

  /** Persists a new map API key and uses it for every following search. */
  async updateApiKey(apiKey: string): Promise<void> {
    const trimmed = apiKey.trim();
    if (this.options.credentialStore) {
      await this.options.credentialStore.write(trimmed);
    }
    this.thumbnails = this.thumbnails.withApiKey(trimmed || undefined);
    logger.info('Map API key updated', { hasCredential: this.thumbnails.hasCredential });
  }

  get hasMapCredential(): boolean {
    return this.thumbnails.hasCredential;
  }

  private async buildEntry(record: AddressRecord, referencePhoto?: ReferencePhoto): Promise<ResultEntry> {
    const entry: ResultEntry = {
      record,
      externalMapUrl: externalMapUrl(record.latitude, record.longitude),
    };
    if (referencePhoto?.location) {
      entry.distanceFromPhotoMeters = Math.round(distanceBetween(referencePhoto.location, record));
    }

    try {
      entry.thumbnail = await this.thumbnails.fetchThumbnail(record);
      entry.mapUrl = entry.thumbnail.url;
    } catch (error) {
      if (!(error instanceof ThumbnailUnavailable)) {
        throw error;
      }
      entry.thumbnailError = error.message;
      entry.mapUrl = this.thumbnails.directUrl(record);
    }
    return entry;
  }

  private async loadRanker(): Promise<SimilarityRanker | null> {
    if (!this.options.modelLoader) {
      return null;
    }
    const handle = await this.options.modelLoader.load();
    return handle ? new SimilarityRanker(handle) : null;
  }

  private async applySimilarity(
    ranker: SimilarityRanker,
    referencePhoto: ReferencePhoto,
    entries: ResultEntry[],
    warnings: string[]
  ): Promise<boolean> {
    const thumbnails = entries
      .map((entry) => entry.thumbnail)
      .filter((thumbnail): thumbnail is MapThumbnail => Boolean(thumbnail));
    if (thumbnails.length === 0) {
      return false;
    }

    try {
      const outcome = await ranker.score(referencePhoto, thumbnails);
      if (outcome.status === 'reference_failed') {
        warnings.push(REFERENCE_NOT_SCORED_WARNING);
        return false;
      }
      for (const entry of entries) {
        entry.similarity = outcome.scores.get(entry.record.id);
      }
      return outcome.scores.size > 0;
    } catch (error) {
      logger.error('Similarity ranking failed', { error: describeError(error) });
      warnings.push(REFERENCE_NOT_SCORED_WARNING);
      return false;
    }
  }
}
