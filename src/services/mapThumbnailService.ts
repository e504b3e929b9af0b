import type { Response } from 'node-fetch';

import type { AddressRecord, MapThumbnail, ThumbnailProviderRole } from '../types';
import { ThumbnailAttempt, ThumbnailUnavailable, describeError } from '../utils/errors';
import { FetchLike, defaultFetch, fetchWithTimeout } from '../utils/http';
import { createLogger } from '../utils/logger';

const logger = createLogger('MapThumbnailService');

const GOOGLE_STATIC_MAPS_URL = 'https://maps.googleapis.com/maps/api/staticmap';
const OSM_STATIC_MAP_URL = 'https://staticmap.openstreetmap.de/staticmap.php';

export interface MapViewport {
  zoom: number;
  size: string;
}

export interface MapImageProvider {
  readonly name: string;
  readonly role: ThumbnailProviderRole;
  readonly requiresCredential: boolean;
  buildUrl(latitude: number, longitude: number, credential?: string): string;
}

export class GoogleStaticMapProvider implements MapImageProvider {
  readonly name = 'Google Static Maps';
  readonly role = 'primary';
  readonly requiresCredential = true;

  constructor(
    private readonly viewport: MapViewport,
    private readonly baseUrl = GOOGLE_STATIC_MAPS_URL
  ) {}

  buildUrl(latitude: number, longitude: number, credential?: string): string {
    const params = new URLSearchParams({
      center: `${latitude},${longitude}`,
      zoom: String(this.viewport.zoom),
      size: this.viewport.size,
      maptype: 'roadmap',
      markers: `color:red|${latitude},${longitude}`,
    });
    if (credential) {
      params.set('key', credential);
    }
    return `${this.baseUrl}?${params.toString()}`;
  }
}

export class OsmStaticMapProvider implements MapImageProvider {
  readonly name = 'OpenStreetMap Static Map';
  readonly role = 'fallback';
  readonly requiresCredential = false;

  constructor(
    private readonly viewport: MapViewport,
    private readonly baseUrl = OSM_STATIC_MAP_URL
  ) {}

  buildUrl(latitude: number, longitude: number): string {
    const params = new URLSearchParams({
      center: `${latitude},${longitude}`,
      zoom: String(this.viewport.zoom),
      size: this.viewport.size,
      markers: `${latitude},${longitude},red-pushpin`,
    });
    return `${this.baseUrl}?${params.toString()}`;
  }
}

export interface MapThumbnailServiceOptions {
  viewport: MapViewport;
  timeoutMs: number;
  userAgent: string;
  apiKey?: string;
  providers?: MapImageProvider[];
  fetchImpl?: FetchLike;
}

export class MapThumbnailService {
  private readonly providers: MapImageProvider[];
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: MapThumbnailServiceOptions) {
    this.providers = options.providers ?? [
      new GoogleStaticMapProvider(options.viewport),
      new OsmStaticMapProvider(options.viewport),
    ];
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  get hasCredential(): boolean {
    return Boolean(this.options.apiKey);
  }

  /** Same providers and transport, different API key. */
  withApiKey(apiKey: string | undefined): MapThumbnailService {
    return new MapThumbnailService({ ...this.options, providers: this.providers, apiKey });
  }

  async fetchThumbnail(record: Pick<AddressRecord, 'id' | 'latitude' | 'longitude'>): Promise<MapThumbnail> {
    const attempts: ThumbnailAttempt[] = [];

    for (const provider of this.providers) {
      if (provider.requiresCredential && !this.options.apiKey) {
        attempts.push({ provider: provider.name, reason: 'no API key configured' });
        continue;
      }

      const url = provider.buildUrl(record.latitude, record.longitude, this.options.apiKey);
      try {
        const { imageBytes, contentType } = await this.download(url);
        if (attempts.length > 0) {
          logger.info('Map thumbnail served by fallback provider', {
            recordId: record.id,
            provider: provider.name,
            skipped: attempts.map((attempt) => attempt.provider),
          });
        }
        return {
          sourceRecordId: record.id,
          imageBytes,
          contentType,
          providerUsed: provider.role,
          providerName: provider.name,
          url: redactCredential(url),
        };
      } catch (error) {
        const reason = describeError(error);
        logger.warn('Map provider failed', { recordId: record.id, provider: provider.name, reason });
        attempts.push({ provider: provider.name, reason });
      }
    }

    throw new ThumbnailUnavailable(record.id, attempts);
  }

  /**
   * URL of the last provider that needs no credential, so a client can still
   * load the map itself when no image could be downloaded.
   */
  directUrl(record: Pick<AddressRecord, 'latitude' | 'longitude'>): string | undefined {
    const provider = [...this.providers].reverse().find((candidate) => !candidate.requiresCredential);
    return provider?.buildUrl(record.latitude, record.longitude);
  }

  private download(url: string): Promise<{ imageBytes: Buffer; contentType: string }> {
    return fetchWithTimeout(
      this.fetchImpl,
      url,
      {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'image/png,image/jpeg,image/*',
        },
      },
      this.options.timeoutMs,
      (response) => readImage(response)
    );
  }
}

async function readImage(response: Response): Promise<{ imageBytes: Buffer; contentType: string }> {
  if (!response.ok) {
    throw new Error(`provider responded with status ${response.status}`);
  }

  const contentType = (response.headers.get('content-type') ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
  if (!contentType.startsWith('image/')) {
    // Quota and key errors often come back as 200 with an HTML or JSON body.
    throw new Error(`provider returned ${contentType || 'no content type'} instead of an image`);
  }

  const imageBytes = Buffer.from(await response.arrayBuffer());
  if (imageBytes.length === 0) {
    throw new Error('provider returned an empty image');
  }
  return { imageBytes, contentType };
}

export function redactCredential(url: string): string {
  return url.replace(/([?&]key=)[^&]*/, '$1REDACTED');
}
