import type { AddressQueryRequest, AddressRecord } from '../types';
import { createLogger } from '../utils/logger';
import type { AddressLookup } from './overpassAddressService';

const logger = createLogger('AddressLookupCache');

type CacheEntry = {
  records: AddressRecord[];
  expiresAt: number;
};

interface AddressLookupCacheOptions {
  ttlMs: number;
  now?: () => number;
}

/**
 * Memoizes address lookups by (postal code, house number). Failed lookups are
 * never stored, and concurrent identical lookups share one request. A lookup
 * still in flight when `invalidate` runs is returned to its callers but not
 * stored.
 */
export class AddressLookupCache implements AddressLookup {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<AddressRecord[]>>();
  private readonly now: () => number;
  private generation = 0;

  constructor(
    private readonly lookup: AddressLookup,
    private readonly options: AddressLookupCacheOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async findAddresses(request: AddressQueryRequest): Promise<AddressRecord[]> {
    const key = cacheKey(request);

    const cached = this.entries.get(key);
    if (cached && cached.expiresAt > this.now()) {
      logger.debug('Address cache hit', { key });
      return cached.records;
    }
    if (cached) {
      this.entries.delete(key);
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const startedIn = this.generation;
    const promise: Promise<AddressRecord[]> = this.lookup
      .findAddresses(request)
      .then((records) => {
        if (this.options.ttlMs > 0 && startedIn === this.generation) {
          this.store(key, records);
        }
        return records;
      })
      .finally(() => {
        if (this.inflight.get(key) === promise) {
          this.inflight.delete(key);
        }
      });

    this.inflight.set(key, promise);
    return promise;
  }

  /** Drops one cached lookup, or every cached lookup when called without a request. */
  invalidate(request?: AddressQueryRequest): number {
    this.generation++;
    if (!request) {
      const size = this.entries.size;
      this.entries.clear();
      this.inflight.clear();
      logger.info('Address cache cleared', { removed: size });
      return size;
    }

    const key = cacheKey(request);
    this.inflight.delete(key);
    const removed = this.entries.delete(key) ? 1 : 0;
    logger.info('Address cache entry invalidated', { postalCode: request.postalCode, houseNumber: request.houseNumber, removed });
    return removed;
  }

  private store(key: string, records: AddressRecord[]): void {
    const now = this.now();
    for (const [storedKey, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(storedKey);
      }
    }
    this.entries.set(key, { records, expiresAt: now + this.options.ttlMs });
  }

  get size(): number {
    return this.entries.size;
  }
}

function cacheKey(request: AddressQueryRequest): string {
  return `${request.postalCode}|${request.houseNumber}`;
}
