import { describe, expect, it, vi } from 'vitest';

import { addressRecord } from '../test/fixtures';
import type { AddressQueryRequest, AddressRecord } from '../types';
import { ExternalServiceError } from '../utils/errors';
import { AddressLookupCache } from './addressLookupCache';

const REQUEST: AddressQueryRequest = { postalCode: '10115', houseNumber: '5' };

function createLookup(records: AddressRecord[] = [addressRecord('node/1')]) {
  return { findAddresses: vi.fn(async (_request: AddressQueryRequest) => records) };
}

describe('AddressLookupCache', () => {
  it('serves a repeated lookup from memory within the TTL', async () => {
    const lookup = createLookup();
    let now = 1_000;
    const cache = new AddressLookupCache(lookup, { ttlMs: 600_000, now: () => now });

    const first = await cache.findAddresses(REQUEST);
    now += 599_999;
    const second = await cache.findAddresses({ ...REQUEST });

    expect(second).toBe(first);
    expect(lookup.findAddresses).toHaveBeenCalledTimes(1);
  });

  it('queries again once the entry expired', async () => {
    const lookup = createLookup();
    let now = 0;
    const cache = new AddressLookupCache(lookup, { ttlMs: 1_000, now: () => now });

    await cache.findAddresses(REQUEST);
    now = 1_000;
    await cache.findAddresses(REQUEST);

    expect(lookup.findAddresses).toHaveBeenCalledTimes(2);
  });

  it('keeps different house numbers apart', async () => {
    const lookup = createLookup();
    const cache = new AddressLookupCache(lookup, { ttlMs: 60_000 });

    await cache.findAddresses(REQUEST);
    await cache.findAddresses({ postalCode: '10115', houseNumber: '5a' });

    expect(lookup.findAddresses).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(2);
  });

  it('invalidates a single entry or everything', async () => {
    const lookup = createLookup();
    const cache = new AddressLookupCache(lookup, { ttlMs: 60_000 });
    await cache.findAddresses(REQUEST);
    await cache.findAddresses({ postalCode: '10117', houseNumber: '1' });

    expect(cache.invalidate(REQUEST)).toBe(1);
    expect(cache.invalidate(REQUEST)).toBe(0);
    await cache.findAddresses(REQUEST);
    expect(lookup.findAddresses).toHaveBeenCalledTimes(3);

    expect(cache.invalidate()).toBe(2);
    expect(cache.size).toBe(0);
  });

  it('shares one request between concurrent identical lookups', async () => {
    const lookup = createLookup();
    const cache = new AddressLookupCache(lookup, { ttlMs: 60_000 });

    const [a, b] = await Promise.all([cache.findAddresses(REQUEST), cache.findAddresses(REQUEST)]);

    expect(a).toBe(b);
    expect(lookup.findAddresses).toHaveBeenCalledTimes(1);
  });

  it('does not remember failures', async () => {
    const lookup = {
      findAddresses: vi
        .fn(async (_request: AddressQueryRequest): Promise<AddressRecord[]> => [addressRecord('node/1')])
        .mockRejectedValueOnce(new ExternalServiceError('down', 'Overpass API', 503)),
    };
    const cache = new AddressLookupCache(lookup, { ttlMs: 60_000 });

    await expect(cache.findAddresses(REQUEST)).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(cache.findAddresses(REQUEST)).resolves.toHaveLength(1);
    expect(lookup.findAddresses).toHaveBeenCalledTimes(2);
  });

  it('stores nothing when the TTL is zero', async () => {
    const lookup = createLookup();
    const cache = new AddressLookupCache(lookup, { ttlMs: 0 });

    await cache.findAddresses(REQUEST);
    await cache.findAddresses(REQUEST);

    expect(lookup.findAddresses).toHaveBeenCalledTimes(2);
  });

  it('does not store a lookup that was in flight when its entry was invalidated', async () => {
    let release: (records: AddressRecord[]) => void = () => undefined;
    const lookup = {
      findAddresses: vi
        .fn(async (_request: AddressQueryRequest): Promise<AddressRecord[]> => [addressRecord('node/2')])
        .mockImplementationOnce(
          () =>
            new Promise<AddressRecord[]>((resolve) => {
              release = resolve;
            })
        ),
    };
    const cache = new AddressLookupCache(lookup, { ttlMs: 60_000 });

    const stale = cache.findAddresses(REQUEST);
    expect(cache.invalidate(REQUEST)).toBe(0);
    release([addressRecord('node/1')]);

    await expect(stale).resolves.toEqual([addressRecord('node/1')]);
    expect(cache.size).toBe(0);
    await expect(cache.findAddresses(REQUEST)).resolves.toEqual([addressRecord('node/2')]);
    expect(lookup.findAddresses).toHaveBeenCalledTimes(2);
  });

  it('starts a fresh lookup after clearing the cache mid-flight', async () => {
    let release: (records: AddressRecord[]) => void = () => undefined;
    const lookup = {
      findAddresses: vi
        .fn(async (_request: AddressQueryRequest): Promise<AddressRecord[]> => [addressRecord('node/2')])
        .mockImplementationOnce(
          () =>
            new Promise<AddressRecord[]>((resolve) => {
              release = resolve;
            })
        ),
    };
    const cache = new AddressLookupCache(lookup, { ttlMs: 60_000 });

    const stale = cache.findAddresses(REQUEST);
    cache.invalidate();
    const fresh = await cache.findAddresses(REQUEST);
    release([addressRecord('node/1')]);
    await stale;

    expect(fresh).toEqual([addressRecord('node/2')]);
    await expect(cache.findAddresses(REQUEST)).resolves.toBe(fresh);
    expect(lookup.findAddresses).toHaveBeenCalledTimes(2);
  });

  it('sweeps expired entries when storing a new one', async () => {
    const lookup = createLookup();
    let now = 0;
    const cache = new AddressLookupCache(lookup, { ttlMs: 1_000, now: () => now });

    await cache.findAddresses(REQUEST);
    await cache.findAddresses({ postalCode: '10117', houseNumber: '1' });
    expect(cache.size).toBe(2);

    now = 1_500;
    await cache.findAddresses({ postalCode: '10119', houseNumber: '2' });
    expect(cache.size).toBe(1);
  });
});
