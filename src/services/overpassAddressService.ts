import type { Response } from 'node-fetch';
import { z } from 'zod';

import type { AddressQueryInput, AddressQueryRequest, AddressRecord, OsmElementType } from '../types';
import { ExternalServiceError, ValidationError, describeError } from '../utils/errors';
import { FetchLike, RequestTimeoutError, defaultFetch, fetchWithTimeout, readErrorSnippet } from '../utils/http';
import { createLogger } from '../utils/logger';

const logger = createLogger('OverpassAddressService');

const SERVICE_NAME = 'Overpass API';
const MAX_HOUSE_NUMBER_LENGTH = 10;
const UNKNOWN_STREET = 'Unknown street';

const elementSchema = z.object({
  type: z.enum(['node', 'way', 'relation']),
  id: z.number(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: z.object({ lat: z.number(), lon: z.number() }).optional(),
  tags: z.record(z.string()).optional(),
});

const responseSchema = z.object({
  elements: z.array(z.unknown()).default([]),
  remark: z.string().optional(),
});

type OverpassElement = z.infer<typeof elementSchema>;

export interface AddressLookup {
  findAddresses(request: AddressQueryRequest): Promise<AddressRecord[]>;
}

interface OverpassAddressServiceOptions {
  endpoint: string;
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchLike;
}

export function validateAddressQuery(input: AddressQueryInput, postalCodePattern: RegExp): AddressQueryRequest {
  const postalCode = (input.postalCode ?? '').trim();
  const houseNumber = (input.houseNumber ?? '').trim();

  if (!postalCode) {
    throw new ValidationError('A postal code is required.', 'postalCode');
  }
  if (!houseNumber) {
    throw new ValidationError('A house number is required.', 'houseNumber');
  }
  if (!postalCodePattern.test(postalCode)) {
    throw new ValidationError(`Postal code "${postalCode}" does not match the expected format.`, 'postalCode');
  }
  if (houseNumber.length > MAX_HOUSE_NUMBER_LENGTH) {
    throw new ValidationError(
      `House number must be at most ${MAX_HOUSE_NUMBER_LENGTH} characters.`,
      'houseNumber'
    );
  }

  return { postalCode, houseNumber };
}

function escapeTagValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function buildOverpassQuery(request: AddressQueryRequest, timeoutSeconds: number): string {
  const filter = `["addr:postcode"="${escapeTagValue(request.postalCode)}"]["addr:housenumber"="${escapeTagValue(
    request.houseNumber
  )}"]`;
  const types: OsmElementType[] = ['node', 'way', 'relation'];

  return [
    `[out:json][timeout:${timeoutSeconds}];`,
    '(',
    ...types.map((type) => `  ${type}${filter};`),
    ');',
    'out center tags;',
  ].join('\n');
}

export function synthesizeDisplayName(type: OsmElementType, id: number, tags: Record<string, string>): string {
  const full = tags['addr:full']?.trim();
  if (full) {
    return full;
  }

  const streetLine = [tags['addr:street'], tags['addr:housenumber']].filter(Boolean).join(' ');
  const cityLine = [tags['addr:postcode'], tags['addr:city']].filter(Boolean).join(' ');
  const label = [streetLine, cityLine].filter(Boolean).join(', ');
  if (label) {
    return label;
  }

  return tags['name'] ?? `${type} ${id}`;
}

export function toAddressRecord(element: OverpassElement): AddressRecord | null {
  const latitude = element.lat ?? element.center?.lat;
  const longitude = element.lon ?? element.center?.lon;
  if (typeof latitude !== 'number' || typeof longitude !== 'number') {
    return null;
  }

  const tags = element.tags ?? {};
  const city = tags['addr:city']?.trim();

  return Object.freeze({
    id: `${element.type}/${element.id}`,
    latitude,
    longitude,
    displayName: synthesizeDisplayName(element.type, element.id, tags),
    street: tags['addr:street']?.trim() || UNKNOWN_STREET,
    city: city || undefined,
    rawTags: Object.freeze({ ...tags }),
  });
}

export class OverpassAddressService implements AddressLookup {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: OverpassAddressServiceOptions) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  async findAddresses(request: AddressQueryRequest): Promise<AddressRecord[]> {
    const query = buildOverpassQuery(request, Math.ceil(this.options.timeoutMs / 1000));
    const payload = await this.runQuery(query);

    const parsed = responseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExternalServiceError('Overpass API returned an unexpected payload.', SERVICE_NAME);
    }

    if (parsed.data.remark) {
      logger.warn('Overpass returned a remark', { remark: parsed.data.remark });
    }

    const seen = new Set<string>();
    const records: AddressRecord[] = [];
    for (const raw of parsed.data.elements) {
      const element = elementSchema.safeParse(raw);
      if (!element.success) {
        logger.debug('Skipping unreadable Overpass element', { issues: element.error.issues.length });
        continue;
      }
      const record = toAddressRecord(element.data);
      if (!record || seen.has(record.id)) {
        continue;
      }
      seen.add(record.id);
      records.push(record);
    }

    logger.info('Overpass lookup finished', {
      postalCode: request.postalCode,
      houseNumber: request.houseNumber,
      elements: parsed.data.elements.length,
      records: records.length,
    });
    return records;
  }

  private async runQuery(query: string): Promise<unknown> {
    try {
      return await fetchWithTimeout(
        this.fetchImpl,
        this.options.endpoint,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
            'User-Agent': this.options.userAgent,
          },
          body: new URLSearchParams({ data: query }).toString(),
        },
        this.options.timeoutMs,
        (response) => this.readPayload(response)
      );
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      const reason = error instanceof RequestTimeoutError ? error.message : describeError(error);
      logger.warn('Overpass request failed', { reason });
      throw new ExternalServiceError(`Failed to query Overpass API: ${reason}`, SERVICE_NAME, undefined, error);
    }
  }

  private async readPayload(response: Response): Promise<unknown> {
    if (!response.ok) {
      const snippet = await readErrorSnippet(response);
      logger.warn('Overpass responded with an error', { status: response.status, snippet });
      throw new ExternalServiceError(
        `Overpass API responded with status ${response.status}`,
        SERVICE_NAME,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ExternalServiceError('Overpass API returned invalid JSON.', SERVICE_NAME, response.status, error);
    }
  }
}
