import { Response } from 'node-fetch';
import { PassThrough } from 'stream';
import type { RequestInit } from 'node-fetch';

import type { AddressRecord, MapThumbnail } from '../types';

export type FakeRoute = (url: string, init?: RequestInit) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function imageResponse(bytes: number[] = [137, 80, 78, 71], contentType = 'image/png'): Response {
  return new Response(Buffer.from(bytes), {
    status: 200,
    headers: { 'content-type': contentType },
  });
}

export function textResponse(body: string, status: number, contentType = 'text/html'): Response {
  return new Response(body, { status, headers: { 'content-type': contentType } });
}

/** Sends the headers and the first chunk, then never finishes the body. */
export function stalledResponse(firstChunk: string | Buffer, contentType: string): Response {
  const body = new PassThrough();
  body.write(firstChunk);
  return new Response(body, { status: 200, headers: { 'content-type': contentType } });
}

export function overpassElement(
  type: 'node' | 'way' | 'relation',
  id: number,
  coordinates: { lat: number; lon: number },
  tags: Record<string, string> = {}
): Record<string, unknown> {
  if (type === 'node') {
    return { type, id, lat: coordinates.lat, lon: coordinates.lon, tags };
  }
  return { type, id, center: coordinates, tags };
}

export function addressRecord(id: string, overrides: Partial<AddressRecord> = {}): AddressRecord {
  return {
    id,
    latitude: 52.53,
    longitude: 13.38,
    displayName: `Invalidenstraße 5, 10115 Berlin (${id})`,
    street: 'Invalidenstraße',
    city: 'Berlin',
    rawTags: {},
    ...overrides,
  };
}

export function mapThumbnail(recordId: string, bytes: number[] = [1, 2, 3]): MapThumbnail {
  return {
    sourceRecordId: recordId,
    imageBytes: Buffer.from(bytes),
    contentType: 'image/png',
    providerUsed: 'fallback',
    providerName: 'OpenStreetMap Static Map',
    url: `https://maps.test/${recordId}.png`,
  };
}
