export interface AddressQueryInput {
  postalCode?: string;
  houseNumber?: string;
}

export interface AddressQueryRequest {
  postalCode: string;
  houseNumber: string;
}

export type OsmElementType = 'node' | 'way' | 'relation';

export interface AddressRecord {
  /** OSM identity, e.g. `way/123456`. */
  readonly id: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly displayName: string;
  readonly street: string;
  readonly city?: string;
  readonly rawTags: Readonly<Record<string, string>>;
}

export type ThumbnailProviderRole = 'primary' | 'fallback';

export interface MapThumbnail {
  sourceRecordId: string;
  imageBytes: Buffer;
  contentType: string;
  providerUsed: ThumbnailProviderRole;
  providerName: string;
  url: string;
}

export interface SimilarityScore {
  sourceRecordId: string;
  score: number; // [-1, 1]
}

export interface PhotoLocation {
  latitude: number;
  longitude: number;
}

export interface ReferencePhoto {
  bytes: Buffer;
  format: 'jpg' | 'png';
  location?: PhotoLocation;
}

export interface ResultEntry {
  record: AddressRecord;
  thumbnail?: MapThumbnail;
  thumbnailError?: string;
  /** Map image URL, also set when the image itself could not be downloaded. */
  mapUrl?: string;
  similarity?: SimilarityScore;
  externalMapUrl: string;
  distanceFromPhotoMeters?: number;
}

export interface SearchResult {
  request: AddressQueryRequest;
  entries: ResultEntry[];
  rankedBySimilarity: boolean;
  warnings: string[];
  photoLocation?: PhotoLocation;
}
