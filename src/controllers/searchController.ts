import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';

import type { ResultEntry, SearchResult } from '../types';
import { CivicEyeError, ExternalServiceError, ValidationError } from '../utils/errors';
import { formatCoordinates } from '../utils/location';
import { createLogger } from '../utils/logger';
import { SUPPORTED_PHOTO_MIME_TYPES, inspectReferencePhoto } from '../services/photoInspector';
import type { SearchPresenter } from '../services/searchPresenter';

const logger = createLogger('SearchController');

const MAX_PHOTO_BYTES = 5 * 1024 * 1024;

// JSON clients may send either field as a number.
const addressField = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .optional();

const addressBodySchema = z.object({
  postalCode: addressField,
  houseNumber: addressField,
});

const credentialsBodySchema = z.object({
  apiKey: z.string().trim().min(1, 'apiKey must not be empty'),
});

export interface SearchResponseEntry {
  id: string;
  displayName: string;
  street: string;
  city: string | null;
  latitude: number;
  longitude: number;
  coordinates: string;
  tags: Record<string, string>;
  externalMapUrl: string;
  thumbnail: {
    provider: string;
    providerUsed: 'primary' | 'fallback';
    url: string;
    dataUrl: string;
  } | null;
  thumbnailError: string | null;
  mapUrl: string | null;
  similarity: number | null;
  distanceFromPhotoMeters: number | null;
}

export interface SearchResponsePayload {
  postalCode: string;
  houseNumber: string;
  count: number;
  rankedBySimilarity: boolean;
  warnings: string[];
  photoLocation: { latitude: number; longitude: number } | null;
  results: SearchResponseEntry[];
}

export function toResponseEntry(entry: ResultEntry): SearchResponseEntry {
  const { record, thumbnail } = entry;
  return {
    id: record.id,
    displayName: record.displayName,
    street: record.street,
    city: record.city ?? null,
    latitude: record.latitude,
    longitude: record.longitude,
    coordinates: formatCoordinates(record.latitude, record.longitude),
    tags: { ...record.rawTags },
    externalMapUrl: entry.externalMapUrl,
    thumbnail: thumbnail
      ? {
          provider: thumbnail.providerName,
          providerUsed: thumbnail.providerUsed,
          url: thumbnail.url,
          dataUrl: `data:${thumbnail.contentType};base64,${thumbnail.imageBytes.toString('base64')}`,
        }
      : null,
    thumbnailError: entry.thumbnailError ?? null,
    mapUrl: entry.mapUrl ?? null,
    similarity: entry.similarity ? Number(entry.similarity.score.toFixed(4)) : null,
    distanceFromPhotoMeters: entry.distanceFromPhotoMeters ?? null,
  };
}

export function toResponsePayload(result: SearchResult): SearchResponsePayload {
  return {
    postalCode: result.request.postalCode,
    houseNumber: result.request.houseNumber,
    count: result.entries.length,
    rankedBySimilarity: result.rankedBySimilarity,
    warnings: result.warnings,
    photoLocation: result.photoLocation ?? null,
    results: result.entries.map(toResponseEntry),
  };
}

export class SearchController {
  private readonly upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_PHOTO_BYTES },
    fileFilter: (_req, file, callback) => {
      if (!SUPPORTED_PHOTO_MIME_TYPES.includes(file.mimetype)) {
        callback(new ValidationError('Only JPEG and PNG photos are accepted.', 'photo'));
        return;
      }
      callback(null, true);
    },
  });

  constructor(private readonly presenter: SearchPresenter) {}

  getUploaderMiddleware() {
    return this.upload.single('photo');
  }

  health = (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'civiceye',
      mapCredential: this.presenter.hasMapCredential,
      timestamp: new Date().toISOString(),
    });
  };

  handleSearch = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = addressBodySchema.parse(req.body ?? {});
      const referencePhoto = req.file ? await inspectReferencePhoto(req.file.buffer) : undefined;

      logger.info('Search requested', {
        postalCode: body.postalCode,
        houseNumber: body.houseNumber,
        withPhoto: Boolean(referencePhoto),
      });

      const result = await this.presenter.search(body, referencePhoto);
      res.status(200).json(toResponsePayload(result));
    } catch (error) {
      next(error);
    }
  };

  handleInvalidateCache = (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = addressBodySchema.parse(req.body ?? {});
      const scoped = Boolean(body.postalCode || body.houseNumber);
      const removed = this.presenter.invalidateCache(scoped ? body : undefined);
      res.status(200).json({ removed });
    } catch (error) {
      next(error);
    }
  };

  handleUpdateCredentials = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = credentialsBodySchema.parse(req.body ?? {});
      await this.presenter.updateApiKey(body.apiKey);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  };
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (error instanceof z.ZodError) {
    const message = error.issues.map((issue) => issue.message).join('; ');
    res.status(400).json({ error: message, code: 'VALIDATION_ERROR' });
    return;
  }
  if (error instanceof multer.MulterError) {
    res.status(400).json({ error: error.message, code: 'VALIDATION_ERROR' });
    return;
  }
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, code: error.code, field: error.field ?? null });
    return;
  }
  if (error instanceof ExternalServiceError) {
    res.status(502).json({ error: error.message, code: error.code, service: error.service });
    return;
  }
  if (error instanceof CivicEyeError) {
    res.status(500).json({ error: error.message, code: error.code });
    return;
  }

  logger.error('Unhandled request error', { error: error instanceof Error ? error.message : String(error) });
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
