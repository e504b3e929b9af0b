import exifr from 'exifr';
import sharp from 'sharp';

import type { PhotoLocation, ReferencePhoto } from '../types';
import { ValidationError, describeError } from '../utils/errors';
import { isValidCoordinate } from '../utils/location';
import { createLogger } from '../utils/logger';

const logger = createLogger('PhotoInspector');

export const SUPPORTED_PHOTO_MIME_TYPES = ['image/jpeg', 'image/png'];

/**
 * Checks that an uploaded reference photo is a decodable JPEG or PNG and picks
 * up its GPS position when the EXIF block carries one.
 */
export async function inspectReferencePhoto(bytes: Buffer): Promise<ReferencePhoto> {
  let format: string | undefined;
  try {
    const metadata = await sharp(bytes).metadata();
    format = metadata.format;
  } catch (error) {
    logger.warn('Reference photo could not be decoded', { error: describeError(error) });
    throw new ValidationError('The reference photo could not be read as an image.', 'photo');
  }

  if (format !== 'jpeg' && format !== 'png') {
    throw new ValidationError('The reference photo must be a JPEG or PNG image.', 'photo');
  }

  const location = format === 'jpeg' ? await extractGpsLocation(bytes) : undefined;
  return {
    bytes,
    format: format === 'jpeg' ? 'jpg' : 'png',
    location,
  };
}

export async function extractGpsLocation(bytes: Buffer): Promise<PhotoLocation | undefined> {
  try {
    const metadata: unknown = await exifr.gps(bytes);
    if (!metadata || typeof metadata !== 'object') {
      return undefined;
    }
    const latitude: unknown = Reflect.get(metadata, 'latitude');
    const longitude: unknown = Reflect.get(metadata, 'longitude');
    if (typeof latitude !== 'number' || typeof longitude !== 'number' || !isValidCoordinate(latitude, longitude)) {
      return undefined;
    }
    return { latitude, longitude };
  } catch (error) {
    logger.warn('Failed to read EXIF metadata', { error: describeError(error) });
    return undefined;
  }
}
