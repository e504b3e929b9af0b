import sharp from 'sharp';
import { describe, expect, it } from 'vitest';

import { ValidationError } from '../utils/errors';
import { extractGpsLocation, inspectReferencePhoto } from './photoInspector';

function solidImage(format: 'png' | 'jpeg' | 'webp'): Promise<Buffer> {
  return sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 200, g: 120, b: 40 } } })
    .toFormat(format)
    .toBuffer();
}

describe('inspectReferencePhoto', () => {
  it('accepts a PNG', async () => {
    const bytes = await solidImage('png');
    await expect(inspectReferencePhoto(bytes)).resolves.toEqual({ bytes, format: 'png', location: undefined });
  });

  it('accepts a JPEG without GPS data', async () => {
    const photo = await inspectReferencePhoto(await solidImage('jpeg'));
    expect(photo.format).toBe('jpg');
    expect(photo.location).toBeUndefined();
  });

  it('rejects other image formats', async () => {
    await expect(inspectReferencePhoto(await solidImage('webp'))).rejects.toThrow(
      'The reference photo must be a JPEG or PNG image.'
    );
  });

  it('rejects bytes that are not an image', async () => {
    await expect(inspectReferencePhoto(Buffer.from('not an image'))).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('extractGpsLocation', () => {
  it('returns undefined when the photo has no EXIF block', async () => {
    await expect(extractGpsLocation(await solidImage('jpeg'))).resolves.toBeUndefined();
  });
});
