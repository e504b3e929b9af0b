import fs from 'fs/promises';
import dotenv from 'dotenv';

import { createCivicEye } from '../src/app';
import { loadConfig } from '../src/config';
import { inspectReferencePhoto } from '../src/services/photoInspector';
import { CivicEyeError } from '../src/utils/errors';
import { formatCoordinates } from '../src/utils/location';

dotenv.config();

async function main() {
  const [postalCode, houseNumber, photoPath] = process.argv.slice(2);
  if (!postalCode || !houseNumber) {
    console.error('usage: searchAddress <postalCode> <houseNumber> [referencePhoto]');
    process.exit(2);
  }

  const civicEye = await createCivicEye(loadConfig());
  const photo = photoPath ? await inspectReferencePhoto(await fs.readFile(photoPath)) : undefined;
  const result = await civicEye.presenter.search({ postalCode, houseNumber }, photo);

  for (const warning of result.warnings) {
    console.warn(`! ${warning}`);
  }

  console.log(`Found ${result.entries.length} possible addresses for ${result.request.postalCode} ${result.request.houseNumber}.`);
  if (result.rankedBySimilarity) {
    console.log('Sorted by cosine similarity against the reference photo.');
  }

  result.entries.forEach((entry, index) => {
    const { record } = entry;
    const similarity = entry.similarity ? `  similarity ${entry.similarity.score.toFixed(2)}` : '';
    console.log(`${index + 1}. ${record.displayName} [${record.id}]${similarity}`);
    console.log(`   ${formatCoordinates(record.latitude, record.longitude)}  ${entry.externalMapUrl}`);
    console.log(`   map: ${entry.thumbnail ? entry.thumbnail.providerName : `unavailable (${entry.thumbnailError ?? 'unknown'})`}`);
  });
}

main().catch((e: unknown) => {
  console.error(e instanceof CivicEyeError ? `${e.code}: ${e.message}` : e);
  process.exit(1);
});
