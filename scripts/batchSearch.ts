import fs from 'fs/promises';
import path from 'path';
import dotenv from 'dotenv';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

import { createCivicEye } from '../src/app';
import { loadConfig } from '../src/config';
import { inspectReferencePhoto } from '../src/services/photoInspector';
import { describeError } from '../src/utils/errors';
import { createLogger } from '../src/utils/logger';

dotenv.config();

const logger = createLogger('BatchSearch');

type BatchRow = {
  postal_code?: string;
  house_number?: string;
  photo?: string;
};

const OUTPUT_COLUMNS = [
  'postal_code',
  'house_number',
  'rank',
  'osm_id',
  'display_name',
  'latitude',
  'longitude',
  'map_provider',
  'similarity',
  'map_url',
];

async function main() {
  const inputPath = process.argv[2] ?? path.join(process.cwd(), 'dataset', 'addresses.csv');
  const outputPath = process.argv[3] ?? path.join(process.cwd(), 'dataset', 'address_matches.csv');

  const rows = parse(await fs.readFile(inputPath, 'utf-8'), {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  }) as BatchRow[];

  const civicEye = await createCivicEye(loadConfig());
  const output: string[][] = [];
  let ok = 0;
  let failed = 0;

  for (const row of rows) {
    try {
      const photo = row.photo
        ? await inspectReferencePhoto(await fs.readFile(path.resolve(path.dirname(inputPath), row.photo)))
        : undefined;
      const result = await civicEye.presenter.search(
        { postalCode: row.postal_code, houseNumber: row.house_number },
        photo
      );

      result.entries.forEach((entry, index) => {
        output.push([
          result.request.postalCode,
          result.request.houseNumber,
          String(index + 1),
          entry.record.id,
          entry.record.displayName,
          entry.record.latitude.toFixed(6),
          entry.record.longitude.toFixed(6),
          entry.thumbnail?.providerName ?? '',
          entry.similarity ? entry.similarity.score.toFixed(4) : '',
          entry.externalMapUrl,
        ]);
      });
      ok++;
      logger.info('Row searched', { postalCode: row.postal_code, houseNumber: row.house_number, matches: result.entries.length });
    } catch (e) {
      failed++;
      logger.warn('Row skipped', { postalCode: row.postal_code, houseNumber: row.house_number, error: describeError(e) });
    }
  }

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, stringify(output, { header: true, columns: OUTPUT_COLUMNS }), 'utf-8');
  console.log(`wrote ${output.length} matches for ${ok} rows (${failed} failed): ${outputPath}`);
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
