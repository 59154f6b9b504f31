#!/usr/bin/env node
// Décode un bundle local et exporte les inscriptions en JSON, sans toucher au catalogue
import * as fs from 'fs';
import { CONFIG } from '../config/env';
import { describeError } from '../core/errors';
import { createLogger, StructuredLogger } from '../core/StructuredLogger';
import { iterateListings } from '../extract/listingIterator';
import { RecordExtractor } from '../extract/RecordExtractor';
import { ArchiveDecoder } from '../feed/ArchiveDecoder';
import { ListingRecord } from '../types/listing';

export async function parseBundleFile(zipPath: string, logger: StructuredLogger): Promise<ListingRecord[]> {
  const bytes = await fs.promises.readFile(zipPath);
  const bundle = await new ArchiveDecoder(logger).decode(bytes);
  const extractor = new RecordExtractor(logger);

  const records: ListingRecord[] = [];
  for await (const record of iterateListings(bundle, extractor)) {
    records.push(record);
  }
  return records;
}

export async function runParseBundle(argv: string[], logger: StructuredLogger): Promise<number> {
  const [zipPath, outPath] = argv;
  if (!zipPath) {
    console.error('Usage: parse-bundle <bundle.zip> [sortie.json]');
    return 1;
  }

  try {
    const records = await parseBundleFile(zipPath, logger);
    const json = `${JSON.stringify(records, null, 2)}\n`;

    if (outPath) {
      await fs.promises.writeFile(outPath, json, 'utf-8');
      logger.info(`📝 ${records.length} inscriptions écrites dans ${outPath}`, { component: 'parse-bundle' });
    } else {
      process.stdout.write(json);
    }
    return 0;
  } catch (error) {
    logger.error(`❌ Lecture du bundle impossible: ${describeError(error)}`, undefined, { component: 'parse-bundle' });
    return 1;
  }
}

if (require.main === module) {
  runParseBundle(process.argv.slice(2), createLogger(CONFIG, 'stderr'))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Erreur inattendue:', error);
      process.exitCode = 1;
    });
}
