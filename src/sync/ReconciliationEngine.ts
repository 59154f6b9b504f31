import { v4 as uuidv4 } from 'uuid';
import { ReconciliationError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { iterateListings } from '../extract/listingIterator';
import { RecordExtractor } from '../extract/RecordExtractor';
import { DecodedBundle } from '../feed/ArchiveDecoder';
import { RunStatsTracker } from '../metrics/RunStats';
import { ListingCatalog } from '../store/ListingCatalog';
import { FetchRunResult, ListingRecord, ResolvedBundle } from '../types/listing';

export interface ReconcileContext {
  bundle: ResolvedBundle;
  stats: RunStatsTracker;
  // false: les inscriptions absentes restent ACTIVE (flux partiel)
  retireMissing: boolean;
  runId?: string;
  now?: () => Date;
}

export interface ReconciliationOutcome {
  result: FetchRunResult;
  records: ListingRecord[];
}

/**
 * Applique un bundle décodé au catalogue: création, mise à jour, retrait,
 * puis ajout du résultat de run, le tout dans une seule transaction.
 */
export class ReconciliationEngine {
  constructor(
    private readonly catalog: ListingCatalog,
    private readonly extractor: RecordExtractor,
    private readonly logger: StructuredLogger
  ) {}

  async reconcile(decoded: DecodedBundle, context: ReconcileContext): Promise<ReconciliationOutcome> {
    const { bundle, stats, retireMissing } = context;
    const runId = context.runId ?? uuidv4();
    const runAt = (context.now ?? (() => new Date()))().toISOString();
    const log = this.logger.child({ component: 'ReconciliationEngine', runId });

    try {
      return await this.catalog.withTransaction(async (session) => {
        const seen = new Set<string>();
        const records: ListingRecord[] = [];

        const listings = iterateListings(decoded, this.extractor, () => stats.incrementSkippedRows());
        for await (const record of listings) {
          stats.incrementTotal();
          seen.add(record.listingId);
          records.push(record);

          const { created } = await session.upsert(record, runAt);
          stats.recordUpsert(created);

          // Aucune photo extraite: on garde celles du catalogue
          if (record.photos.length > 0) {
            await session.replacePhotos(record.listingId, record.photos);
            stats.incrementPhotosReplaced();
          }
        }

        if (retireMissing) {
          stats.setMarkedSold(await session.markSoldExcept(seen, runAt));
        } else {
          log.info('ℹ️ Retrait désactivé: aucune inscription marquée vendue');
        }

        const counts = stats.getStats();
        const result: FetchRunResult = {
          runId,
          createdAt: runAt,
          fileDate: bundle.date,
          sourceUrl: bundle.url,
          sourceName: bundle.filename,
          itemsTotal: counts.itemsTotal,
          itemsAdded: counts.itemsAdded,
          itemsUpdated: counts.itemsUpdated,
          itemsMarkedSold: counts.itemsMarkedSold,
          durationSeconds: stats.elapsedSeconds()
        };
        await session.appendRunResult(result);

        if (counts.skippedRows > 0) {
          log.warn(`⚠️ ${counts.skippedRows} ligne(s) d'inscription sans identifiant ignorée(s)`);
        }
        const anomalies = this.extractor.getAnomalyCount();
        if (anomalies > 0) {
          log.info(`ℹ️ ${anomalies} champ(s) dégradé(s) à l'extraction`);
        }

        return { result, records };
      });
    } catch (error) {
      throw new ReconciliationError(error);
    }
  }
}
