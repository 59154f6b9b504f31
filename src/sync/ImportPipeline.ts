import { v4 as uuidv4 } from 'uuid';
import { toError } from '../core/errors';
import { RunLock } from '../core/RunLock';
import { StructuredLogger } from '../core/StructuredLogger';
import { JsonExporter } from '../export/JsonExporter';
import { ArchiveDecoder } from '../feed/ArchiveDecoder';
import { SnapshotFetcher } from '../feed/SnapshotFetcher';
import { RunStatsTracker } from '../metrics/RunStats';
import { FetchRunResult, ResolvedBundle } from '../types/listing';
import { ReconciliationEngine, ReconciliationOutcome } from './ReconciliationEngine';

export interface ImportPipelineDeps {
  fetcher: SnapshotFetcher;
  decoder: ArchiveDecoder;
  engine: ReconciliationEngine;
  logger: StructuredLogger;
  runLock?: RunLock | null;
  exporter?: JsonExporter | null;
  retireMissing: boolean;
  clock?: () => number;
}

export interface ImportSummary {
  result: FetchRunResult;
  attempts: number;
  bundle: ResolvedBundle;
  exportedTo: string | null;
}

/**
 * Un run complet: téléchargement, décodage, verrou, réconciliation, export
 */
export class ImportPipeline {
  constructor(private readonly deps: ImportPipelineDeps) {}

  async run(): Promise<ImportSummary> {
    const { fetcher, decoder, engine, runLock, exporter, retireMissing } = this.deps;
    const runId = uuidv4();
    const logger = this.deps.logger.child({ component: 'ImportPipeline', runId });
    const stats = new RunStatsTracker(this.deps.clock);

    logger.info('🚀 Démarrage de l\'import');

    const snapshot = await fetcher.fetchLatest();
    const decoded = await decoder.decode(snapshot.bytes);
    const summary = decoded.summary();
    logger.info('📦 Bundle décodé', {
      bundle: snapshot.bundle.filename,
      tables: Object.fromEntries(
        Object.entries(summary.tables).map(([name, table]) => [name, table.present ? table.rows : 'absente'])
      ),
      addenda: summary.hasAddenda
    });

    if (runLock) {
      await runLock.acquire();
    }

    let outcome: ReconciliationOutcome;
    try {
      outcome = await engine.reconcile(decoded, { bundle: snapshot.bundle, stats, retireMissing, runId });
    } finally {
      if (runLock) {
        await runLock.release().catch((error: unknown) => {
          logger.error('❌ Libération du verrou impossible', toError(error));
        });
      }
    }

    logger.info('✅ Import terminé', stats.getFormattedStats());

    const exportedTo = exporter ? await exporter.export(outcome.records, snapshot.bundle) : null;

    return {
      result: outcome.result,
      attempts: snapshot.attempts,
      bundle: snapshot.bundle,
      exportedTo
    };
  }
}

/**
 * Résumé lisible imprimé en fin de run
 */
export function formatSummary(summary: ImportSummary): string {
  const { result } = summary;
  return [
    `Bundle: ${result.sourceName} (${result.fileDate})`,
    `Source: ${result.sourceUrl}`,
    `Tentatives: ${summary.attempts}`,
    `Inscriptions: ${result.itemsTotal} (ajoutées: ${result.itemsAdded}, mises à jour: ${result.itemsUpdated}, vendues: ${result.itemsMarkedSold})`,
    `Durée: ${result.durationSeconds.toFixed(1)}s`,
    ...(summary.exportedTo ? [`Export: ${summary.exportedTo}`] : [])
  ].join('\n');
}
