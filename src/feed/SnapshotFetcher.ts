import * as fs from 'fs';
import * as path from 'path';
import { DateTime } from 'luxon';
import { FetchError, describeError } from '../core/errors';
import { HttpClient } from '../core/HttpClient';
import { StructuredLogger } from '../core/StructuredLogger';
import { ResolvedBundle } from '../types/listing';
import { FeedDiscovery } from './FeedDiscovery';

export interface SnapshotFetcherOptions {
  maxAttempts: number;
  retryDelayMs: number;
  timeZone: string;
  saveDir?: string;
}

export interface FetchedSnapshot {
  bundle: ResolvedBundle;
  bytes: Buffer;
  attempts: number;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export class SnapshotFetcher {
  private readonly sleep: Sleep;
  private readonly today: () => DateTime;

  constructor(
    private readonly discovery: FeedDiscovery,
    private readonly http: HttpClient,
    private readonly logger: StructuredLogger,
    private readonly options: SnapshotFetcherOptions,
    deps: { sleep?: Sleep; today?: () => DateTime } = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.today = deps.today ?? (() => DateTime.now().setZone(options.timeZone));
  }

  /**
   * Découverte + téléchargement, rejoués jusqu'à maxAttempts avec un délai fixe.
   * Le délai n'est jamais appliqué après la dernière tentative.
   */
  async fetchLatest(): Promise<FetchedSnapshot> {
    const { maxAttempts, retryDelayMs } = this.options;
    let lastError: unknown = new Error('aucune tentative');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const context = { component: 'SnapshotFetcher', attempt, maxAttempts };

      try {
        // "Aujourd'hui" recalculé à chaque tentative (un run peut passer minuit)
        const bundle = await this.discovery.findLatest(this.today());
        this.logger.startTimer('download');
        const bytes = await this.http.download(bundle.url);
        this.logger.endTimer('download', `📥 Téléchargé ${bundle.filename} (${bytes.length} octets)`, context);

        if (this.options.saveDir) {
          await this.saveRaw(bundle, bytes);
        }

        return { bundle, bytes, attempts: attempt };
      } catch (error) {
        lastError = error;
        this.logger.warn(`⚠️ Tentative ${attempt}/${maxAttempts} échouée`, { ...context, error: describeError(error) });

        if (attempt < maxAttempts) {
          this.logger.info(`⏳ Nouvelle tentative dans ${Math.round(retryDelayMs / 1000)}s`, context);
          await this.sleep(retryDelayMs);
        }
      }
    }

    throw new FetchError(maxAttempts, lastError);
  }

  /**
   * Copie brute du bundle; un échec d'écriture n'invalide pas la tentative
   */
  private async saveRaw(bundle: ResolvedBundle, bytes: Buffer): Promise<void> {
    const saveDir = this.options.saveDir ?? '';
    const target = path.join(saveDir, bundle.filename);
    try {
      await fs.promises.mkdir(saveDir, { recursive: true });
      await fs.promises.writeFile(target, bytes);
      this.logger.info(`💾 Bundle sauvegardé: ${target}`, { component: 'SnapshotFetcher' });
    } catch (error) {
      this.logger.warn('⚠️ Sauvegarde du bundle impossible', {
        component: 'SnapshotFetcher',
        target,
        error: describeError(error)
      });
    }
  }
}
