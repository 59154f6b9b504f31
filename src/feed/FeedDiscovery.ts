import { DateTime } from 'luxon';
import { DiscoveryError, describeError } from '../core/errors';
import { HttpClient } from '../core/HttpClient';
import { StructuredLogger } from '../core/StructuredLogger';
import { ResolvedBundle } from '../types/listing';

export interface FeedDiscoveryOptions {
  baseUrl: string;
  filePrefix: string;
  fileExtension: string;
}

export interface BundleCandidate {
  date: string; // YYYY-MM-DD
  filename: string;
}

// Sondes HEAD: aujourd'hui, J-1, J-2
const PROBE_DAYS = 3;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Résout le bundle le plus récent: index du répertoire d'abord, sondes HEAD ensuite.
 * Aucun retry ici; le SnapshotFetcher rejoue la découverte à chaque tentative.
 */
export class FeedDiscovery {
  private readonly pattern: RegExp;

  constructor(
    private readonly http: HttpClient,
    private readonly options: FeedDiscoveryOptions,
    private readonly logger: StructuredLogger
  ) {
    this.pattern = new RegExp(
      `${escapeRegExp(options.filePrefix)}(\\d{8})\\.${escapeRegExp(options.fileExtension)}`,
      'g'
    );
  }

  async findLatest(today: DateTime): Promise<ResolvedBundle> {
    const context = { component: 'FeedDiscovery', today: today.toFormat('yyyy-MM-dd') };

    try {
      const index = await this.http.getText(this.options.baseUrl);
      const chosen = this.pickLatest(this.listCandidates(index), today);
      if (chosen) {
        this.logger.info(`📁 Bundle trouvé dans l'index: ${chosen.filename}`, context);
        return this.resolve(chosen);
      }
      this.logger.warn('⚠️ Index sans bundle reconnu, passage aux sondes HEAD', context);
    } catch (error) {
      this.logger.warn('⚠️ Index inaccessible, passage aux sondes HEAD', { ...context, error: describeError(error) });
    }

    const probed: string[] = [];
    for (let offset = 0; offset < PROBE_DAYS; offset++) {
      const day = today.minus({ days: offset });
      const candidate: BundleCandidate = {
        date: day.toFormat('yyyy-MM-dd'),
        filename: this.filenameFor(day.toFormat('yyyyMMdd'))
      };
      const url = this.bundleUrl(candidate.filename);
      probed.push(url);

      if (await this.http.exists(url)) {
        this.logger.info(`📁 Bundle trouvé par sonde HEAD: ${candidate.filename}`, context);
        return this.resolve(candidate);
      }
    }

    throw new DiscoveryError(this.options.baseUrl, probed);
  }

  /**
   * Noms de bundles cités dans l'index, dates de calendrier valides seulement, sans doublon
   */
  listCandidates(index: string): BundleCandidate[] {
    const byDate = new Map<string, BundleCandidate>();

    for (const match of index.matchAll(this.pattern)) {
      const digits = match[1];
      if (!digits) continue;

      const date = DateTime.fromFormat(digits, 'yyyyMMdd', { zone: 'utc' });
      if (!date.isValid) continue;

      const iso = date.toFormat('yyyy-MM-dd');
      if (!byDate.has(iso)) {
        byDate.set(iso, { date: iso, filename: this.filenameFor(digits) });
      }
    }

    return [...byDate.values()];
  }

  /**
   * Date max <= aujourd'hui; sinon (horloge en retard sur le diffuseur) la date max tout court
   */
  pickLatest(candidates: BundleCandidate[], today: DateTime): BundleCandidate | null {
    const todayIso = today.toFormat('yyyy-MM-dd');
    const sorted = [...candidates].sort((a, b) => b.date.localeCompare(a.date));
    return sorted.find(candidate => candidate.date <= todayIso) ?? sorted[0] ?? null;
  }

  bundleUrl(filename: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/${filename}`;
  }

  private filenameFor(digits: string): string {
    return `${this.options.filePrefix}${digits}.${this.options.fileExtension}`;
  }

  private resolve(candidate: BundleCandidate): ResolvedBundle {
    return { url: this.bundleUrl(candidate.filename), date: candidate.date, filename: candidate.filename };
  }
}
