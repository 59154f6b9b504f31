import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { ListingRecord, ResolvedBundle } from '../types/listing';

export const LATEST_EXPORT_NAME = 'latest.json';

export function exportFileName(bundleFilename: string): string {
  const ext = path.extname(bundleFilename);
  return `${ext ? bundleFilename.slice(0, -ext.length) : bundleFilename}.json`;
}

/**
 * Export JSON des inscriptions extraites: <bundle>.json puis copie en latest.json
 */
export class JsonExporter {
  constructor(
    private readonly exportDir: string,
    private readonly logger: StructuredLogger
  ) {}

  /**
   * Retourne le chemin écrit, ou null si l'export a échoué (le run reste valide)
   */
  async export(records: ListingRecord[], bundle: ResolvedBundle): Promise<string | null> {
    const target = path.join(this.exportDir, exportFileName(bundle.filename));
    try {
      await fs.promises.mkdir(this.exportDir, { recursive: true });
      await fs.promises.writeFile(target, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
      await fs.promises.copyFile(target, path.join(this.exportDir, LATEST_EXPORT_NAME));

      this.logger.info(`📝 Export JSON: ${target} (${records.length} inscriptions)`, { component: 'JsonExporter' });
      return target;
    } catch (error) {
      this.logger.warn('⚠️ Export JSON impossible', {
        component: 'JsonExporter',
        target,
        error: describeError(error)
      });
      return null;
    }
  }
}
