import * as unzipper from 'unzipper';
import { ArchiveError, describeError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { cleanField, lastCell, parseDelimited, Row } from '../utils/csv';
import { decodeLegacy } from '../utils/decodeLegacy';
import { ADDENDA_ENTRY, FEED_ENCODING, ID_COLUMN, mapTables, TABLE_ENTRIES, TABLE_NAMES, TableName } from './FeedSchema';

/**
 * Table décodée. `present: false` = entrée absente du ZIP, traitée comme vide.
 */
export interface DecodedTable {
  name: TableName;
  entry: string;
  present: boolean;
  rows: Row[];
  replacementChars: number;
}

export interface BundleSummary {
  tables: Record<TableName, { present: boolean; rows: number }>;
  hasAddenda: boolean;
}

type ZipFile = unzipper.File;

const BR_MARKUP = /<br\s*\/?>/gi;

export class DecodedBundle {
  private addendaIndex: Map<string, string[]> | null = null;

  constructor(
    readonly tables: Record<TableName, DecodedTable>,
    private readonly addendaBytes: Buffer | null,
    private readonly encoding: string = FEED_ENCODING
  ) {}

  rows(name: TableName): Row[] {
    return this.tables[name].rows;
  }

  hasTable(name: TableName): boolean {
    return this.tables[name].present;
  }

  /**
   * Texte d'addenda d'une inscription. La table est décodée au premier appel
   * seulement, puis indexée par identifiant.
   */
  async addendaFor(listingId: string): Promise<string> {
    const index = await this.loadAddenda();
    const chunks = index.get(listingId);
    if (!chunks || chunks.length === 0) {
      return '';
    }
    return chunks.join(' ').replace(BR_MARKUP, ' ');
  }

  summary(): BundleSummary {
    return {
      tables: mapTables(name => ({ present: this.tables[name].present, rows: this.tables[name].rows.length })),
      hasAddenda: this.addendaBytes !== null
    };
  }

  private async loadAddenda(): Promise<Map<string, string[]>> {
    if (this.addendaIndex) {
      return this.addendaIndex;
    }

    const index = new Map<string, string[]>();
    if (this.addendaBytes) {
      const { text } = decodeLegacy(this.addendaBytes, this.encoding);
      for (const row of parseDelimited(text)) {
        if (row.length === 0 || !row[row.length - 1]) continue;
        const id = cleanField(row[ID_COLUMN]);
        const chunk = lastCell(row);
        const bucket = index.get(id);
        if (bucket) {
          bucket.push(chunk);
        } else {
          index.set(id, [chunk]);
        }
      }
    }

    this.addendaIndex = index;
    return index;
  }
}

export class ArchiveDecoder {
  constructor(
    private readonly logger: StructuredLogger,
    private readonly encoding: string = FEED_ENCODING
  ) {}

  async decode(bytes: Buffer): Promise<DecodedBundle> {
    let entries: ZipFile[];
    try {
      entries = (await unzipper.Open.buffer(bytes)).files;
    } catch (error) {
      throw new ArchiveError(`Bundle illisible (${bytes.length} octets): pas une archive ZIP valide`, error);
    }

    // Noms d'entrées sensibles à la casse
    const files = new Map<string, ZipFile>();
    for (const file of entries) {
      if (file.type === 'File') {
        files.set(file.path, file);
      }
    }

    // Toute l'inflation se fait ici, avant la transaction du run
    const buffers = new Map<TableName, Buffer>();
    for (const name of TABLE_NAMES) {
      const file = files.get(TABLE_ENTRIES[name]);
      if (file) {
        buffers.set(name, await this.readEntry(file));
      }
    }
    const tables = mapTables(name => this.decodeTable(name, buffers.get(name)));

    const addendaFile = files.get(ADDENDA_ENTRY);
    const addendaBytes = addendaFile ? await this.readEntry(addendaFile) : null;

    const bundle = new DecodedBundle(tables, addendaBytes, this.encoding);
    const missing = TABLE_NAMES.filter(name => !tables[name].present);
    if (missing.length > 0) {
      this.logger.warn('Tables absentes du bundle (traitées comme vides)', {
        component: 'ArchiveDecoder',
        missing: missing.map(name => TABLE_ENTRIES[name])
      });
    }

    return bundle;
  }

  private async readEntry(file: ZipFile): Promise<Buffer> {
    try {
      return await file.buffer();
    } catch (error) {
      throw new ArchiveError(`Entrée ${file.path} illisible: ${describeError(error)}`, error);
    }
  }

  private decodeTable(name: TableName, buffer: Buffer | undefined): DecodedTable {
    const entry = TABLE_ENTRIES[name];
    if (!buffer) {
      return { name, entry, present: false, rows: [], replacementChars: 0 };
    }

    const { text, replacementChars } = decodeLegacy(buffer, this.encoding);
    const rows = parseDelimited(text);

    if (replacementChars > 0) {
      this.logger.debug(`Octets non décodables remplacés dans ${entry}`, {
        component: 'ArchiveDecoder',
        replacementChars
      });
    }

    return { name, entry, present: true, rows, replacementChars };
  }
}
