import { Database } from 'sqlite3';
import { StructuredLogger } from '../core/StructuredLogger';
import { toError } from '../core/errors';
import {
  CatalogEntry,
  Characteristic,
  FetchRunResult,
  ListingFields,
  ListingPhoto,
  ListingRecord,
  ListingStatus
} from '../types/listing';
import { all, exec, get, run, SqlParam } from './sqlite';

export interface UpsertOutcome {
  entry: CatalogEntry;
  created: boolean;
}

/**
 * Opérations disponibles à l'intérieur d'une transaction de run
 */
export interface CatalogSession {
  upsert(record: ListingRecord, seenAt: string): Promise<UpsertOutcome>;
  replacePhotos(listingId: string, photos: ListingPhoto[]): Promise<void>;
  markSoldExcept(seenIds: ReadonlySet<string>, soldAt: string): Promise<number>;
  appendRunResult(result: FetchRunResult): Promise<void>;
}

export interface ListingCatalog {
  withTransaction<T>(work: (session: CatalogSession) => Promise<T>): Promise<T>;
}

interface ListingRow {
  listing_id: string;
  slug: string;
  price: number | null;
  address: string;
  rooms: number | null;
  bedrooms: number | null;
  bathrooms: number | null;
  construction_year: number | null;
  description: string;
  proximity_json: string;
  proximity_text: string;
  characteristics_json: string;
  characteristics_text: string;
  status: string;
  sold_at: string | null;
  first_seen_at: string;
  last_seen_at: string;
  updated_at: string;
}

interface FetchRunRow {
  run_id: string;
  created_at: string;
  file_date: string;
  source_url: string;
  source_name: string;
  items_total: number;
  items_added: number;
  items_updated: number;
  items_marked_sold: number;
  duration_seconds: number;
}

const SLUG_MAX_LENGTH = 64;
// Limite de variables SQLite par requête
const SOLD_CHUNK_SIZE = 500;

export function slugFor(listingId: string): string {
  const slug = `listing-${listingId}`
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.slice(0, SLUG_MAX_LENGTH).replace(/-+$/, '');
}

function parseStringList(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}

function isCharacteristic(value: unknown): value is Characteristic {
  return (
    typeof value === 'object' &&
    value !== null &&
    'category' in value &&
    'value' in value &&
    typeof value.category === 'string' &&
    typeof value.value === 'string'
  );
}

function parseCharacteristics(json: string): Characteristic[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter(isCharacteristic) : [];
}

function toStatus(value: string): ListingStatus {
  return value === 'SOLD' ? 'SOLD' : 'ACTIVE';
}

function toEntry(row: ListingRow): CatalogEntry {
  return {
    listingId: row.listing_id,
    slug: row.slug,
    price: row.price,
    address: row.address,
    rooms: row.rooms,
    bedrooms: row.bedrooms,
    bathrooms: row.bathrooms,
    constructionYear: row.construction_year,
    description: row.description,
    proximity: parseStringList(row.proximity_json),
    proximityText: row.proximity_text,
    characteristics: parseCharacteristics(row.characteristics_json),
    characteristicsText: row.characteristics_text,
    status: toStatus(row.status),
    soldAt: row.sold_at,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    updatedAt: row.updated_at
  };
}

function toRunResult(row: FetchRunRow): FetchRunResult {
  return {
    runId: row.run_id,
    createdAt: row.created_at,
    fileDate: row.file_date,
    sourceUrl: row.source_url,
    sourceName: row.source_name,
    itemsTotal: row.items_total,
    itemsAdded: row.items_added,
    itemsUpdated: row.items_updated,
    itemsMarkedSold: row.items_marked_sold,
    durationSeconds: row.duration_seconds
  };
}

function toFields(record: ListingRecord): ListingFields {
  return {
    price: record.price,
    address: record.address,
    rooms: record.rooms,
    bedrooms: record.bedrooms,
    bathrooms: record.bathrooms,
    constructionYear: record.constructionYear,
    description: record.description,
    proximity: record.proximity,
    proximityText: record.proximityText,
    characteristics: record.characteristics,
    characteristicsText: record.characteristicsText
  };
}

function mutableFields(record: ListingRecord): SqlParam[] {
  return [
    record.price,
    record.address,
    record.rooms,
    record.bedrooms,
    record.bathrooms,
    record.constructionYear,
    record.description,
    JSON.stringify(record.proximity),
    record.proximityText,
    JSON.stringify(record.characteristics),
    record.characteristicsText
  ];
}

class SqliteCatalogSession implements CatalogSession {
  constructor(private readonly db: Database) {}

  async upsert(record: ListingRecord, seenAt: string): Promise<UpsertOutcome> {
    const existing = await get<ListingRow>(this.db, 'SELECT * FROM listings WHERE listing_id = ?', [record.listingId]);

    if (!existing) {
      await run(
        this.db,
        `INSERT INTO listings (
           listing_id, slug, price, address, rooms, bedrooms, bathrooms, construction_year,
           description, proximity_json, proximity_text, characteristics_json, characteristics_text,
           status, sold_at, first_seen_at, last_seen_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'ACTIVE', NULL, ?, ?, ?)`,
        [record.listingId, slugFor(record.listingId), ...mutableFields(record), seenAt, seenAt, seenAt]
      );
    } else {
      // Réapparition = réactivation, quel que soit le statut précédent
      await run(
        this.db,
        `UPDATE listings SET
           price = ?, address = ?, rooms = ?, bedrooms = ?, bathrooms = ?, construction_year = ?,
           description = ?, proximity_json = ?, proximity_text = ?, characteristics_json = ?,
           characteristics_text = ?, status = 'ACTIVE', sold_at = NULL, last_seen_at = ?, updated_at = ?
         WHERE listing_id = ?`,
        [...mutableFields(record), seenAt, seenAt, record.listingId]
      );
    }

    return {
      created: !existing,
      entry: {
        listingId: record.listingId,
        ...toFields(record),
        slug: existing?.slug ?? slugFor(record.listingId),
        status: 'ACTIVE',
        soldAt: null,
        firstSeenAt: existing?.first_seen_at ?? seenAt,
        lastSeenAt: seenAt,
        updatedAt: seenAt
      }
    };
  }

  async replacePhotos(listingId: string, photos: ListingPhoto[]): Promise<void> {
    await run(this.db, 'DELETE FROM listing_photos WHERE listing_id = ?', [listingId]);
    for (const photo of photos) {
      await run(
        this.db,
        'INSERT INTO listing_photos (listing_id, sequence, url) VALUES (?, ?, ?)',
        [listingId, photo.sequence, photo.url]
      );
    }
  }

  async markSoldExcept(seenIds: ReadonlySet<string>, soldAt: string): Promise<number> {
    const active = await all<{ listing_id: string }>(this.db, "SELECT listing_id FROM listings WHERE status = 'ACTIVE'");
    const missing = active.map(row => row.listing_id).filter(id => !seenIds.has(id));

    let marked = 0;
    for (let i = 0; i < missing.length; i += SOLD_CHUNK_SIZE) {
      const chunk = missing.slice(i, i + SOLD_CHUNK_SIZE);
      const placeholders = chunk.map(() => '?').join(', ');
      const outcome = await run(
        this.db,
        `UPDATE listings SET status = 'SOLD', sold_at = ?, updated_at = ?
         WHERE status = 'ACTIVE' AND listing_id IN (${placeholders})`,
        [soldAt, soldAt, ...chunk]
      );
      marked += outcome.changes;
    }
    return marked;
  }

  async appendRunResult(result: FetchRunResult): Promise<void> {
    await run(
      this.db,
      `INSERT INTO fetch_runs (
         run_id, created_at, file_date, source_url, source_name,
         items_total, items_added, items_updated, items_marked_sold, duration_seconds
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        result.runId,
        result.createdAt,
        result.fileDate,
        result.sourceUrl,
        result.sourceName,
        result.itemsTotal,
        result.itemsAdded,
        result.itemsUpdated,
        result.itemsMarkedSold,
        result.durationSeconds
      ]
    );
  }
}

/**
 * Catalogue SQLite. Une transaction IMMEDIATE par run: tout est validé ou rien.
 */
export class SqliteListingCatalog implements ListingCatalog {
  constructor(
    private readonly db: Database,
    private readonly logger: StructuredLogger
  ) {}

  async withTransaction<T>(work: (session: CatalogSession) => Promise<T>): Promise<T> {
    await exec(this.db, 'BEGIN IMMEDIATE');
    try {
      const result = await work(new SqliteCatalogSession(this.db));
      await exec(this.db, 'COMMIT');
      return result;
    } catch (error) {
      try {
        await exec(this.db, 'ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('❌ ROLLBACK impossible', toError(rollbackError), { component: 'ListingCatalog' });
      }
      throw error;
    }
  }

  async findEntry(listingId: string): Promise<CatalogEntry | null> {
    const row = await get<ListingRow>(this.db, 'SELECT * FROM listings WHERE listing_id = ?', [listingId]);
    return row ? toEntry(row) : null;
  }

  async listEntries(): Promise<CatalogEntry[]> {
    const rows = await all<ListingRow>(this.db, 'SELECT * FROM listings ORDER BY listing_id');
    return rows.map(toEntry);
  }

  async listPhotos(listingId: string): Promise<ListingPhoto[]> {
    return all<ListingPhoto>(
      this.db,
      'SELECT sequence, url FROM listing_photos WHERE listing_id = ? ORDER BY sequence',
      [listingId]
    );
  }

  async listActiveIds(): Promise<string[]> {
    const rows = await all<{ listing_id: string }>(
      this.db,
      "SELECT listing_id FROM listings WHERE status = 'ACTIVE' ORDER BY listing_id"
    );
    return rows.map(row => row.listing_id);
  }

  async listRuns(): Promise<FetchRunResult[]> {
    const rows = await all<FetchRunRow>(this.db, 'SELECT * FROM fetch_runs ORDER BY created_at, rowid');
    return rows.map(toRunResult);
  }
}
