import { describeError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { categoryLabel, valueLabel } from '../feed/CodeTables';
import {
  CHARACTERISTIC_COLUMNS,
  FEED_CODES,
  ID_COLUMN,
  LISTING_COLUMNS,
  PHOTO_COLUMNS,
  REMARK_COLUMNS,
  ROOM_COLUMNS,
  UNIT_COLUMNS,
  YEAR_RANGE
} from '../feed/FeedSchema';
import { Characteristic, ListingPhoto, ListingRecord } from '../types/listing';
import { cell, lastCell, Row } from '../utils/csv';

/**
 * Lignes d'une inscription à travers toutes les tables du bundle
 */
export interface ListingSource {
  row: Row;
  remarks: Row[];
  characteristics: Row[];
  photos: Row[];
  units: Row[];
  rooms: Row[];
  addenda: string;
}

export interface RoomCounts {
  rooms: number | null;
  bedrooms: number | null;
  bathrooms: number | null;
}

const DIGITS = /^\d+$/;
const INTEGER = /^[+-]?\d+$/;
const FOUR_DIGITS = /^\d{4}$/;
const BR_MARKUP = /<br\s*\/?>/gi;
const ANY_TAG = /<.*?>/g;
// Repli texte libre: tout ce qui suit le marqueur, jusqu'à la fin de l'addenda
const PROXIMITY_MARKER = /À\s*proximité\s*:?\s*(.+)$/is;
const LIST_SEPARATOR = /[;,]\s*/;

// Au-delà de MAX_SAFE_INTEGER, parseInt perd des chiffres: valeur rejetée
function digitsOrNull(value: string): number | null {
  if (!DIGITS.test(value)) return null;
  const parsed = parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function uniqueInOrder(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (value && !seen.has(value)) {
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}

/**
 * Tri stable sur une clé entière. Retourne null si une clé n'est pas un entier,
 * auquel cas l'appelant garde l'ordre de lecture.
 */
function sortByIntegerKey(rows: Row[], keyOf: (row: Row) => string, emptyValue: number): Row[] | null {
  const keyed: Array<{ key: number; row: Row }> = [];
  for (const row of rows) {
    const raw = keyOf(row);
    if (raw === '') {
      keyed.push({ key: emptyValue, row });
    } else if (INTEGER.test(raw)) {
      keyed.push({ key: parseInt(raw, 10), row });
    } else {
      return null;
    }
  }
  return keyed.sort((a, b) => a.key - b.key).map(entry => entry.row);
}

export function extractPrice(row: Row): number | null {
  return digitsOrNull(cell(row, LISTING_COLUMNS.price));
}

export function extractAddress(row: Row): string {
  const parts = [
    cell(row, LISTING_COLUMNS.civicNumber),
    cell(row, LISTING_COLUMNS.street),
    cell(row, LISTING_COLUMNS.postalCode)
  ].filter(part => part !== '');
  return parts.join(', ');
}

export function extractConstructionYear(row: Row): number | null {
  for (const raw of row) {
    const value = cell([raw], 0);
    if (!FOUR_DIGITS.test(value)) continue;
    const year = parseInt(value, 10);
    if (year >= YEAR_RANGE.min && year <= YEAR_RANGE.max) {
      return year;
    }
  }
  return null;
}

export function extractDescription(remarks: Row[]): string {
  const chosen = remarks.filter(
    row => row.length >= REMARK_COLUMNS.minLength && cell(row, REMARK_COLUMNS.language) === FEED_CODES.descriptionLanguage
  );
  const ordered = sortByIntegerKey(chosen, row => cell(row, REMARK_COLUMNS.sequence), 0) ?? chosen;

  return ordered
    .map(row => lastCell(row))
    .filter(text => text !== '')
    .join(' ')
    .replace(BR_MARKUP, ' ')
    .trim();
}

/**
 * Proximités structurées (catégorie PROX); à défaut, repli sur le texte d'addenda
 */
export function extractProximity(characteristics: Row[], addenda: string): { items: string[]; text: string } {
  const items: string[] = [];

  for (const row of characteristics) {
    if (row.length < CHARACTERISTIC_COLUMNS.minLength) continue;
    if (cell(row, CHARACTERISTIC_COLUMNS.category) !== FEED_CODES.proximityCategory) continue;
    items.push(valueLabel(cell(row, CHARACTERISTIC_COLUMNS.value)));
  }

  if (items.length === 0 && addenda) {
    const match = PROXIMITY_MARKER.exec(addenda);
    const segment = match?.[1];
    if (segment) {
      for (const piece of segment.split(LIST_SEPARATOR)) {
        const item = piece.replace(ANY_TAG, '').trim();
        if (item) items.push(item);
      }
    }
  }

  const unique = uniqueInOrder(items);
  return { items: unique, text: unique.join(', ') };
}

export function extractCharacteristics(rows: Row[]): { items: Characteristic[]; text: string } {
  const seen = new Set<string>();
  const items: Characteristic[] = [];
  const pieces: string[] = [];

  for (const row of rows) {
    if (row.length < CHARACTERISTIC_COLUMNS.minLength) continue;
    const code = cell(row, CHARACTERISTIC_COLUMNS.category);
    if (code === FEED_CODES.proximityCategory) continue;

    const category = categoryLabel(code);
    const value = valueLabel(cell(row, CHARACTERISTIC_COLUMNS.value));
    const key = `${category}\u0000${value}`;
    if (seen.has(key)) continue;
    seen.add(key);

    const detail = cell(row, CHARACTERISTIC_COLUMNS.detail);
    items.push({ category, value });
    pieces.push(`${category}: ${value}${detail ? ` (${detail})` : ''}`);
  }

  return { items, text: pieces.join(', ') };
}

/**
 * Unité principale: séquence "1" après tri; sinon la première unité lue
 */
export function selectPrincipalUnit(units: Row[]): Row | null {
  const sorted = sortByIntegerKey(units, row => cell(row, UNIT_COLUMNS.unitSequence), 999);
  const principal = sorted?.find(row => cell(row, UNIT_COLUMNS.unitSequence) === FEED_CODES.principalUnit);
  return principal ?? units[0] ?? null;
}

export function extractRoomCounts(units: Row[], rooms: Row[]): RoomCounts {
  const principal = selectPrincipalUnit(units);
  let roomCount: number | null = null;
  let bedrooms: number | null = null;

  if (principal && principal.length >= UNIT_COLUMNS.minLength) {
    roomCount = digitsOrNull(cell(principal, UNIT_COLUMNS.rooms));
    bedrooms = digitsOrNull(cell(principal, UNIT_COLUMNS.bedrooms));
  }

  const bathrooms = rooms.filter(
    row =>
      row.length >= ROOM_COLUMNS.minLength &&
      cell(row, ROOM_COLUMNS.unitSequence) === FEED_CODES.principalUnit &&
      cell(row, ROOM_COLUMNS.roomType) === FEED_CODES.bathroomRoomType
  ).length;

  return { rooms: roomCount, bedrooms, bathrooms: bathrooms > 0 ? bathrooms : null };
}

/**
 * Photos triées sur la séquence brute du flux, puis renumérotées 1..N
 */
export function extractPhotos(rows: Row[]): ListingPhoto[] {
  const candidates: Array<{ rawSequence: number; url: string }> = [];

  for (const row of rows) {
    if (row.length < PHOTO_COLUMNS.minLength) continue;
    const url = cell(row, PHOTO_COLUMNS.url);
    if (!url.startsWith('http')) continue;
    candidates.push({ rawSequence: digitsOrNull(cell(row, PHOTO_COLUMNS.sequence)) ?? 0, url });
  }

  return candidates
    .sort((a, b) => a.rawSequence - b.rawSequence)
    .map((candidate, index) => ({ sequence: index + 1, url: candidate.url }));
}

export class RecordExtractor {
  private anomalies = 0;

  constructor(private readonly logger?: StructuredLogger) {}

  /**
   * Chaque champ est calculé indépendamment; un échec donne null/vide, jamais une exception
   */
  extract(source: ListingSource): ListingRecord {
    const listingId = cell(source.row, ID_COLUMN);

    const field = <T>(name: string, fallback: T, compute: () => T): T => {
      try {
        return compute();
      } catch (error) {
        this.anomalies++;
        this.logger?.debug(`Champ ${name} ignoré`, {
          component: 'RecordExtractor',
          listingId,
          error: describeError(error)
        });
        return fallback;
      }
    };

    const proximity = field('proximity', { items: [], text: '' }, () =>
      extractProximity(source.characteristics, source.addenda)
    );
    const characteristics = field('characteristics', { items: [], text: '' }, () =>
      extractCharacteristics(source.characteristics)
    );
    const counts = field<RoomCounts>('rooms', { rooms: null, bedrooms: null, bathrooms: null }, () =>
      extractRoomCounts(source.units, source.rooms)
    );

    return {
      listingId,
      price: field('price', null, () => extractPrice(source.row)),
      address: field('address', '', () => extractAddress(source.row)),
      rooms: counts.rooms,
      bedrooms: counts.bedrooms,
      bathrooms: counts.bathrooms,
      constructionYear: field('constructionYear', null, () => extractConstructionYear(source.row)),
      description: field('description', '', () => extractDescription(source.remarks)),
      proximity: proximity.items,
      proximityText: proximity.text,
      characteristics: characteristics.items,
      characteristicsText: characteristics.text,
      photos: field<ListingPhoto[]>('photos', [], () => extractPhotos(source.photos))
    };
  }

  getAnomalyCount(): number {
    return this.anomalies;
  }
}
