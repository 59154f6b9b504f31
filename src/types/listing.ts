// Types du domaine: inscription extraite, entrée de catalogue, résultat de run

export type ListingStatus = 'ACTIVE' | 'SOLD';

export interface Characteristic {
  category: string;
  value: string;
}

export interface ListingPhoto {
  sequence: number; // 1..N, recalculé à chaque écriture
  url: string;
}

/**
 * Inscription normalisée, produite pour un identifiant lors d'un run
 */
export interface ListingRecord {
  listingId: string;
  price: number | null;
  address: string;
  rooms: number | null;
  bedrooms: number | null;
  bathrooms: number | null;
  constructionYear: number | null;
  description: string;
  proximity: string[];
  proximityText: string;
  characteristics: Characteristic[];
  characteristicsText: string;
  photos: ListingPhoto[];
}

export type ListingFields = Omit<ListingRecord, 'listingId' | 'photos'>;

/**
 * Entrée persistante du catalogue (les photos sont dans une table enfant)
 */
export interface CatalogEntry extends ListingFields {
  listingId: string;
  slug: string;
  status: ListingStatus;
  soldAt: string | null;
  firstSeenAt: string;
  lastSeenAt: string | null;
  updatedAt: string;
}

export interface ResolvedBundle {
  url: string;
  date: string; // YYYY-MM-DD
  filename: string;
}

/**
 * Trace d'audit d'un run, en ajout seulement
 */
export interface FetchRunResult {
  runId: string;
  createdAt: string;
  fileDate: string | null;
  sourceUrl: string;
  sourceName: string;
  itemsTotal: number;
  itemsAdded: number;
  itemsUpdated: number;
  itemsMarkedSold: number;
  durationSeconds: number;
}
