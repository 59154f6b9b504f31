/**
 * Contrat de format du flux: noms d'entrées du ZIP, positions de colonnes et
 * codes significatifs. Les tables n'ont pas d'en-tête; toute la lecture passe
 * par ces offsets.
 */

export const TABLE_ENTRIES = {
  listings: 'INSCRIPTIONS.TXT',
  remarks: 'REMARQUES.TXT',
  characteristics: 'CARACTERISTIQUES.TXT',
  photos: 'PHOTOS.TXT',
  units: 'UNITES_DETAILLEES.TXT',
  rooms: 'PIECES_UNITES.TXT'
} as const;

export type TableName = keyof typeof TABLE_ENTRIES;

export const TABLE_NAMES: readonly TableName[] = ['listings', 'remarks', 'characteristics', 'photos', 'units', 'rooms'];

// Table texte libre, décodée à la demande par inscription
export const ADDENDA_ENTRY = 'ADDENDA.TXT';

export const FEED_ENCODING = 'windows-1252';

// Toutes les tables: la colonne 0 porte l'identifiant d'inscription
export const ID_COLUMN = 0;

export const LISTING_COLUMNS = {
  price: 6,
  civicNumber: 25,
  street: 27,
  postalCode: 29
} as const;

// Le texte est toujours la dernière colonne
export const REMARK_COLUMNS = {
  sequence: 1,
  language: 2,
  minLength: 7
} as const;

export const CHARACTERISTIC_COLUMNS = {
  category: 1,
  value: 2,
  detail: 3,
  minLength: 3
} as const;

// id, seq, _, code pièce, _, _, url, id média, horodatage
export const PHOTO_COLUMNS = {
  sequence: 1,
  url: 6,
  minLength: 7
} as const;

export const UNIT_COLUMNS = {
  unitSequence: 1,
  rooms: 3,
  bedrooms: 4,
  minLength: 5
} as const;

export const ROOM_COLUMNS = {
  unitSequence: 1,
  roomType: 3,
  minLength: 4
} as const;

export const FEED_CODES = {
  descriptionLanguage: 'F',
  proximityCategory: 'PROX',
  bathroomRoomType: 'SDB',
  principalUnit: '1'
} as const;

export const YEAR_RANGE = { min: 1800, max: 2035 } as const;

/**
 * Construit un enregistrement complet indexé par nom de table
 */
export function mapTables<T>(fn: (name: TableName) => T): Record<TableName, T> {
  return {
    listings: fn('listings'),
    remarks: fn('remarks'),
    characteristics: fn('characteristics'),
    photos: fn('photos'),
    units: fn('units'),
    rooms: fn('rooms')
  };
}
