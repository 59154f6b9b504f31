import { DecodedBundle } from '../feed/ArchiveDecoder';
import { ID_COLUMN } from '../feed/FeedSchema';
import { ListingRecord } from '../types/listing';
import { cell, groupById, Row } from '../utils/csv';
import { RecordExtractor } from './RecordExtractor';

/**
 * Parcourt les lignes d'inscription dans l'ordre du flux et produit un
 * ListingRecord par ligne d'identifiant non vide. Les tables enfants sont
 * regroupées par identifiant une seule fois.
 */
export async function* iterateListings(
  bundle: DecodedBundle,
  extractor: RecordExtractor,
  onSkippedRow?: (row: Row) => void
): AsyncGenerator<ListingRecord> {
  const remarks = groupById(bundle.rows('remarks'));
  const characteristics = groupById(bundle.rows('characteristics'));
  const photos = groupById(bundle.rows('photos'));
  const units = groupById(bundle.rows('units'));
  const rooms = groupById(bundle.rows('rooms'));

  for (const row of bundle.rows('listings')) {
    const listingId = cell(row, ID_COLUMN);
    if (!listingId) {
      onSkippedRow?.(row);
      continue;
    }

    yield extractor.extract({
      row,
      remarks: remarks.get(listingId) ?? [],
      characteristics: characteristics.get(listingId) ?? [],
      photos: photos.get(listingId) ?? [],
      units: units.get(listingId) ?? [],
      rooms: rooms.get(listingId) ?? [],
      addenda: await bundle.addendaFor(listingId)
    });
  }
}
