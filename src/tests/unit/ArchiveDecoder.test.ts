import { ArchiveError } from '../../core/errors';
import { ArchiveDecoder } from '../../feed/ArchiveDecoder';
import * as decodeModule from '../../utils/decodeLegacy';
import { buildBundle, corruptEntry, listingRow, remarkRow } from '../helpers/bundleFixture';
import { createTestLogger } from '../helpers/testDb';

describe('ArchiveDecoder', () => {
  const logger = createTestLogger();
  let decoder: ArchiveDecoder;

  beforeEach(() => {
    jest.restoreAllMocks();
    decoder = new ArchiveDecoder(logger);
  });

  it('devrait décoder les tables présentes en windows-1252', async () => {
    const listing = listingRow('1001', { street: "Rue de l'Église", price: '250000' });
    const bytes = buildBundle({
      'INSCRIPTIONS.TXT': [listing],
      'REMARQUES.TXT': [remarkRow('1001', '1', 'F', 'Près du fleuve, "vue" dégagée')]
    });

    const bundle = await decoder.decode(bytes);

    expect(bundle.rows('listings')).toEqual([listing]);
    expect(bundle.rows('remarks')).toEqual([remarkRow('1001', '1', 'F', 'Près du fleuve, "vue" dégagée')]);
    expect(bundle.hasTable('listings')).toBe(true);
    expect(bundle.tables.listings.replacementChars).toBe(0);
  });

  it('devrait traiter les tables absentes comme vides et le signaler', async () => {
    const warn = jest.spyOn(logger, 'warn');
    const bundle = await decoder.decode(buildBundle({ 'INSCRIPTIONS.TXT': [listingRow('1')] }));

    expect(bundle.hasTable('photos')).toBe(false);
    expect(bundle.rows('photos')).toEqual([]);
    expect(warn).toHaveBeenCalledWith('Tables absentes du bundle (traitées comme vides)', {
      component: 'ArchiveDecoder',
      missing: [
        'REMARQUES.TXT',
        'CARACTERISTIQUES.TXT',
        'PHOTOS.TXT',
        'UNITES_DETAILLEES.TXT',
        'PIECES_UNITES.TXT'
      ]
    });
  });

  it('devrait respecter la casse des noms d\'entrées', async () => {
    const bundle = await decoder.decode(buildBundle({ 'inscriptions.txt': [listingRow('1')] }));
    expect(bundle.hasTable('listings')).toBe(false);
  });

  it('devrait lever ArchiveError sur des octets qui ne sont pas un ZIP', async () => {
    await expect(decoder.decode(Buffer.from('pas une archive'))).rejects.toBeInstanceOf(ArchiveError);
  });

  describe('entrée corrompue', () => {
    const listings = Array.from({ length: 20 }, (_, i) => listingRow(String(1000 + i), { price: '250000' }));

    it('devrait lever ArchiveError nommant la table illisible', async () => {
      const bytes = corruptEntry(buildBundle({ 'INSCRIPTIONS.TXT': listings }), 'INSCRIPTIONS.TXT');

      const error = await decoder.decode(bytes).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ArchiveError);
      if (error instanceof ArchiveError) {
        expect(error.message).toMatch(/^Entrée INSCRIPTIONS\.TXT illisible: /);
        expect(error.cause).toBeInstanceOf(Error);
      }
    });

    it('devrait lire l\'addenda dès le décodage, hors de la réconciliation', async () => {
      const addenda = Array.from({ length: 20 }, (_, i) => [String(1000 + i), '1', 'À proximité: école, parc']);
      const bytes = corruptEntry(
        buildBundle({ 'INSCRIPTIONS.TXT': listings, 'ADDENDA.TXT': addenda }),
        'ADDENDA.TXT'
      );

      await expect(decoder.decode(bytes)).rejects.toThrow(/^Entrée ADDENDA\.TXT illisible: /);
      await expect(decoder.decode(bytes)).rejects.toBeInstanceOf(ArchiveError);
    });
  });

  it('devrait résumer les tables et la présence d\'addenda', async () => {
    const bundle = await decoder.decode(
      buildBundle({
        'INSCRIPTIONS.TXT': [listingRow('1'), listingRow('2')],
        'ADDENDA.TXT': [['1', '1', 'texte']]
      })
    );

    const summary = bundle.summary();
    expect(summary.tables.listings).toEqual({ present: true, rows: 2 });
    expect(summary.tables.rooms).toEqual({ present: false, rows: 0 });
    expect(summary.hasAddenda).toBe(true);
  });

  describe('addendaFor', () => {
    it('devrait joindre les morceaux non vides et remplacer <br>', async () => {
      const bundle = await decoder.decode(
        buildBundle({
          'INSCRIPTIONS.TXT': [listingRow('7')],
          'ADDENDA.TXT': [
            ['7', '1', 'Première partie<br/>'],
            ['7', '2', 'suite'],
            ['8', '1', ''],
            ['7', '3', '']
          ]
        })
      );

      expect(await bundle.addendaFor('7')).toBe('Première partie  suite');
      expect(await bundle.addendaFor('8')).toBe('');
      expect(await bundle.addendaFor('9')).toBe('');
    });

    it('devrait décoder la table d\'addenda une seule fois', async () => {
      const decode = jest.spyOn(decodeModule, 'decodeLegacy');
      const bundle = await decoder.decode(
        buildBundle({
          'INSCRIPTIONS.TXT': [listingRow('7')],
          'ADDENDA.TXT': [['7', '1', 'texte']]
        })
      );
      const afterTables = decode.mock.calls.length;

      await bundle.addendaFor('7');
      await bundle.addendaFor('8');

      expect(afterTables).toBe(1);
      expect(decode).toHaveBeenCalledTimes(2);
    });

    it('should return an empty string without addenda entry', async () => {
      const bundle = await decoder.decode(buildBundle({ 'INSCRIPTIONS.TXT': [listingRow('7')] }));
      expect(await bundle.addendaFor('7')).toBe('');
    });
  });
});
