import { cell, cleanField, groupById, lastCell, parseDelimited } from '../../utils/csv';

describe('csv', () => {
  describe('parseDelimited', () => {
    it('devrait gérer guillemets doublés, virgules et retours de ligne entre guillemets', () => {
      const text = '"a","b""c"\r\n"d,e","f\ng"\n\n';

      expect(parseDelimited(text)).toEqual([
        ['a', 'b"c'],
        ['d,e', 'f\ng']
      ]);
    });

    it('devrait ignorer les lignes vides', () => {
      expect(parseDelimited('a,b\n\n\r\nc,d')).toEqual([
        ['a', 'b'],
        ['c', 'd']
      ]);
    });

    it('devrait accepter CR seul comme fin de ligne', () => {
      expect(parseDelimited('a\rb')).toEqual([['a'], ['b']]);
    });

    it('devrait garder la dernière ligne sans fin de ligne', () => {
      expect(parseDelimited('x,y')).toEqual([['x', 'y']]);
    });

    it('devrait garder un champ final vide entre guillemets', () => {
      expect(parseDelimited('a,""')).toEqual([['a', '']]);
    });

    it('should keep empty unquoted fields', () => {
      expect(parseDelimited('1,,3')).toEqual([['1', '', '3']]);
    });

    it('should support another delimiter', () => {
      expect(parseDelimited('a;"b;c"', ';')).toEqual([['a', 'b;c']]);
    });
  });

  describe('cleanField / cell / lastCell', () => {
    it('devrait retirer espaces puis guillemets résiduels', () => {
      expect(cleanField('  "abc"  ')).toBe('abc');
      expect(cleanField(' a b ')).toBe('a b');
      expect(cleanField(undefined)).toBe('');
    });

    it('devrait retourner une chaîne vide hors limites', () => {
      expect(cell(['a'], 5)).toBe('');
      expect(cell([' x '], 0)).toBe('x');
    });

    it('devrait lire la dernière colonne', () => {
      expect(lastCell([' x ', ' "y" '])).toBe('y');
      expect(lastCell([])).toBe('');
    });
  });

  describe('groupById', () => {
    it('devrait regrouper par identifiant nettoyé en gardant l\'ordre', () => {
      const groups = groupById([
        ['1', 'a'],
        ['2', 'b'],
        [' 1 ', 'c'],
        []
      ]);

      expect(groups.get('1')).toEqual([
        ['1', 'a'],
        [' 1 ', 'c']
      ]);
      expect(groups.get('2')).toEqual([['2', 'b']]);
      expect(groups.size).toBe(2);
    });
  });
});
