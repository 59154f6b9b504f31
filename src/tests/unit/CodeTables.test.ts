import { CATEGORY_LABELS, categoryLabel, VALUE_LABELS, valueLabel } from '../../feed/CodeTables';

describe('CodeTables', () => {
  it('devrait traduire les codes connus', () => {
    expect(categoryLabel('CHAU')).toBe('Mode de chauffage');
    expect(categoryLabel('SYEG')).toBe("Système d'égout");
    expect(valueLabel('AUTO')).toBe('Autoroute');
    expect(valueLabel('PRIM')).toBe('École primaire');
  });

  it('devrait laisser passer les codes inconnus', () => {
    expect(categoryLabel('XYZ')).toBe('XYZ');
    expect(valueLabel('')).toBe('');
  });

  it('should not resolve inherited object keys', () => {
    expect(categoryLabel('toString')).toBe('toString');
    expect(valueLabel('constructor')).toBe('constructor');
  });

  it('should expose frozen tables', () => {
    expect(Object.isFrozen(CATEGORY_LABELS)).toBe(true);
    expect(Object.isFrozen(VALUE_LABELS)).toBe(true);
  });
});
