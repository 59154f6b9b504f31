// Libellés des codes abrégés du flux (catégories et valeurs de caractéristiques)

export const CATEGORY_LABELS: Readonly<Record<string, string>> = Object.freeze({
  ALLE: 'Allée',
  CHAU: 'Mode de chauffage',
  EAU: 'Approvisionnement en eau',
  ENER: 'Énergie pour chauffage',
  FENE: 'Fenestration',
  FOND: 'Fondation',
  PARE: 'Revêtement extérieur',
  SS: 'Sous-sol',
  SYEG: "Système d'égout",
  TFEN: 'Type de fenestration',
  VUE: 'Vue',
  ZONG: 'Zonage',
  PROX: 'Proximité'
});

// Un seul espace de codes pour toutes les catégories: EAU vaut "Vue sur l'eau"
export const VALUE_LABELS: Readonly<Record<string, string>> = Object.freeze({
  NPAV: 'Non pavé',
  PELC: 'Plinthes électriques',
  AMU: 'Municipal',
  ELEC: 'Électricité',
  BOIS: 'BOIS',
  PVC: 'PVC',
  BETO: 'Béton',
  AU: 'Autre',
  VSAN: 'Vide sanitaire',
  EGMU: 'Égout municipal',
  COUL: 'COUL',
  PFEN: 'PFEN',
  EAU: "Vue sur l'eau",
  RES: 'Résidentiel',
  AUTO: 'Autoroute',
  PCYC: 'Piste cyclable',
  PRIM: 'École primaire',
  SEC: 'École secondaire',
  TRSP: 'Transport en commun'
});

function lookup(table: Readonly<Record<string, string>>, code: string): string {
  return Object.prototype.hasOwnProperty.call(table, code) ? table[code] ?? code : code;
}

export function categoryLabel(code: string): string {
  return lookup(CATEGORY_LABELS, code);
}

export function valueLabel(code: string): string {
  return lookup(VALUE_LABELS, code);
}
