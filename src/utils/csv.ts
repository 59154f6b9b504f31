/**
 * Lecteur CSV minimal pour les tables du flux: champs séparés par virgule,
 * guillemets doublés, retours de ligne permis entre guillemets.
 */

export type Row = string[];

function isBlankRow(row: Row): boolean {
  return row.length === 1 && row[0] === '';
}

export function parseDelimited(text: string, delimiter: string = ','): Row[] {
  const rows: Row[] = [];
  let row: Row = [];
  let field = '';
  let inQuotes = false;
  let quotedField = false;

  const endField = () => {
    row.push(field);
    field = '';
    quotedField = false;
  };

  const endRow = () => {
    endField();
    if (!isBlankRow(row)) {
      rows.push(row);
    }
    row = [];
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index] ?? '';

    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '' && !quotedField) {
      inQuotes = true;
      quotedField = true;
      continue;
    }

    if (char === delimiter) {
      endField();
      continue;
    }

    if (char === '\r' || char === '\n') {
      if (char === '\r' && text[index + 1] === '\n') {
        index += 1;
      }
      endRow();
      continue;
    }

    field += char;
  }

  if (field !== '' || row.length > 0 || quotedField) {
    endRow();
  }

  return rows;
}

/**
 * Valeur de cellule nettoyée: espaces puis guillemets résiduels retirés aux extrémités
 */
export function cleanField(value: string | undefined): string {
  if (value === undefined) return '';
  return value.trim().replace(/^"+|"+$/g, '');
}

export function cell(row: Row, index: number): string {
  return cleanField(row[index]);
}

export function lastCell(row: Row): string {
  return cleanField(row[row.length - 1]);
}

/**
 * Regroupe les lignes d'une table auxiliaire par identifiant (colonne 0)
 */
export function groupById(rows: Row[]): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    if (row.length === 0) continue;
    const id = cleanField(row[0]);
    const bucket = groups.get(id);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(id, [row]);
    }
  }
  return groups;
}
