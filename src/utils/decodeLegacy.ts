import * as iconv from 'iconv-lite';

/**
 * Décodage des tables en code page mono-octet.
 * Les octets non définis deviennent U+FFFD au lieu de faire échouer la lecture.
 */

export interface DecodeResult {
  text: string;
  encoding: string;
  replacementChars: number;
}

export function countReplacementChars(text: string): number {
  return (text.match(/\uFFFD/g) || []).length;
}

export function decodeLegacy(buffer: Buffer, encoding: string): DecodeResult {
  if (!iconv.encodingExists(encoding)) {
    throw new Error(`Encodage non supporté: ${encoding}`);
  }

  const text = iconv.decode(buffer, encoding);
  return {
    text,
    encoding,
    replacementChars: countReplacementChars(text)
  };
}
