import { TextDecoder } from 'util';
import { DecodeError } from '../../common/errors';

/**
 * Décode des octets en texte: BOM explicite, puis UTF-8 strict,
 * puis windows-1252 (accepte n'importe quel octet).
 */
export function decodeText(bytes: Buffer, filename: string): string {
  if (bytes.length === 0) return '';

  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return new TextDecoder('utf-8').decode(bytes);
  }
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return new TextDecoder('utf-16le').decode(bytes);
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return new TextDecoder('utf-16be').decode(bytes);
  }

  // Un octet NUL sans BOM UTF-16: binaire déguisé en texte
  if (bytes.includes(0)) {
    throw new DecodeError(filename, 'contenu binaire (octets NUL) dans un fichier texte');
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return new TextDecoder('windows-1252').decode(bytes);
  }
}
