import * as path from 'path';

export type ExtractorFormat = 'text' | 'csv' | 'pdf' | 'word' | 'spreadsheet' | 'zip';

const EXTENSION_FORMATS: Record<string, ExtractorFormat> = {
  '.txt': 'text',
  '.text': 'text',
  '.log': 'text',
  '.md': 'text',
  '.csv': 'csv',
  '.pdf': 'pdf',
  '.docx': 'word',
  '.xlsx': 'spreadsheet',
  '.xlsm': 'spreadsheet',
  '.xls': 'spreadsheet',
  '.ods': 'spreadsheet',
  '.zip': 'zip',
};

const MIME_FORMATS: Record<string, ExtractorFormat> = {
  'text/plain': 'text',
  'text/csv': 'csv',
  'application/csv': 'csv',
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'word',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'spreadsheet',
  'application/vnd.ms-excel': 'spreadsheet',
  'application/zip': 'zip',
  'application/x-zip-compressed': 'zip',
};

// Extensions génériques qui ne disent rien du contenu: le type MIME décide
const AMBIGUOUS_EXTENSIONS = new Set(['', '.bin', '.dat', '.att']);

export function normalizeMimeType(mimeHint: string): string {
  return mimeHint.split(';')[0].trim().toLowerCase();
}

/**
 * Choisit l'extracteur d'une pièce jointe: extension d'abord,
 * type MIME seulement si l'extension est absente ou générique.
 * Une extension inconnue donne null (non supporté).
 */
export function selectFormat(filename: string, mimeHint: string): ExtractorFormat | null {
  const extension = path.extname(filename.trim()).toLowerCase();

  if (!AMBIGUOUS_EXTENSIONS.has(extension)) {
    return EXTENSION_FORMATS[extension] ?? null;
  }

  return MIME_FORMATS[normalizeMimeType(mimeHint)] ?? null;
}
