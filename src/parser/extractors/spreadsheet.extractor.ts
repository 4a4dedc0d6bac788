import * as XLSX from 'xlsx';
import { EmailAttachment, ExtractionResult } from '../../common/interfaces';
import { errorMessage } from '../../common/errors';
import { decodeFailure, textResult } from './result';

// Helper pour convertir en string de manière sécurisée
const safeString = (value: unknown): string => {
  if (value === null || value === undefined) return '';
  return String(value);
};

/**
 * Lignes d'une feuille, valeurs affichées (nombres et dates formatés)
 */
export function sheetToLines(sheet: XLSX.WorkSheet): string[] {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, blankrows: false });

  return rows
    .map((row) => row.map(safeString).filter((cell) => cell.trim() !== '').join('\t'))
    .filter((line) => line !== '');
}

export async function extractSpreadsheet(attachment: EmailAttachment): Promise<ExtractionResult> {
  try {
    const workbook = XLSX.read(attachment.rawBytes, { type: 'buffer' });

    // Feuilles dans l'ordre du classeur, cellules ligne par ligne
    const sheets = workbook.SheetNames.map((sheetName) => {
      const sheet = workbook.Sheets[sheetName];
      return sheet ? sheetToLines(sheet).join('\n') : '';
    });

    return textResult(sheets.filter((text) => text !== '').join('\n\n'));
  } catch (error) {
    return decodeFailure(`classeur illisible: ${errorMessage(error)}`);
  }
}
