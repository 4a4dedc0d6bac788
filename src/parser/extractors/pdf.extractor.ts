import pdfParse from 'pdf-parse';
import { EmailAttachment, ExtractionResult } from '../../common/interfaces';
import { errorMessage } from '../../common/errors';
import { decodeFailure, textResult } from './result';

export type PdfTextParser = (data: Buffer) => Promise<{ text: string; numpages: number }>;

/**
 * pdf-parse rend les pages dans l'ordre et remplace une page en échec
 * par une chaîne vide: le document reste lisible partiellement.
 */
export function createPdfExtractor(parse: PdfTextParser) {
  return async (attachment: EmailAttachment): Promise<ExtractionResult> => {
    try {
      const data = await parse(attachment.rawBytes);
      const text = data.text.replace(/\n{3,}/g, '\n\n').trim();
      return textResult(text);
    } catch (error) {
      // PDF corrompu, chiffré ou tronqué
      return decodeFailure(`PDF illisible: ${errorMessage(error)}`);
    }
  };
}

export const extractPdf = createPdfExtractor((data) => pdfParse(data));
