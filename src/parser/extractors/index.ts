import { EmailAttachment, ExtractionResult } from '../../common/interfaces';
import { ExtractorFormat } from '../format-dispatch';
import { extractText } from './text.extractor';
import { extractPdf } from './pdf.extractor';
import { extractWord } from './word.extractor';
import { extractSpreadsheet } from './spreadsheet.extractor';
import { extractZipListing } from './zip.extractor';

export type Extractor = (attachment: EmailAttachment) => Promise<ExtractionResult>;

export type ExtractorTable = Record<ExtractorFormat, Extractor>;

export const EXTRACTORS = Symbol('EXTRACTORS');

export const defaultExtractors: ExtractorTable = {
  text: extractText,
  csv: extractText,
  pdf: extractPdf,
  word: extractWord,
  spreadsheet: extractSpreadsheet,
  zip: extractZipListing,
};

export * from './result';
export * from './text-decoding';
export * from './text.extractor';
export * from './pdf.extractor';
export * from './word.extractor';
export * from './spreadsheet.extractor';
export * from './zip.extractor';
