import { EmailAttachment } from '../../common/interfaces';
import { extractPdf } from './pdf.extractor';

// Sans mock: passe par le vrai pdf-parse
const attachment = (rawBytes: Buffer): EmailAttachment => ({
  filename: 'document.pdf',
  mimeHint: 'application/pdf',
  rawBytes,
});

/**
 * PDF minimal: une police standard, une ligne de texte par page, table xref exacte
 */
const buildPdf = (pages: string[]): Buffer => {
  const firstPageId = 4;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pages.map((_, i) => `${firstPageId + i * 2} 0 R`).join(' ')}] /Count ${pages.length} >>`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  pages.forEach((text, i) => {
    const content = `BT /F1 18 Tf 72 720 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
        `/Resources << /Font << /F1 3 0 R >> >> /Contents ${firstPageId + i * 2 + 1} 0 R >>`,
      `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    );
  });

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(pdf, 'latin1');
};

describe('extractPdf', () => {
  it('should return the text of every page in page order', async () => {
    const result = await extractPdf(attachment(buildPdf(['Alpha-01', 'VARUN-02'])));

    expect(result).toEqual({ kind: 'text', text: 'Alpha-01\n\nVARUN-02' });
  });

  it('should report a corrupt document as a decode error', async () => {
    const result = await extractPdf(attachment(Buffer.from('ceci n est pas un pdf', 'utf-8')));

    expect(result.kind).toBe('decode_error');
  });
});
