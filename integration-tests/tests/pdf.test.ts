/**
 * PDF text extraction tests
 */

import { ExtractionError } from '@jobnotice/shared';
import { PdfjsTextExtractor } from '../../services/parser-api/src/lib/pdf';

/**
 * Build a one-page PDF with each line drawn in Helvetica at its own height
 */
function buildPdf(lines: string[]): Uint8Array {
  const content = [
    'BT',
    '/F1 12 Tf',
    ...lines.flatMap((line, index) => [`1 0 0 1 72 ${720 - index * 20} Tm`, `(${line}) Tj`]),
    'ET',
  ].join('\n');

  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new Uint8Array(Buffer.from(pdf, 'latin1'));
}

describe('PdfjsTextExtractor', () => {
  const extractor = new PdfjsTextExtractor();

  it('should rebuild lines top to bottom, ending each page with a newline', async () => {
    const text = await extractor.extractText(buildPdf(['Total Vacancies: 42', 'Pay Level 7']));

    expect(text).toBe('Total Vacancies: 42\nPay Level 7\n');
  });

  it('should raise ExtractionError for bytes that are not a PDF', async () => {
    const garbage = new Uint8Array(Buffer.from('this is not a pdf document', 'utf-8'));

    await expect(extractor.extractText(garbage)).rejects.toThrow(ExtractionError);
  });
});
