/**
 * PDF Text Extraction
 *
 * Extracts text from PDF bytes using pdfjs-dist.
 */

import path from 'path';
import * as pdfjsLib from 'pdfjs-dist';
import { ExtractionError, logger, type TextExtractor } from '@jobnotice/shared';

// Configure worker for Node.js environment
const workerPath = path.join(path.dirname(require.resolve('pdfjs-dist/package.json')), 'build/pdf.worker.js');
pdfjsLib.GlobalWorkerOptions.workerSrc = workerPath;

interface PositionedText {
  x: number;
  str: string;
}

/**
 * Rebuild the lines of one page from its text items.
 *
 * Groups text items by Y position so table rows and headings come out as
 * lines, top to bottom, left to right.
 */
function buildPageText(items: ReadonlyArray<object>): string {
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    if (!('str' in item) || !('transform' in item)) continue;
    const { str, transform } = item;
    if (typeof str !== 'string' || str.trim() === '' || !Array.isArray(transform)) continue;

    // Text on the same visual line may have slight Y variations
    const y = Math.round(Number(transform[5]));
    const x = Math.round(Number(transform[4]));

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str });
    itemsByY.set(y, line);
  }

  // PDF Y grows upwards: sort descending for top-to-bottom order
  return [...itemsByY.keys()]
    .sort((a, b) => b - a)
    .map((y) =>
      (itemsByY.get(y) ?? [])
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .trim()
    )
    .filter((line) => line !== '')
    .join('\n');
}

/**
 * TextExtractor over pdfjs-dist. Pages are concatenated in order, each
 * followed by a newline.
 */
export class PdfjsTextExtractor implements TextExtractor {
  async extractText(data: Uint8Array): Promise<string> {
    // pdfjs takes ownership of the buffer it is given
    const loadingTask = pdfjsLib.getDocument({
      data: new Uint8Array(data),
      verbosity: pdfjsLib.VerbosityLevel.ERRORS,
      isEvalSupported: false,
    });

    try {
      const pdf = await loadingTask.promise;
      let text = '';

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        text += `${buildPageText(textContent.items)}\n`;
        page.cleanup();
      }

      logger.info('PDF text extraction complete', {
        totalPages: pdf.numPages,
        totalChars: text.length,
      });

      return text;
    } catch (error) {
      throw new ExtractionError(
        `Could not extract text from PDF: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      await loadingTask.destroy();
    }
  }
}
