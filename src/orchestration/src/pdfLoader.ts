/**
 * PDF loading module
 * Lists the PDFs of a corpus directory and extracts their text page by page
 */

import * as fs from 'fs';
import * as path from 'path';
import { PageText } from './types';
import { DocumentUnreadableError, describeError } from './errors';
import { logger } from './logger';

export interface PageLoader {
  loadPages(filePath: string): Promise<PageText[]>;
}

/**
 * PDF files directly inside `directory`, sorted by name
 */
export async function listPdfFiles(directory: string): Promise<string[]> {
  if (!fs.existsSync(directory)) {
    throw new Error(`Corpus directory not found: ${directory}`);
  }

  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map(entry => path.join(directory, entry.name))
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Page text extraction backed by pdfjs-dist
 * In Node the worker runs in process: pdfjs requires `workerSrc` as a module.
 */
export class PdfPageLoader implements PageLoader {
  async loadPages(filePath: string): Promise<PageText[]> {
    const sourceFile = path.basename(filePath);

    let data: Uint8Array;
    try {
      data = new Uint8Array(await fs.promises.readFile(filePath));
    } catch (error) {
      throw new DocumentUnreadableError(sourceFile, describeError(error), { cause: error });
    }

    const pdfjs = await import('pdfjs-dist');
    if (!pdfjs.GlobalWorkerOptions.workerSrc) {
      pdfjs.GlobalWorkerOptions.workerSrc = 'pdfjs-dist/build/pdf.worker.js';
    }

    const loadingTask = pdfjs.getDocument({ data, isEvalSupported: false, disableFontFace: true, verbosity: 0 });

    try {
      const pdf = await loadingTask.promise;
      const pages: PageText[] = [];

      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();

        let text = '';
        for (const item of content.items) {
          if ('str' in item) {
            text += item.str + (item.hasEOL ? '\n' : ' ');
          }
        }

        pages.push({ sourceFile, pageNumber: i, text });
      }

      logger.debug(`Extracted ${pages.length} pages from ${sourceFile}`);
      return pages;
    } catch (error) {
      throw new DocumentUnreadableError(sourceFile, describeError(error), { cause: error });
    } finally {
      await loadingTask.destroy();
    }
  }
}
