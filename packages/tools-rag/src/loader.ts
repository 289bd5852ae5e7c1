import { readFile } from 'node:fs/promises';
import path from 'node:path';
import * as mupdf from 'mupdf';
import { DocumentReadError, InvalidDocumentError, errorMessage } from './errors.js';
import type { ExtractedText, SourceDocument } from './types.js';

export function validatePdfPath(filePath: string): void {
  if (path.extname(filePath).toLowerCase() !== '.pdf') {
    throw new InvalidDocumentError(`Only PDF files are supported: '${filePath}'`, { path: filePath });
  }
}

/**
 * Extracts the text of every page with MuPDF, pages separated by a newline.
 * @throws InvalidDocumentError if MuPDF cannot parse the bytes.
 */
export async function extractPdfText(bytes: Uint8Array): Promise<ExtractedText> {
  let doc: mupdf.Document | undefined;
  try {
    doc = mupdf.Document.openDocument(bytes, 'application/pdf');
    const pageCount = doc.countPages();
    const pageTexts: string[] = [];
    for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
      const page = doc.loadPage(pageIndex);
      try {
        pageTexts.push(page.toStructuredText('preserve-whitespace').asText());
      } finally {
        page.destroy();
      }
    }
    return { text: pageTexts.join('\n'), pageCount };
  } catch (e: unknown) {
    throw new InvalidDocumentError(`PDF parsing failed: ${errorMessage(e)}`, {}, { cause: e });
  } finally {
    doc?.destroy();
  }
}

/** Reads a PDF from disk. Text extraction happens only if the caller asks for it. */
export async function openPdfDocument(filePath: string): Promise<SourceDocument> {
  validatePdfPath(filePath);
  let bytes: Uint8Array;
  try {
    bytes = await readFile(filePath);
  } catch (e: unknown) {
    throw new DocumentReadError(`Cannot read '${filePath}': ${errorMessage(e)}`, { path: filePath }, { cause: e });
  }
  return {
    id: filePath,
    bytes,
    extractText: () => extractPdfText(bytes),
  };
}
