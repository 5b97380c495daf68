import type { LoggerMethods } from '@outline-tree/logger';

import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { PDFDocument } from 'pdf-lib';

import { PDF_LOAD_OPTIONS } from '../config/constants';
import {
  MalformedPdfError,
  NotAPdfError,
  PdfFileNotFoundError,
} from '../errors/outline-read-error';

/**
 * Opens PDF files with pdf-lib.
 *
 * The file is read in one call and never kept open. Once the bytes are in
 * memory, any rejection from pdf-lib is a parse failure and becomes
 * {@link MalformedPdfError}. pdf-lib's error classes cannot be matched with
 * `instanceof`.
 */
export class OutlineDocumentLoader {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Check that `path` is an existing file with a `.pdf` extension
   * (case-insensitive).
   */
  async validatePath(path: string): Promise<void> {
    const isFile = await stat(path).then(
      (stats) => stats.isFile(),
      () => false,
    );
    if (!isFile) {
      throw new PdfFileNotFoundError(path);
    }

    if (extname(path).toLowerCase() !== '.pdf') {
      throw new NotAPdfError(path);
    }
  }

  async load(path: string): Promise<PDFDocument> {
    await this.validatePath(path);

    const bytes = await readFile(path);
    this.logger.debug(
      `[OutlineDocumentLoader] Read ${bytes.byteLength} bytes from ${path}`,
    );

    return this.loadBytes(bytes);
  }

  async loadBytes(bytes: Uint8Array): Promise<PDFDocument> {
    try {
      return await PDFDocument.load(bytes, PDF_LOAD_OPTIONS);
    } catch (error) {
      this.logger.warn(
        '[OutlineDocumentLoader] Malformed PDF document:',
        MalformedPdfError.getErrorMessage(error),
      );
      throw MalformedPdfError.fromError(error);
    }
  }
}
