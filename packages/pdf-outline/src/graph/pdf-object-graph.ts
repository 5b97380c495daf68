import type { LoggerMethods } from '@outline-tree/logger';
import type { PDFDocument, PDFObject } from 'pdf-lib';

import { PDFRef } from 'pdf-lib';

/**
 * Read-only view of a decoded PDF object graph.
 *
 * The walker and the destination resolver only talk to the document through
 * this capability, so they can run against a hand-built graph in tests.
 */
export interface PdfObjectGraph {
  /**
   * The trailer's root catalog, resolved
   */
  getCatalog(): PDFObject | undefined;

  /**
   * Follow one level of indirection. Direct values are returned unchanged.
   * Implementations may throw for corrupt references.
   */
  resolve(value: PDFObject | undefined): PDFObject | undefined;

  /**
   * Resolved page dictionaries in document order
   */
  getPageObjects(): readonly PDFObject[];
}

/**
 * PdfObjectGraph backed by a pdf-lib document
 */
export class PdfLibObjectGraph implements PdfObjectGraph {
  private pageObjects?: readonly PDFObject[];

  constructor(
    private readonly document: PDFDocument,
    private readonly logger: LoggerMethods,
  ) {}

  getCatalog(): PDFObject | undefined {
    return this.resolve(this.document.context.trailerInfo.Root);
  }

  resolve(value: PDFObject | undefined): PDFObject | undefined {
    if (value instanceof PDFRef) {
      return this.document.context.lookup(value);
    }
    return value;
  }

  getPageObjects(): readonly PDFObject[] {
    if (!this.pageObjects) {
      try {
        this.pageObjects = this.document.getPages().map((page) => page.node);
      } catch (error) {
        // A broken page tree leaves every explicit destination unresolved
        this.logger.warn(
          '[PdfLibObjectGraph] Failed to enumerate pages:',
          error instanceof Error ? error.message : error,
        );
        this.pageObjects = [];
      }
    }
    return this.pageObjects;
  }
}
