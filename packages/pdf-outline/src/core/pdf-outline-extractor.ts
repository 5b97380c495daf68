import type { LoggerMethods } from '@outline-tree/logger';
import type { OutlineExtraction } from '@outline-tree/model';
import type { PDFDocument } from 'pdf-lib';

import type { OutlineWalkerLimits } from '../config/constants';
import type { PdfObjectGraph } from '../graph/pdf-object-graph';

import {
  OutlineReadError,
  UnexpectedOutlineError,
} from '../errors/outline-read-error';
import { PdfLibObjectGraph } from '../graph/pdf-object-graph';
import { OutlineWalker } from '../walkers/outline-walker';
import { OutlineDocumentLoader } from './outline-document-loader';

type Options = {
  logger: LoggerMethods;
  limits?: OutlineWalkerLimits;
};

/**
 * PdfOutlineExtractor - reads the outline of a PDF document
 *
 * Opens a document with pdf-lib, walks its outline and returns the flattened
 * records, or a not-found result when the document has no usable outline.
 *
 * Only document-level failures are thrown, always as an
 * {@link OutlineReadError}:
 * - `PdfFileNotFoundError` / `NotAPdfError` for bad input paths
 * - `MalformedPdfError` when pdf-lib cannot parse the file
 * - `UnexpectedOutlineError` for anything else
 *
 * @example
 * const extractor = new PdfOutlineExtractor({ logger });
 * const extraction = await extractor.extractFromFile('manual.pdf');
 * if (extraction.status === 'found') {
 *   console.log(extraction.records.length);
 * }
 */
export class PdfOutlineExtractor {
  private readonly logger: LoggerMethods;
  private readonly loader: OutlineDocumentLoader;
  private readonly walker: OutlineWalker;

  constructor(options: Options) {
    const { logger, limits } = options;

    this.logger = logger;
    this.loader = new OutlineDocumentLoader(logger);
    this.walker = new OutlineWalker({ logger, limits });
  }

  async extractFromFile(path: string): Promise<OutlineExtraction> {
    this.logger.info(`[PdfOutlineExtractor] Reading outline from ${path}`);

    try {
      const document = await this.loader.load(path);
      return this.extractFromDocument(document);
    } catch (error) {
      throw this.toReadError(error);
    }
  }

  async extractFromBytes(bytes: Uint8Array): Promise<OutlineExtraction> {
    try {
      const document = await this.loader.loadBytes(bytes);
      return this.extractFromDocument(document);
    } catch (error) {
      throw this.toReadError(error);
    }
  }

  extractFromDocument(document: PDFDocument): OutlineExtraction {
    return this.extractFromGraph(new PdfLibObjectGraph(document, this.logger));
  }

  extractFromGraph(graph: PdfObjectGraph): OutlineExtraction {
    try {
      return this.walker.walk(graph);
    } catch (error) {
      throw this.toReadError(error);
    }
  }

  private toReadError(error: unknown): OutlineReadError {
    if (error instanceof OutlineReadError) {
      return error;
    }

    this.logger.error('[PdfOutlineExtractor] Extraction failed:', error);
    return UnexpectedOutlineError.fromError(error);
  }
}
