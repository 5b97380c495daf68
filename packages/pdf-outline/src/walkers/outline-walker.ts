import type { LoggerMethods } from '@outline-tree/logger';
import type {
  NoOutlineReason,
  OutlineExtraction,
  OutlineRecord,
} from '@outline-tree/model';

import type { OutlineWalkerLimits } from '../config/constants';
import type { PdfObjectGraph } from '../graph/pdf-object-graph';

import { PDFDict, PDFName } from 'pdf-lib';

import { DEFAULT_WALKER_LIMITS } from '../config/constants';
import { TitleDecoder } from '../decoders/title-decoder';
import { DestinationResolver } from '../resolvers/destination-resolver';
import { OutlineArena } from './outline-arena';

export type OutlineWalkerOptions = {
  logger: LoggerMethods;
  limits?: OutlineWalkerLimits;
};

const OUTLINES = PDFName.of('Outlines');
const FIRST = PDFName.of('First');
const TITLE = PDFName.of('Title');

/**
 * OutlineWalker
 *
 * Locates the outline root through the document catalog and flattens the
 * outline into records in pre-order, each with its decoded title, resolved
 * page and depth.
 *
 * Items without a usable title are dropped, but their children are kept.
 * Per-item failures never abort the walk.
 */
export class OutlineWalker {
  private readonly logger: LoggerMethods;
  private readonly limits: OutlineWalkerLimits;

  constructor(options: OutlineWalkerOptions) {
    const { logger, limits = DEFAULT_WALKER_LIMITS } = options;
    this.logger = logger;
    this.limits = limits;
  }

  walk(graph: PdfObjectGraph): OutlineExtraction {
    const catalog = graph.getCatalog();
    if (!(catalog instanceof PDFDict)) {
      return this.notFound('missing-catalog');
    }

    const outlines = graph.resolve(catalog.get(OUTLINES));
    if (!(outlines instanceof PDFDict)) {
      return this.notFound('missing-outlines');
    }

    const first = outlines.get(FIRST);
    if (first === undefined) {
      return this.notFound('missing-first-item');
    }

    const arena = OutlineArena.build(graph, first, this.logger, this.limits);
    const resolver = new DestinationResolver(graph, this.logger);
    const records: OutlineRecord[] = [];

    for (const node of arena.preorder()) {
      const title = this.readTitle(graph, node.dict);
      if (title === undefined) {
        this.logger.debug(
          `[OutlineWalker] Skipping untitled outline item at depth ${node.depth}`,
        );
        continue;
      }

      const record: OutlineRecord = { title, depth: node.depth };
      const page = resolver.resolvePage(node.dict);
      if (page !== undefined) {
        record.page = page;
      }
      records.push(record);
    }

    if (records.length === 0) {
      return this.notFound('no-titled-items');
    }

    this.logger.info(`[OutlineWalker] Found ${records.length} outline entries`);
    return { status: 'found', records };
  }

  private readTitle(graph: PdfObjectGraph, item: PDFDict): string | undefined {
    try {
      return TitleDecoder.fromPdfObject(graph.resolve(item.get(TITLE)));
    } catch (error) {
      this.logger.debug(
        '[OutlineWalker] Failed to read outline title:',
        error instanceof Error ? error.message : error,
      );
      return undefined;
    }
  }

  private notFound(reason: NoOutlineReason): OutlineExtraction {
    this.logger.info(`[OutlineWalker] No outline found (${reason})`);
    return { status: 'not-found', reason };
  }
}
