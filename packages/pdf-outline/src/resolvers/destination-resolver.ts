import type { LoggerMethods } from '@outline-tree/logger';
import type { PDFObject } from 'pdf-lib';

import type { PdfObjectGraph } from '../graph/pdf-object-graph';

import { PDFArray, PDFDict, PDFHexString, PDFName, PDFString } from 'pdf-lib';

import { NAMED_PAGE_PATTERN } from '../config/constants';
import { TitleDecoder } from '../decoders/title-decoder';

/**
 * Where the destination was found on the outline item
 */
export type DestinationSource = 'dest' | 'action';

/**
 * Destination of an outline item, classified by shape
 *
 * - `explicit`: `[page, fit, ...]` array; `pageTarget` is its first element
 * - `named`: string destination such as `p35`
 * - `unsupported`: a destination of any other shape (names, empty arrays, ...)
 * - `none`: the item has no destination
 */
export type Destination =
  | { type: 'explicit'; source: DestinationSource; pageTarget: PDFObject }
  | { type: 'named'; source: DestinationSource; name: string }
  | { type: 'unsupported'; source: DestinationSource }
  | { type: 'none' };

const DEST = PDFName.of('Dest');
const ACTION = PDFName.of('A');
const ACTION_DEST = PDFName.of('D');

/**
 * Resolves outline item destinations to 1-based page numbers.
 *
 * Producers write destinations as explicit arrays, as GoTo actions wrapping
 * such an array, or as named strings. Only the `pN` naming convention is
 * understood for named destinations; the document name tree is not read.
 *
 * Resolution never throws. Any failure yields no page number.
 */
export class DestinationResolver {
  private pageIndex?: Map<PDFObject, number>;

  constructor(
    private readonly graph: PdfObjectGraph,
    private readonly logger: LoggerMethods,
  ) {}

  /**
   * Resolve the page number of an outline item
   */
  resolvePage(item: PDFDict): number | undefined {
    try {
      return this.resolveDestination(this.classify(item));
    } catch (error) {
      this.logger.debug(
        '[DestinationResolver] Failed to resolve destination:',
        error instanceof Error ? error.message : error,
      );
      return undefined;
    }
  }

  /**
   * Read the destination of an outline item.
   * A direct `Dest` entry wins over the `A` action.
   */
  classify(item: PDFDict): Destination {
    const direct = item.get(DEST);
    if (direct !== undefined) {
      return this.toDestination(direct, 'dest');
    }

    const actionValue = item.get(ACTION);
    if (actionValue === undefined) {
      return { type: 'none' };
    }

    const action = this.graph.resolve(actionValue);
    const target = action instanceof PDFDict ? action.get(ACTION_DEST) : undefined;
    if (target === undefined) {
      return { type: 'none' };
    }

    return this.toDestination(target, 'action');
  }

  resolveDestination(destination: Destination): number | undefined {
    switch (destination.type) {
      case 'explicit':
        return this.findPageNumber(destination.pageTarget);
      case 'named':
        return DestinationResolver.parseNamedPage(destination.name);
      case 'unsupported':
      case 'none':
        return undefined;
    }
  }

  /**
   * Parse a named destination following the `pN` convention.
   * `p12` gives 12; `page1`, `p`, the empty string and numbers beyond
   * `Number.MAX_SAFE_INTEGER` give nothing.
   */
  static parseNamedPage(name: string): number | undefined {
    const match = NAMED_PAGE_PATTERN.exec(name);
    if (!match) {
      return undefined;
    }

    const page = Number(match[1]);
    return Number.isSafeInteger(page) ? page : undefined;
  }

  private toDestination(
    value: PDFObject,
    source: DestinationSource,
  ): Destination {
    const resolved = this.graph.resolve(value);

    if (resolved instanceof PDFArray) {
      return resolved.size() > 0
        ? { type: 'explicit', source, pageTarget: resolved.get(0) }
        : { type: 'unsupported', source };
    }

    if (resolved instanceof PDFString || resolved instanceof PDFHexString) {
      return {
        type: 'named',
        source,
        name: TitleDecoder.stripByteOrderMark(
          TitleDecoder.decodeBytes(resolved.asBytes()),
        ),
      };
    }

    return { type: 'unsupported', source };
  }

  /**
   * Match the resolved page target against the document's pages by identity
   */
  private findPageNumber(pageTarget: PDFObject): number | undefined {
    const page = this.graph.resolve(pageTarget);
    if (page === undefined) {
      return undefined;
    }

    const index = this.getPageIndex().get(page);
    return index === undefined ? undefined : index + 1;
  }

  private getPageIndex(): Map<PDFObject, number> {
    if (!this.pageIndex) {
      const pageIndex = new Map<PDFObject, number>();
      this.graph.getPageObjects().forEach((page, index) => {
        // The first occurrence wins when a page object appears twice
        if (!pageIndex.has(page)) {
          pageIndex.set(page, index);
        }
      });
      this.pageIndex = pageIndex;
    }
    return this.pageIndex;
  }
}
