import type { LoggerMethods } from '@outline-tree/logger';
import type { PDFObject } from 'pdf-lib';

import type { OutlineWalkerLimits } from '../config/constants';
import type { PdfObjectGraph } from '../graph/pdf-object-graph';

import { PDFDict, PDFName } from 'pdf-lib';

import { DEFAULT_WALKER_LIMITS } from '../config/constants';

/**
 * Outline item stored in the arena, linked to its relatives by index
 */
export interface OutlineArenaNode {
  index: number;
  depth: number;
  dict: PDFDict;
  parent?: number;
  firstChild?: number;
  nextSibling?: number;
}

interface PendingLink {
  link: PDFObject;
  depth: number;
  parent?: number;
  previous?: number;
  /**
   * Items already placed in this sibling chain
   */
  siblings: Set<PDFDict>;
}

const FIRST = PDFName.of('First');
const NEXT = PDFName.of('Next');

/**
 * OutlineArena
 *
 * Materializes the outline item graph (`First` / `Next` links between
 * dictionaries) into an array of nodes, in pre-order: an item, then its
 * first-child subtree, then its next sibling.
 *
 * - A link that cannot be resolved to a dictionary ends that branch
 * - An item that is its own ancestor, or already in its sibling chain, ends
 *   the branch. A subtree shared by two parents is stored under both.
 * - Branches deeper than `maxDepth` are cut off
 * - At most `maxNodes` items are kept
 */
export class OutlineArena {
  private constructor(readonly nodes: readonly OutlineArenaNode[]) {}

  static build(
    graph: PdfObjectGraph,
    firstLink: PDFObject,
    logger: LoggerMethods,
    limits: OutlineWalkerLimits = DEFAULT_WALKER_LIMITS,
  ): OutlineArena {
    const nodes: OutlineArenaNode[] = [];
    const pending: PendingLink[] = [
      { link: firstLink, depth: 0, siblings: new Set() },
    ];

    for (let current = pending.pop(); current; current = pending.pop()) {
      const { link, depth, parent, previous, siblings } = current;

      if (nodes.length >= limits.maxNodes) {
        logger.warn(
          `[OutlineArena] Outline exceeds ${limits.maxNodes} items, remaining items skipped`,
        );
        break;
      }

      if (depth >= limits.maxDepth) {
        logger.warn(
          `[OutlineArena] Outline nesting exceeds ${limits.maxDepth} levels, branch skipped`,
        );
        continue;
      }

      const dict = OutlineArena.resolveItem(graph, link, logger);
      if (!dict) {
        continue;
      }

      if (
        siblings.has(dict) ||
        OutlineArena.isAncestor(nodes, parent, dict)
      ) {
        logger.warn('[OutlineArena] Outline loops back on itself, branch skipped');
        continue;
      }
      siblings.add(dict);

      const index = nodes.length;
      nodes.push({ index, depth, dict, parent });

      if (previous !== undefined) {
        nodes[previous].nextSibling = index;
      } else if (parent !== undefined) {
        nodes[parent].firstChild = index;
      }

      // Next goes on the stack first so the first-child subtree is popped first
      const next = dict.get(NEXT);
      if (next !== undefined) {
        pending.push({ link: next, depth, parent, previous: index, siblings });
      }

      const first = dict.get(FIRST);
      if (first !== undefined) {
        pending.push({
          link: first,
          depth: depth + 1,
          parent: index,
          siblings: new Set(),
        });
      }
    }

    logger.debug(`[OutlineArena] Built arena with ${nodes.length} items`);
    return new OutlineArena(nodes);
  }

  /**
   * Nodes in pre-order, following the first-child and next-sibling links
   */
  preorder(): OutlineArenaNode[] {
    const result: OutlineArenaNode[] = [];
    const stack = this.nodes.length > 0 ? [0] : [];

    for (let index = stack.pop(); index !== undefined; index = stack.pop()) {
      const node = this.nodes[index];
      result.push(node);

      if (node.nextSibling !== undefined) {
        stack.push(node.nextSibling);
      }
      if (node.firstChild !== undefined) {
        stack.push(node.firstChild);
      }
    }

    return result;
  }

  private static isAncestor(
    nodes: readonly OutlineArenaNode[],
    parent: number | undefined,
    dict: PDFDict,
  ): boolean {
    for (let cursor = parent; cursor !== undefined; cursor = nodes[cursor].parent) {
      if (nodes[cursor].dict === dict) {
        return true;
      }
    }
    return false;
  }

  private static resolveItem(
    graph: PdfObjectGraph,
    link: PDFObject,
    logger: LoggerMethods,
  ): PDFDict | undefined {
    try {
      const value = graph.resolve(link);
      if (value instanceof PDFDict) {
        return value;
      }
      logger.debug('[OutlineArena] Outline link does not point to a dictionary');
      return undefined;
    } catch (error) {
      logger.debug(
        '[OutlineArena] Failed to resolve outline item:',
        error instanceof Error ? error.message : error,
      );
      return undefined;
    }
  }
}
