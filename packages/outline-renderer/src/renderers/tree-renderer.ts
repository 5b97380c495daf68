import type {
  OutlineExtraction,
  OutlineRecord,
  RenderOptions,
} from '@outline-tree/model';

import { OUTLINE_RENDERER } from '../config/constants';
import { RecordFilter } from '../utils/record-filter';

/**
 * TreeRenderer
 *
 * Renders an outline as a box-drawing tree below the file name.
 *
 * Sibling relations are derived from the flat pre-order sequence alone:
 * a record is the last of its siblings when no later record at the same
 * depth appears before a shallower one. Records hidden by `maxDepth` are
 * removed first, so connectors reflect the visible tree.
 *
 * @example
 * Output:
 * manual.pdf
 * ├── 1. Introduction
 * │   └── 1.1 Background
 * └── 2. Getting Started
 */
export class TreeRenderer {
  static render(extraction: OutlineExtraction, options: RenderOptions): string {
    const { fileName, maxDepth, indent = OUTLINE_RENDERER.DEFAULT_INDENT } =
      options;
    const lines = [fileName];

    if (extraction.status === 'not-found') {
      lines.push(OUTLINE_RENDERER.NO_OUTLINE_MESSAGE);
      return lines.join('\n');
    }

    const visible = RecordFilter.byMaxDepth(extraction.records, maxDepth);
    visible.forEach((record, index) => {
      const prefix = TreeRenderer.buildPrefix(visible, index, indent);
      const branch = TreeRenderer.isLastAtLevel(visible, index)
        ? OUTLINE_RENDERER.LAST_BRANCH
        : OUTLINE_RENDERER.BRANCH;
      lines.push(
        `${prefix}${branch}${record.title}${RecordFilter.pageSuffix(record)}`,
      );
    });

    return lines.join('\n');
  }

  /**
   * Whether no later sibling follows the record at `index`
   */
  static isLastAtLevel(
    records: readonly OutlineRecord[],
    index: number,
  ): boolean {
    const { depth } = records[index];

    for (let next = index + 1; next < records.length; next++) {
      if (records[next].depth === depth) {
        return false;
      }
      if (records[next].depth < depth) {
        break;
      }
    }

    return true;
  }

  /**
   * Whether the ancestor column at `level` still continues below `index`
   */
  static hasMoreAtLevel(
    records: readonly OutlineRecord[],
    index: number,
    level: number,
  ): boolean {
    for (let next = index + 1; next < records.length; next++) {
      if (records[next].depth === level) {
        return true;
      }
      if (records[next].depth < level) {
        return false;
      }
    }

    return false;
  }

  static buildPrefix(
    records: readonly OutlineRecord[],
    index: number,
    indent: number,
  ): string {
    let prefix = '';

    for (let level = 0; level < records[index].depth; level++) {
      prefix += TreeRenderer.hasMoreAtLevel(records, index, level)
        ? OUTLINE_RENDERER.VERTICAL + ' '.repeat(indent + 1)
        : ' '.repeat(indent + 2);
    }

    return prefix;
  }
}
