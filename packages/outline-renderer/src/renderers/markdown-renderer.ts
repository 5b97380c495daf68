import type { OutlineExtraction, RenderOptions } from '@outline-tree/model';

import { OUTLINE_RENDERER } from '../config/constants';
import { RecordFilter } from '../utils/record-filter';

/**
 * MarkdownRenderer
 *
 * Renders an outline as a nested Markdown list under a level-1 heading.
 *
 * @example
 * Output:
 * # manual.pdf
 *
 * - 1. Introduction (p.2)
 *   - 1.1 Background (p.3)
 */
export class MarkdownRenderer {
  static render(extraction: OutlineExtraction, options: RenderOptions): string {
    const { fileName, maxDepth, indent = OUTLINE_RENDERER.DEFAULT_INDENT } =
      options;
    const lines = [`# ${fileName}`, ''];

    if (extraction.status === 'not-found') {
      lines.push(OUTLINE_RENDERER.NO_OUTLINE_MESSAGE);
      return lines.join('\n');
    }

    for (const record of RecordFilter.byMaxDepth(extraction.records, maxDepth)) {
      const padding = ' '.repeat(indent * record.depth);
      lines.push(
        `${padding}- ${record.title}${RecordFilter.pageSuffix(record)}`,
      );
    }

    return lines.join('\n');
  }
}
