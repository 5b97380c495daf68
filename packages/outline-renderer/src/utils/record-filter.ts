import type { OutlineRecord } from '@outline-tree/model';

/**
 * RecordFilter
 *
 * Shared helpers for selecting and annotating records before rendering.
 */
export class RecordFilter {
  /**
   * Keep records whose level (`depth + 1`) does not exceed `maxDepth`.
   * Every record is kept when `maxDepth` is undefined.
   */
  static byMaxDepth(
    records: readonly OutlineRecord[],
    maxDepth?: number,
  ): OutlineRecord[] {
    if (maxDepth === undefined) {
      return [...records];
    }
    return records.filter((record) => record.depth + 1 <= maxDepth);
  }

  /**
   * ` (p.N)` when the record has a page, otherwise empty
   */
  static pageSuffix(record: OutlineRecord): string {
    return record.page === undefined ? '' : ` (p.${record.page})`;
  }
}
