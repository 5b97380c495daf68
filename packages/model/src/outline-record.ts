/**
 * One entry of a flattened document outline
 *
 * Records are produced in pre-order depth-first order of the outline tree,
 * so a record is followed by its children, then by its next sibling.
 *
 * @interface OutlineRecord
 */
export interface OutlineRecord {
  /**
   * Decoded and normalized bookmark title (never empty)
   */
  title: string;

  /**
   * 1-based page index of the bookmark target
   *
   * Absent when the destination could not be resolved to a page.
   */
  page?: number;

  /**
   * Nesting level, 0 for top-level entries
   */
  depth: number;
}
