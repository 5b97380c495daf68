/**
 * Options shared by the outline renderers
 *
 * @interface RenderOptions
 */
export interface RenderOptions {
  /**
   * Base name of the source file, printed as the heading (Markdown)
   * or the root line (tree)
   */
  fileName: string;

  /**
   * Number of levels to display, counted from 1
   *
   * Records whose `depth + 1` exceeds this value are hidden.
   * Unlimited when omitted.
   */
  maxDepth?: number;

  /**
   * Indent width in spaces (default: 2)
   *
   * Markdown nests `indent * depth` spaces; the tree pads each ancestor
   * column to `indent + 2` characters.
   */
  indent?: number;
}

export type OutputFormat = 'markdown' | 'tree';
