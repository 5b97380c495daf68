/**
 * Configuration constants for OutlineWalker
 */
export const OUTLINE_WALKER = {
  /**
   * Maximum nesting depth followed before a branch is cut off.
   * Depth is zero-based, so items at depth `MAX_DEPTH` and below are dropped.
   */
  MAX_DEPTH: 64,

  /**
   * Maximum number of outline items materialized for one document
   */
  MAX_NODES: 100000,
} as const;

export type OutlineWalkerLimits = {
  maxDepth: number;
  maxNodes: number;
};

export const DEFAULT_WALKER_LIMITS: OutlineWalkerLimits = {
  maxDepth: OUTLINE_WALKER.MAX_DEPTH,
  maxNodes: OUTLINE_WALKER.MAX_NODES,
};

/**
 * Options passed to pdf-lib when loading a document
 */
export const PDF_LOAD_OPTIONS = {
  ignoreEncryption: true,
  updateMetadata: false,
} as const;

/**
 * Named destinations following the "pN" convention (e.g. "p35")
 */
export const NAMED_PAGE_PATTERN = /^p(\d+)$/;
