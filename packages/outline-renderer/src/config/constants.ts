/**
 * Configuration constants for the outline renderers
 */
export const OUTLINE_RENDERER = {
  /**
   * Spaces per nesting level when no indent is given
   */
  DEFAULT_INDENT: 2,

  /**
   * Line printed in place of the records when a document has no outline
   */
  NO_OUTLINE_MESSAGE: 'No outline/chapters found in this PDF.',

  /**
   * Tree connectors
   */
  BRANCH: '├── ',
  LAST_BRANCH: '└── ',
  VERTICAL: '│',
} as const;
