export { renderMarkdown, renderOutline, renderTree } from './render-outline';
export { MarkdownRenderer } from './renderers/markdown-renderer';
export { TreeRenderer } from './renderers/tree-renderer';
export { RecordFilter } from './utils/record-filter';
export { OUTLINE_RENDERER } from './config/constants';
