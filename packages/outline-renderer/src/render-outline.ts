import type {
  OutlineExtraction,
  OutputFormat,
  RenderOptions,
} from '@outline-tree/model';

import { MarkdownRenderer } from './renderers/markdown-renderer';
import { TreeRenderer } from './renderers/tree-renderer';

export function renderMarkdown(
  extraction: OutlineExtraction,
  options: RenderOptions,
): string {
  return MarkdownRenderer.render(extraction, options);
}

export function renderTree(
  extraction: OutlineExtraction,
  options: RenderOptions,
): string {
  return TreeRenderer.render(extraction, options);
}

/**
 * Render with the renderer selected by `format`
 */
export function renderOutline(
  extraction: OutlineExtraction,
  format: OutputFormat,
  options: RenderOptions,
): string {
  switch (format) {
    case 'markdown':
      return renderMarkdown(extraction, options);
    case 'tree':
      return renderTree(extraction, options);
  }
}
