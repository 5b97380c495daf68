import type { OutlineExtraction } from '@outline-tree/model';

import { describe, expect, test } from 'vitest';

import { renderMarkdown, renderOutline, renderTree } from './render-outline';

const extraction: OutlineExtraction = {
  status: 'found',
  records: [
    { title: 'Intro', page: 1, depth: 0 },
    { title: 'Scope', page: 2, depth: 1 },
  ],
};

describe('renderOutline', () => {
  test('renders Markdown for the markdown format', () => {
    const output = renderOutline(extraction, 'markdown', { fileName: 'a.pdf' });

    expect(output).toBe('# a.pdf\n\n- Intro (p.1)\n  - Scope (p.2)');
    expect(output).toBe(renderMarkdown(extraction, { fileName: 'a.pdf' }));
  });

  test('renders a tree for the tree format', () => {
    const output = renderOutline(extraction, 'tree', { fileName: 'a.pdf' });

    expect(output).toBe('a.pdf\n└── Intro (p.1)\n    └── Scope (p.2)');
    expect(output).toBe(renderTree(extraction, { fileName: 'a.pdf' }));
  });
});
