import type { LoggerMethods } from '@outline-tree/logger';

import { PDFDict, PDFDocument, PDFName, PDFNumber } from 'pdf-lib';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { PdfLibObjectGraph } from './pdf-object-graph';

describe('PdfLibObjectGraph', () => {
  let mockLogger: LoggerMethods;
  let document: PDFDocument;

  beforeEach(async () => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    document = await PDFDocument.create();
  });

  test('getCatalog resolves the trailer root to the catalog dictionary', () => {
    const graph = new PdfLibObjectGraph(document, mockLogger);

    expect(graph.getCatalog()).toBe(document.catalog);
  });

  test('resolve follows references and passes direct values through', () => {
    const graph = new PdfLibObjectGraph(document, mockLogger);
    const value = PDFNumber.of(7);
    const ref = document.context.register(value);

    expect(graph.resolve(ref)).toBe(value);
    expect(graph.resolve(value)).toBe(value);
    expect(graph.resolve(undefined)).toBeUndefined();
  });

  test('resolve returns undefined for a dangling reference', () => {
    const graph = new PdfLibObjectGraph(document, mockLogger);
    const dangling = document.context.nextRef();

    expect(graph.resolve(dangling)).toBeUndefined();
  });

  test('getPageObjects lists page dictionaries in document order', () => {
    const first = document.addPage();
    const second = document.addPage();
    const graph = new PdfLibObjectGraph(document, mockLogger);

    const pages = graph.getPageObjects();

    expect(pages).toHaveLength(2);
    expect(pages[0]).toBe(first.node);
    expect(pages[1]).toBe(second.node);
    expect(pages[0]).toBe(document.context.lookup(first.ref));
  });

  test('getPageObjects caches the page list', () => {
    document.addPage();
    const graph = new PdfLibObjectGraph(document, mockLogger);
    const spy = vi.spyOn(document, 'getPages');

    graph.getPageObjects();
    graph.getPageObjects();

    expect(spy).toHaveBeenCalledTimes(1);
  });

  test('getPageObjects returns an empty list when the page tree is broken', () => {
    vi.spyOn(document, 'getPages').mockImplementation(() => {
      throw new Error('Pages is not a dictionary');
    });
    const graph = new PdfLibObjectGraph(document, mockLogger);

    expect(graph.getPageObjects()).toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PdfLibObjectGraph] Failed to enumerate pages:',
      'Pages is not a dictionary',
    );
  });

  test('getCatalog is undefined when the trailer has no root', () => {
    document.context.trailerInfo.Root = undefined;
    const graph = new PdfLibObjectGraph(document, mockLogger);

    expect(graph.getCatalog()).toBeUndefined();
  });

  test('getCatalog returns whatever the root resolves to', () => {
    const notADict = PDFName.of('Broken');
    document.context.trailerInfo.Root = document.context.register(notADict);
    const graph = new PdfLibObjectGraph(document, mockLogger);

    expect(graph.getCatalog()).toBe(notADict);
    expect(graph.getCatalog()).not.toBeInstanceOf(PDFDict);
  });
});
