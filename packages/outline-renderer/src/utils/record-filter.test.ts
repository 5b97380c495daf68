import type { OutlineRecord } from '@outline-tree/model';

import { describe, expect, test } from 'vitest';

import { RecordFilter } from './record-filter';

const RECORDS: OutlineRecord[] = [
  { title: 'A', depth: 0 },
  { title: 'A.1', depth: 1 },
  { title: 'A.1.a', depth: 2 },
  { title: 'B', depth: 0 },
];

describe('RecordFilter', () => {
  describe('byMaxDepth', () => {
    test('keeps every record without a maximum', () => {
      const result = RecordFilter.byMaxDepth(RECORDS);

      expect(result).toEqual(RECORDS);
      expect(result).not.toBe(RECORDS);
    });

    test('keeps records whose level is within the maximum', () => {
      expect(
        RecordFilter.byMaxDepth(RECORDS, 2).map((record) => record.title),
      ).toEqual(['A', 'A.1', 'B']);
      expect(
        RecordFilter.byMaxDepth(RECORDS, 1).map((record) => record.title),
      ).toEqual(['A', 'B']);
    });
  });

  describe('pageSuffix', () => {
    test('formats the page number', () => {
      expect(RecordFilter.pageSuffix({ title: 'A', page: 7, depth: 0 })).toBe(
        ' (p.7)',
      );
    });

    test('is empty without a page', () => {
      expect(RecordFilter.pageSuffix({ title: 'A', depth: 0 })).toBe('');
    });
  });
});
