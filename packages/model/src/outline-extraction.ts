import type { OutlineRecord } from './outline-record';

/**
 * Why a document yielded no outline
 *
 * - `missing-catalog`: the trailer has no resolvable root catalog
 * - `missing-outlines`: the catalog has no outline dictionary
 * - `missing-first-item`: the outline dictionary has no first item
 * - `no-titled-items`: every reachable item lacked a usable title
 */
export type NoOutlineReason =
  | 'missing-catalog'
  | 'missing-outlines'
  | 'missing-first-item'
  | 'no-titled-items';

/**
 * Outline found, with at least one record
 */
export interface OutlineFound {
  status: 'found';
  records: OutlineRecord[];
}

/**
 * Document has no outline. This is a result, not a failure.
 */
export interface OutlineNotFound {
  status: 'not-found';
  reason: NoOutlineReason;
}

export type OutlineExtraction = OutlineFound | OutlineNotFound;
