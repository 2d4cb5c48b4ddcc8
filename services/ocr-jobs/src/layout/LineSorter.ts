/**
 * Line Sorter - reading order for one page of fragments
 *
 * Horizontal pages are bucketed into rows by `top` and read left to right.
 * Vertical right-to-left pages are bucketed into columns by `left`, columns
 * are visited right to left and read top to bottom.
 */

import { Fragment, Layout } from '../models/job.model';
import { DEFAULT_LAYOUT_THRESHOLDS, LayoutThresholds, positiveMedian } from './thresholds';

type SortKey = [number, number, number];

export class LineSorter {
  constructor(private readonly thresholds: LayoutThresholds = DEFAULT_LAYOUT_THRESHOLDS) {}

  sort(fragments: readonly Fragment[], layout: Layout): Fragment[] {
    const valid = fragments.filter((fragment) => fragment.text.trim() !== '');
    if (valid.length <= 1) {
      return valid;
    }

    const keyOf = layout === 'vertical-rtl' ? this.columnKey(valid) : this.rowKey(valid);

    // Array.prototype.sort is stable, equal keys keep recognizer order
    return valid
      .map((fragment) => ({ fragment, key: keyOf(fragment) }))
      .sort((a, b) => compareKeys(a.key, b.key))
      .map(({ fragment }) => fragment);
  }

  /**
   * Height of a horizontal row bucket for these fragments
   */
  rowBucket(fragments: readonly Fragment[]): number {
    const t = this.thresholds;
    const median = positiveMedian(fragments.map((f) => f.height)) ?? t.fallbackMedian;
    return Math.max(t.rowBucketMin, median * t.rowBucketFactor);
  }

  /**
   * Width of a vertical column bucket for these fragments
   */
  columnBucket(fragments: readonly Fragment[]): number {
    const t = this.thresholds;
    const median = positiveMedian(fragments.map((f) => f.width)) ?? t.fallbackMedian;
    return Math.max(t.columnBucketMin, median * t.columnBucketFactor);
  }

  private rowKey(fragments: readonly Fragment[]): (fragment: Fragment) => SortKey {
    const bucket = this.rowBucket(fragments);
    return (f) => [Math.floor(f.top / bucket), f.left, f.top];
  }

  private columnKey(fragments: readonly Fragment[]): (fragment: Fragment) => SortKey {
    const bucket = this.columnBucket(fragments);
    return (f) => [-Math.floor(f.left / bucket), f.top, -f.left];
  }
}

function compareKeys(a: SortKey, b: SortKey): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}
