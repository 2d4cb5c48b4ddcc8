/**
 * Layout Classifier
 *
 * Decides whether a page reads horizontally or in vertical right-to-left
 * columns when the caller asked for 'auto'. A page is vertical when most
 * fragments are tall and narrow and their left edges spread over at least
 * two column bands; a single centered vertical line stays horizontal.
 */

import { Fragment, Layout, LayoutMode } from '../models/job.model';
import { DEFAULT_LAYOUT_THRESHOLDS, LayoutThresholds, positiveMedian } from './thresholds';

export class LayoutClassifier {
  constructor(private readonly thresholds: LayoutThresholds = DEFAULT_LAYOUT_THRESHOLDS) {}

  classify(fragments: readonly Fragment[], requested: LayoutMode): Layout {
    if (requested !== 'auto') {
      return requested;
    }

    const t = this.thresholds;
    if (fragments.length < 2) {
      return 'horizontal';
    }

    const verticalLike = fragments.filter(
      (f) => f.width > 0 && f.height > f.width * t.verticalAspect
    ).length;
    const ratio = verticalLike / fragments.length;

    const median = positiveMedian(fragments.map((f) => f.width));
    const band = median === undefined ? t.bandFallback : Math.max(t.bandMin, median * t.bandFactor);
    const bands = new Set(fragments.map((f) => Math.floor(f.left / band)));

    return ratio >= t.verticalRatio && bands.size >= t.minBands ? 'vertical-rtl' : 'horizontal';
  }
}
