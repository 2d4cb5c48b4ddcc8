import { Fragment, Layout, LayoutMode, ResultRow } from '../models/job.model';
import { LayoutClassifier } from './LayoutClassifier';
import { LineSorter } from './LineSorter';

export interface PageContext {
  imageFile: string;
  pageNo: number;
}

export function formatConfidence(confidence: number | undefined): string {
  return confidence === undefined || !Number.isFinite(confidence) ? '' : confidence.toFixed(4);
}

/**
 * Turns one page of recognized fragments into numbered result rows.
 *
 * The layout is resolved once per page; line numbers follow the sorted order.
 */
export class RowBuilder {
  constructor(
    private readonly classifier: LayoutClassifier = new LayoutClassifier(),
    private readonly sorter: LineSorter = new LineSorter()
  ) {}

  build(page: PageContext, fragments: readonly Fragment[], requested: LayoutMode): ResultRow[] {
    const layout: Layout = this.classifier.classify(fragments, requested);

    return this.sorter.sort(fragments, layout).map((fragment, index) => ({
      imageFile: page.imageFile,
      pageNo: page.pageNo,
      lineNo: index + 1,
      layout,
      left: Math.trunc(fragment.left),
      top: Math.trunc(fragment.top),
      width: Math.trunc(fragment.width),
      height: Math.trunc(fragment.height),
      confidence: formatConfidence(fragment.confidence),
      text: fragment.text.trim(),
    }));
  }
}
