/**
 * Reading-order heuristic constants.
 *
 * These are heuristics with no stated derivation. They are exposed through
 * configuration so they can be calibrated against real documents.
 */
export interface LayoutThresholds {
  /** Lower bound of the horizontal row bucket height */
  rowBucketMin: number;
  /** Row bucket height as a multiple of the median fragment height */
  rowBucketFactor: number;
  /** Lower bound of the vertical column bucket width */
  columnBucketMin: number;
  /** Column bucket width as a multiple of the median fragment width */
  columnBucketFactor: number;
  /** Median used by the sorter when no fragment has a positive size */
  fallbackMedian: number;

  /** A fragment is vertical-like when height > width * verticalAspect */
  verticalAspect: number;
  /** Share of vertical-like fragments needed to call a page vertical */
  verticalRatio: number;
  /** Distinct left-edge bands needed to call a page vertical */
  minBands: number;
  /** Lower bound of the classifier band width */
  bandMin: number;
  /** Band width as a multiple of the median fragment width */
  bandFactor: number;
  /** Band width when no fragment has a positive width */
  bandFallback: number;
}

export const DEFAULT_LAYOUT_THRESHOLDS: Readonly<LayoutThresholds> = Object.freeze({
  rowBucketMin: 8,
  rowBucketFactor: 0.8,
  columnBucketMin: 12,
  columnBucketFactor: 1.2,
  fallbackMedian: 20,
  verticalAspect: 1.15,
  verticalRatio: 0.6,
  minBands: 2,
  bandMin: 20,
  bandFactor: 1.8,
  bandFallback: 40,
});

/**
 * Median of the strictly positive values, or undefined when there are none
 */
export function positiveMedian(values: number[]): number | undefined {
  const positive = values.filter((value) => value > 0).sort((a, b) => a - b);
  if (positive.length === 0) {
    return undefined;
  }
  const mid = Math.floor(positive.length / 2);
  return positive.length % 2 === 1 ? positive[mid] : (positive[mid - 1] + positive[mid]) / 2;
}
