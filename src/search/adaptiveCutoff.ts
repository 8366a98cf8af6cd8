/**
 * Adaptive relevance cutoff over ascending cosine distances.
 *
 * Nearest-neighbour search always returns k results, even when nothing is
 * similar. Instead of a fixed threshold, this looks for the first point where
 * the next distance jumps away from the local average gap and keeps everything
 * before it.
 *
 * The constants were tuned against the default embedding model. Changing them,
 * or the model, requires re-validating search quality.
 */
export const CUTOFF_POLICY = {
  /** Best match worse than this means there is no good match at all. */
  QUALITY_FLOOR: 0.5,
  /** Hard ceiling on an acceptable distance. */
  MAX_DISTANCE: 0.75,
  /** A gap this many times the baseline counts as a break. */
  GAP_MULTIPLIER: 2.5,
  /** Lower bound for the baseline gap, so near-identical runs don't blow up the ratio. */
  AVG_FLOOR: 0.01,
} as const;

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Returns how many leading entries of `distances` (sorted ascending) to keep.
 * The first qualifying gap, scanning left to right, decides the cutoff.
 */
export function findAdaptiveCutoff(distances: readonly number[]): number {
  const { QUALITY_FLOOR, MAX_DISTANCE, GAP_MULTIPLIER, AVG_FLOOR } = CUTOFF_POLICY;

  const best = distances[0];
  if (best === undefined || best > QUALITY_FLOOR) return 0;

  const acceptable = distances.filter((d) => d <= MAX_DISTANCE);
  if (acceptable.length <= 1) return acceptable.length;

  const gaps: number[] = [];
  for (let i = 0; i < acceptable.length - 1; i++) {
    gaps.push((acceptable[i + 1] ?? 0) - (acceptable[i] ?? 0));
  }

  const [firstGap = 0] = gaps;
  if (gaps.length === 1) {
    return firstGap > (acceptable[0] ?? 0) ? 1 : acceptable.length;
  }

  for (let i = 0; i < gaps.length; i++) {
    // Gap 0 has no prior gaps, so it is measured against all the others.
    const reference = i === 0 ? gaps.slice(1) : gaps.slice(0, i);
    const baseline = Math.max(mean(reference), AVG_FLOOR);
    if ((gaps[i] ?? 0) / baseline >= GAP_MULTIPLIER) {
      return i + 1;
    }
  }
  return acceptable.length;
}
