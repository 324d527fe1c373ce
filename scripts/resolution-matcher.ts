import { ReadonlyResolutionSet, ResolutionSet } from './resolution';
import { PostResult, Resolution, ResolutionScale } from './types';

// Single, dual and triple monitor spans, smallest first
const MONITOR_SCALES = [1, 2, 3] as const;

/**
 * Find the smallest monitor scale at which the declared width, divided by the
 * scale, and the declared height form a known-good resolution. Returns 0 when
 * no scale matches.
 */
export function classifyScale(
  [width, height]: Resolution,
  knownGood: ReadonlyResolutionSet,
): ResolutionScale {
  for (const scale of MONITOR_SCALES) {
    if (knownGood.has([Math.floor(width / scale), height])) {
      return scale;
    }
  }
  return 0;
}

/**
 * Good resolutions are recorded under the declared (unscaled) pair.
 */
export function collectGoodResolutions(
  classified: Iterable<{ resolution: Resolution; scale: ResolutionScale }>,
): ResolutionSet {
  const good = new ResolutionSet();
  for (const { resolution, scale } of classified) {
    if (scale > 0) {
      good.add(resolution);
    }
  }
  return good;
}

export function checkDeclaredResolutions(
  declared: readonly Resolution[],
  good: ReadonlyResolutionSet,
): PostResult | null {
  if (declared.length === 0) {
    return PostResult.NO_RESOLUTION;
  }
  if (good.size === 0) {
    return PostResult.UNSUPPORTED_RES;
  }
  return null;
}
