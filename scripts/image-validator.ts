import { ReadonlyResolutionSet } from './resolution';
import { DimensionLookup, ImageResult, Resolution } from './types';

export interface DimensionComparison {
  resolution: Resolution;
  atLeastAsLarge: boolean;
}

export interface ImageCheck {
  result: ImageResult;
  format: string;
  width: number;
  height: number;
  comparisons: DimensionComparison[];
}

/**
 * Compare one image against the good resolutions of its submission. An image
 * that is not an exact match counts as LARGER when it is at least as big, in
 * both dimensions, as any one of them.
 */
export function validateImageDimensions(
  lookup: DimensionLookup,
  good: ReadonlyResolutionSet,
): ImageCheck {
  if (!lookup.ok) {
    return {
      result: ImageResult.UNSUPPORTED_MEDIA_TYPE,
      format: '',
      width: 0,
      height: 0,
      comparisons: [],
    };
  }

  const { width, height, format } = lookup;
  if (good.has([width, height])) {
    return { result: ImageResult.VALID, format, width, height, comparisons: [] };
  }

  const comparisons = good.values().map(
    (resolution): DimensionComparison => ({
      resolution,
      atLeastAsLarge: width >= resolution[0] && height >= resolution[1],
    }),
  );
  const satisfied = comparisons.some((comparison) => comparison.atLeastAsLarge);

  return {
    result: satisfied ? ImageResult.LARGER : ImageResult.SMALLER,
    format,
    width,
    height,
    comparisons,
  };
}
