import { ImageResult, PostResult } from './types';

/** Higher severity wins: a single SMALLER image decides the whole post. */
export const IMAGE_RESULT_SEVERITY: Readonly<Record<ImageResult, number>> = {
  [ImageResult.VALID]: 0,
  [ImageResult.LARGER]: 1,
  [ImageResult.UNSUPPORTED_MEDIA_TYPE]: 2,
  [ImageResult.SMALLER]: 3,
};

const POST_RESULT_FOR_IMAGE: Readonly<Record<ImageResult, PostResult>> = {
  [ImageResult.VALID]: PostResult.VALID,
  [ImageResult.LARGER]: PostResult.LARGER,
  [ImageResult.UNSUPPORTED_MEDIA_TYPE]: PostResult.UNSUPPORTED_MEDIA_TYPE,
  [ImageResult.SMALLER]: PostResult.SMALLER,
};

export function toPostResult(result: ImageResult): PostResult {
  return POST_RESULT_FOR_IMAGE[result];
}

export function aggregateImageResults(results: readonly ImageResult[]): PostResult {
  if (results.length === 0) {
    throw new Error('Cannot aggregate the results of a submission without images');
  }

  let worst = ImageResult.VALID;
  for (const result of results) {
    if (IMAGE_RESULT_SEVERITY[result] > IMAGE_RESULT_SEVERITY[worst]) {
      worst = result;
    }
  }
  return toPostResult(worst);
}
