import { describe, it, expect } from 'vitest';
import { ResolutionSet } from './resolution';
import { checkDeclaredResolutions, classifyScale, collectGoodResolutions } from './resolution-matcher';
import { PostResult } from './types';

describe('classifyScale', () => {
  const knownGood = new ResolutionSet([
    [1920, 1080],
    [3840, 1080],
  ]);

  it('prefers an exact single monitor match over a dual monitor reading', () => {
    expect(classifyScale([3840, 1080], knownGood)).toBe(1);
  });

  it('falls back to dual and triple monitor widths', () => {
    expect(classifyScale([7680, 1080], knownGood)).toBe(2);
    expect(classifyScale([5760, 1080], knownGood)).toBe(3);
  });

  it('requires the height to match exactly', () => {
    expect(classifyScale([1920, 1200], knownGood)).toBe(0);
  });

  it('returns 0 past triple monitor spans', () => {
    expect(classifyScale([7681 * 2, 1080], knownGood)).toBe(0);
  });
});

describe('collectGoodResolutions', () => {
  it('keeps declared pairs with a non-zero scale', () => {
    const good = collectGoodResolutions([
      { resolution: [3840, 1080], scale: 2 },
      { resolution: [1000, 1000], scale: 0 },
      { resolution: [3840, 1080], scale: 2 },
    ]);

    expect(good.values()).toEqual([[3840, 1080]]);
  });
});

describe('checkDeclaredResolutions', () => {
  it('fails titles without a resolution', () => {
    expect(checkDeclaredResolutions([], new ResolutionSet())).toBe(PostResult.NO_RESOLUTION);
  });

  it('fails titles whose resolutions are all unsupported', () => {
    expect(checkDeclaredResolutions([[1000, 1000]], new ResolutionSet())).toBe(PostResult.UNSUPPORTED_RES);
  });

  it('passes titles with at least one good resolution', () => {
    const good = new ResolutionSet([[1920, 1080]]);
    expect(checkDeclaredResolutions([[1000, 1000], [1920, 1080]], good)).toBeNull();
  });
});
