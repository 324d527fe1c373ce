import { ReadonlyResolutionSet, ResolutionSet } from './resolution';
import { classifyScale, collectGoodResolutions } from './resolution-matcher';
import { Resolution, TitleToken } from './types';

// e.g. "[1920x1080]", "(2560 × 1440)", "{3840*1080}"
const RESOLUTION_PATTERN = /[[({]\s?([0-9]+)\s?[x*×]\s?([0-9]+)\s?[\])}]/gi;

export interface ResolutionMarker {
  text: string;
  start: number;
  end: number;
  resolution: Resolution;
}

export interface ParsedTitle {
  tokens: TitleToken[];
  resolutions: Resolution[];
  goodResolutions: ResolutionSet;
}

export function findResolutionMarkers(title: string): ResolutionMarker[] {
  const markers: ResolutionMarker[] = [];
  for (const match of title.matchAll(RESOLUTION_PATTERN)) {
    const start = match.index ?? 0;
    markers.push({
      text: match[0],
      start,
      end: start + match[0].length,
      resolution: [Number.parseInt(match[1], 10), Number.parseInt(match[2], 10)],
    });
  }
  return markers;
}

/**
 * Split a title into text and resolution tokens. Every marker is classified on
 * its own against the same known-good set, duplicates included.
 */
export function parseTitle(title: string, knownGood: ReadonlyResolutionSet): ParsedTitle {
  const markers = findResolutionMarkers(title);
  const tokens: TitleToken[] = [];
  const classified = markers.map((marker) => ({
    ...marker,
    scale: classifyScale(marker.resolution, knownGood),
  }));

  let cursor = 0;
  for (const marker of classified) {
    if (marker.start > cursor) {
      tokens.push({ kind: 'text', value: title.slice(cursor, marker.start) });
    }
    tokens.push({
      kind: 'resolution',
      value: marker.text,
      start: marker.start,
      end: marker.end,
      resolution: marker.resolution,
      scale: marker.scale,
    });
    cursor = marker.end;
  }
  if (cursor < title.length || tokens.length === 0) {
    tokens.push({ kind: 'text', value: title.slice(cursor) });
  }

  return {
    tokens,
    resolutions: markers.map((marker) => marker.resolution),
    goodResolutions: collectGoodResolutions(classified),
  };
}

export function joinTitleTokens(tokens: readonly TitleToken[]): string {
  return tokens.map((token) => token.value).join('');
}
