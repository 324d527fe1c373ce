import { Resolution } from './types';

export function resolutionKey([width, height]: Resolution): string {
  return `${width}x${height}`;
}

export function formatResolution([width, height]: Resolution): string {
  return `${width}×${height}`;
}

export interface ReadonlyResolutionSet {
  readonly size: number;
  has(resolution: Resolution): boolean;
  values(): Resolution[];
}

/**
 * Set of resolutions compared by value. Keeps insertion order.
 */
export class ResolutionSet implements ReadonlyResolutionSet {
  private readonly entries = new Map<string, Resolution>();

  constructor(resolutions: Iterable<Resolution> = []) {
    for (const resolution of resolutions) {
      this.add(resolution);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  add(resolution: Resolution): this {
    const key = resolutionKey(resolution);
    if (!this.entries.has(key)) {
      this.entries.set(key, [resolution[0], resolution[1]]);
    }
    return this;
  }

  has(resolution: Resolution): boolean {
    return this.entries.has(resolutionKey(resolution));
  }

  values(): Resolution[] {
    return [...this.entries.values()];
  }
}
