import { log } from './logger';
import { ResolutionSet } from './resolution';
import { RedditOAuthManager } from './reddit-oauth-manager';

const SEPARATOR_ROW = /^\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?$/;

function splitRow(line: string): string[] {
  return line
    .trim()
    .replace(/^\|/, '')
    .replace(/\|$/, '')
    .split('|')
    .map((cell) => cell.trim());
}

function isResolutionHeader(cells: string[]): boolean {
  if (cells.length < 3) return false;
  const [width, height, description] = cells.map((cell) => cell.toLowerCase());
  return width.includes('width') && height.includes('height') && description.includes('description');
}

function parseDimension(cell: string | undefined, line: string): number {
  const value = (cell ?? '').replace(/\*/g, '').trim();
  if (!/^\d+$/.test(value)) {
    throw new Error(`Malformed resolution row in wiki table: '${line.trim()}'`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Read the first markdown table whose columns start with Width, Height and
 * Description, and return every (width, height) row.
 */
export function parseResolutionTable(markdown: string): ResolutionSet {
  const lines = markdown.split(/\r?\n/);

  for (let i = 0; i < lines.length - 1; i++) {
    if (!lines[i].includes('|') || !isResolutionHeader(splitRow(lines[i]))) continue;
    if (!SEPARATOR_ROW.test(lines[i + 1].trim())) continue;

    const resolutions = new ResolutionSet();
    for (const line of lines.slice(i + 2)) {
      if (!line.includes('|')) break;
      const [width, height]: (string | undefined)[] = splitRow(line);
      resolutions.add([parseDimension(width, line), parseDimension(height, line)]);
    }
    return resolutions;
  }

  throw new Error('Unable to find a table with the appropriate (Width, Height, Description) headers');
}

export async function loadKnownGoodResolutions(
  reddit: Pick<RedditOAuthManager, 'fetchWikiPage'>,
  subreddit: string,
  page: string,
): Promise<ResolutionSet> {
  const markdown = await reddit.fetchWikiPage(subreddit, page);
  const resolutions = parseResolutionTable(markdown);
  log('INFO', `Loaded ${resolutions.size} known-good resolutions from /r/${subreddit}/wiki/${page}`);
  return resolutions;
}
