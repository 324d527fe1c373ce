import { createClient } from '@supabase/supabase-js';
import { beforeEach, describe, it, expect } from 'vitest';
import { SupabaseSubmissionStore, toImageRows, toSubmissionRow } from './submission-store';
import { ImageResult, PostResult, PostType, Submission } from './types';

const submission: Submission = {
  postId: 'abc123',
  title: '[1920x1080] [3840x1080] Dunes',
  author: 'painter',
  permalink: '/r/wallpaper/comments/abc123/dunes/',
  domain: 'reddit.com',
  dateSubmitted: new Date('2024-05-01T10:00:00Z'),
  resolutions: [
    [1920, 1080],
    [3840, 1080],
  ],
  titleTokens: [],
  goodResolutions: [[1920, 1080]],
  type: PostType.GALLERY,
  result: PostResult.SMALLER,
  specialSource: null,
  response: 'Hello',
  images: [
    { url: 'https://i.redd.it/a.png', format: 'PNG', width: 1920, height: 1080, result: ImageResult.VALID },
    { url: 'https://i.redd.it/b.jpg', format: 'JPEG', width: 1280, height: 720, result: ImageResult.SMALLER },
  ],
};

describe('toSubmissionRow', () => {
  it('maps a submission to its table row', () => {
    expect(toSubmissionRow(submission, new Date('2024-05-01T10:05:00Z'))).toEqual({
      post_id: 'abc123',
      title: '[1920x1080] [3840x1080] Dunes',
      author: 'painter',
      permalink: '/r/wallpaper/comments/abc123/dunes/',
      res: '1920x1080,3840x1080',
      date_submitted: '2024-05-01T10:00:00.000Z',
      date_processed: '2024-05-01T10:05:00.000Z',
      domain: 'reddit.com',
      removed: false,
      result: PostResult.SMALLER,
      response: 'Hello',
      type: PostType.GALLERY,
    });
  });
});

describe('toImageRows', () => {
  it('keeps images in gallery order', () => {
    expect(toImageRows(submission)).toEqual([
      { post_id: 'abc123', url: 'https://i.redd.it/a.png', format: 'PNG', x: 1920, y: 1080, result: ImageResult.VALID },
      { post_id: 'abc123', url: 'https://i.redd.it/b.jpg', format: 'JPEG', x: 1280, y: 720, result: ImageResult.SMALLER },
    ]);
  });

  it('has no rows for submissions without images', () => {
    expect(toImageRows({ ...submission, images: [] })).toEqual([]);
  });
});

type Row = Record<string, unknown>;

interface PostgrestFailure {
  status: number;
  code: string;
  message: string;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function postgrestError(status: number, code: string, message: string, details: string | null = null): Response {
  return json({ code, message, details, hint: null }, status);
}

/**
 * Just enough of PostgREST for the store: eq filters, single-object reads,
 * inserts with a unique post_id on submissions, and deletes.
 */
class InMemoryPostgrest {
  readonly tables = new Map<string, Row[]>([
    ['submissions', []],
    ['images', []],
  ]);
  private readonly failures = new Map<string, PostgrestFailure>();

  rows(table: string): Row[] {
    return this.tables.get(table) ?? [];
  }

  failOn(method: string, table: string, failure: PostgrestFailure): void {
    this.failures.set(`${method} ${table}`, failure);
  }

  readonly fetch = async (input: Parameters<typeof fetch>[0], init: RequestInit = {}): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const table = url.pathname.replace('/rest/v1/', '');
    const method = init.method ?? 'GET';
    const rows = this.rows(table);

    const failure = this.failures.get(`${method} ${table}`);
    if (failure) {
      return postgrestError(failure.status, failure.code, failure.message);
    }

    const filters = [...url.searchParams]
      .filter(([column]) => column !== 'select' && column !== 'columns')
      .map(([column, value]) => [column, value.replace(/^eq\./, '')]);
    const matches = (row: Row) => filters.every(([column, value]) => String(row[column]) === value);

    switch (method) {
      case 'GET': {
        const found = rows.filter(matches);
        if (new Headers(init.headers).get('accept') !== 'application/vnd.pgrst.object+json') {
          return json(found);
        }
        if (found.length !== 1) {
          return postgrestError(
            406,
            'PGRST116',
            'JSON object requested, multiple (or no) rows returned',
            `The result contains ${found.length} rows`,
          );
        }
        return json(found[0]);
      }
      case 'POST': {
        const body: unknown = JSON.parse(String(init.body));
        const items: unknown[] = Array.isArray(body) ? body : [body];
        const inserted = items.filter(isRow);
        const duplicate =
          table === 'submissions' && inserted.some((row) => rows.some((existing) => existing.post_id === row.post_id));
        if (duplicate) {
          return postgrestError(409, '23505', 'duplicate key value violates unique constraint "submissions_post_id_key"');
        }
        rows.push(...inserted);
        return new Response(null, { status: 201 });
      }
      case 'DELETE':
        this.tables.set(table, rows.filter((row) => !matches(row)));
        return new Response(null, { status: 204 });
      default:
        return postgrestError(405, 'PGRST000', `Unsupported method ${method}`);
    }
  };
}

describe('SupabaseSubmissionStore', () => {
  const processedAt = new Date('2024-05-01T10:05:00Z');
  let postgrest: InMemoryPostgrest;
  let store: SupabaseSubmissionStore;

  beforeEach(() => {
    postgrest = new InMemoryPostgrest();
    store = new SupabaseSubmissionStore(
      createClient('http://localhost:54321', 'test-anon-key', {
        auth: { persistSession: false, autoRefreshToken: false },
        global: { fetch: postgrest.fetch },
      }),
    );
  });

  it('has no processing date for unknown posts', async () => {
    expect(await store.findProcessed('abc123')).toBeNull();
  });

  it('saves the submission with its images', async () => {
    await store.save(submission, processedAt);

    expect(postgrest.rows('submissions')).toEqual([toSubmissionRow(submission, processedAt)]);
    expect(postgrest.rows('images')).toEqual(toImageRows(submission));
    expect(await store.findProcessed('abc123')).toEqual(processedAt);
  });

  it('saves submissions without images', async () => {
    await store.save({ ...submission, images: [] }, processedAt);

    expect(postgrest.rows('submissions')).toHaveLength(1);
    expect(postgrest.rows('images')).toEqual([]);
  });

  it('reports errors other than a missing row', async () => {
    postgrest.failOn('GET', 'submissions', { status: 503, code: 'PGRST000', message: 'database unavailable' });

    await expect(store.findProcessed('abc123')).rejects.toThrow('Error checking submission abc123: database unavailable');
  });

  it('fails when the submission is already stored', async () => {
    await store.save(submission, processedAt);

    await expect(store.save(submission, processedAt)).rejects.toThrow(
      'Error inserting submission abc123: duplicate key value violates unique constraint "submissions_post_id_key"',
    );
    expect(postgrest.rows('images')).toHaveLength(2);
  });

  it('removes the submission again when its images cannot be stored', async () => {
    postgrest.failOn('POST', 'images', { status: 500, code: 'XX000', message: 'images unavailable' });

    await expect(store.save(submission, processedAt)).rejects.toThrow(
      'Error inserting images of abc123: images unavailable',
    );
    expect(postgrest.rows('submissions')).toEqual([]);
    expect(await store.findProcessed('abc123')).toBeNull();
  });

  it('reports a failed removal of the submission', async () => {
    postgrest.failOn('POST', 'images', { status: 500, code: 'XX000', message: 'images unavailable' });
    postgrest.failOn('DELETE', 'submissions', { status: 500, code: 'XX000', message: 'delete refused' });

    await expect(store.save(submission, processedAt)).rejects.toThrow(
      'Error inserting images of abc123: images unavailable (removing the submission also failed: delete refused)',
    );
  });
});
