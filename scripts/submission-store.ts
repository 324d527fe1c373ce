import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { resolutionKey } from './resolution';
import { ImageRow, Submission, SubmissionRow } from './types';

// PGRST116 is "not found" for .single()
const NOT_FOUND = 'PGRST116';

export interface SubmissionStore {
  /** Processing date of an already stored submission, or null */
  findProcessed(postId: string): Promise<Date | null>;
  save(submission: Submission, dateProcessed: Date): Promise<void>;
}

export function toSubmissionRow(submission: Submission, dateProcessed: Date): SubmissionRow {
  return {
    post_id: submission.postId,
    title: submission.title,
    author: submission.author,
    permalink: submission.permalink,
    res: submission.resolutions.map(resolutionKey).join(','),
    date_submitted: submission.dateSubmitted.toISOString(),
    date_processed: dateProcessed.toISOString(),
    domain: submission.domain,
    removed: false,
    result: submission.result,
    response: submission.response,
    type: submission.type,
  };
}

export function toImageRows(submission: Submission): ImageRow[] {
  return submission.images.map((image) => ({
    post_id: submission.postId,
    url: image.url,
    format: image.format,
    x: image.width,
    y: image.height,
    result: image.result,
  }));
}

export class SupabaseSubmissionStore implements SubmissionStore {
  constructor(private readonly supabase: SupabaseClient) {}

  static fromCredentials(url: string, anonKey: string): SupabaseSubmissionStore {
    return new SupabaseSubmissionStore(createClient(url, anonKey));
  }

  async findProcessed(postId: string): Promise<Date | null> {
    const { data, error } = await this.supabase
      .from('submissions')
      .select('date_processed')
      .eq('post_id', postId)
      .single<Pick<SubmissionRow, 'date_processed'>>();

    if (error && error.code !== NOT_FOUND) {
      throw new Error(`Error checking submission ${postId}: ${error.message}`);
    }

    return data ? new Date(data.date_processed) : null;
  }

  async save(submission: Submission, dateProcessed: Date): Promise<void> {
    const { error } = await this.supabase
      .from('submissions')
      .insert(toSubmissionRow(submission, dateProcessed));
    if (error) {
      throw new Error(`Error inserting submission ${submission.postId}: ${error.message}`);
    }

    const images = toImageRows(submission);
    if (images.length === 0) return;

    const { error: imageError } = await this.supabase.from('images').insert(images);
    if (imageError) {
      // A submission row is only kept together with its images
      const { error: rollbackError } = await this.supabase
        .from('submissions')
        .delete()
        .eq('post_id', submission.postId);
      const rollback = rollbackError ? ` (removing the submission also failed: ${rollbackError.message})` : '';
      throw new Error(`Error inserting images of ${submission.postId}: ${imageError.message}${rollback}`);
    }
  }
}
