import * as fs from 'fs';
import * as path from 'path';
import { PostResult, PostType, Submission } from './types';

const TEMPLATE_FILES = {
  [PostResult.NO_RESOLUTION]: 'no-resolution.md',
  [PostResult.UNSUPPORTED_RES]: 'unsupported-resolution.md',
  [PostResult.LARGER]: 'larger.md',
  [PostResult.SMALLER]: 'smaller.md',
} as const;

type RespondedResult = keyof typeof TEMPLATE_FILES;

export interface ResponseTemplates {
  header: string;
  footer: string;
  messages: Record<RespondedResult, string>;
}

export function loadResponseTemplates(
  directory: string = path.join(process.cwd(), 'responses'),
): ResponseTemplates {
  const read = (file: string) => fs.readFileSync(path.join(directory, file), 'utf8').trim();

  return {
    header: read('header.md'),
    footer: read('footer.md'),
    messages: {
      [PostResult.NO_RESOLUTION]: read(TEMPLATE_FILES[PostResult.NO_RESOLUTION]),
      [PostResult.UNSUPPORTED_RES]: read(TEMPLATE_FILES[PostResult.UNSUPPORTED_RES]),
      [PostResult.LARGER]: read(TEMPLATE_FILES[PostResult.LARGER]),
      [PostResult.SMALLER]: read(TEMPLATE_FILES[PostResult.SMALLER]),
    },
  };
}

function isRespondedResult(result: PostResult): result is RespondedResult {
  return result in TEMPLATE_FILES;
}

function submissionKind(type: PostType): string {
  switch (type) {
    case PostType.GALLERY:
      return 'gallery';
    case PostType.IMAGE:
      return 'image';
    default:
      return 'submission';
  }
}

/**
 * Moderator reply for a classified submission, or null when the result needs
 * no reply (valid posts, modposts, unsupported links and media).
 */
export function buildResponse(
  submission: Submission,
  subreddit: string,
  templates: ResponseTemplates,
): string | null {
  if (!isRespondedResult(submission.result)) return null;

  const values: Record<string, string> = {
    author: submission.author ?? '[deleted]',
    kind: submissionKind(submission.type),
    permalink: submission.permalink,
    subreddit,
  };
  const text = [templates.header, templates.messages[submission.result], templates.footer].join('\n\n');

  return text.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}
