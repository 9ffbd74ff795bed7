import { BridgeFailure, ChangeRequest, ChangeRequestDefaults } from '../types';
import { failure } from './errors';

export const DEFAULT_COMMIT_MESSAGE = 'Automatically generated change';
export const DEFAULT_AUTHOR = 'Unknown';

/**
 * Subject grammar. Clauses are optional but must keep this order; the
 * remainder is the target file.
 *
 *   [commit_msg:..] [branch:..] [author:..] [repo:..] [tag:..] path/to/file.ext
 */
const SUBJECT_PATTERN =
  /^(?:\[commit_msg:(?<commitMessage>.*?)\])?\s*(?:\[branch:(?<branch>.*?)\])?\s*(?:\[author:(?<author>.*?)\])?\s*(?:\[repo:(?<repo>.*?)\])?\s*(?:\[tag:(?<tag>.*?)\])?\s*(?<target>.+)$/;

const CLAUSE_PATTERN = /\[(?:commit_msg|branch|author|repo|tag):/;

const EXTENSION_PATTERN = /\..+/;

export type ParsedSubject = Omit<ChangeRequest, 'content'>;

export type ParseOutcome =
  | { ok: true; request: ParsedSubject }
  | { ok: false; failure: BridgeFailure };

function malformed(reason: string): ParseOutcome {
  return { ok: false, failure: failure('MalformedSubject', reason) };
}

/**
 * Trimmed clause value, or the fallback when the clause is absent or blank
 */
function clause(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

/**
 * Parse a subject line into a change request (without body content).
 *
 * The trailing token may carry a directory prefix: `notes/readme.md`
 * yields filename `readme.md` and path `notes`.
 */
export function parseSubject(subject: string, defaults: ChangeRequestDefaults): ParseOutcome {
  const match = SUBJECT_PATTERN.exec(subject.trim());
  const groups = match?.groups;
  if (!groups) {
    return malformed('Subject is empty or not in the expected format');
  }

  const target = groups.target.trim();
  if (CLAUSE_PATTERN.test(target)) {
    return malformed(`Clauses out of order or unterminated in "${subject}"`);
  }

  const segments = target.replace(/^\/+|\/+$/g, '').split('/');
  if (segments.some((segment) => segment.trim() === '' || segment === '.' || segment === '..')) {
    return malformed(`Invalid path in "${target}"`);
  }

  const filename = segments[segments.length - 1];
  if (!EXTENSION_PATTERN.test(filename)) {
    return malformed(`Filename "${filename}" has no extension`);
  }

  const directory = segments.slice(0, -1).join('/');
  const tagName = groups.tag?.trim();

  return {
    ok: true,
    request: {
      filename,
      path: directory || undefined,
      commitMessage: clause(groups.commitMessage, defaults.commitMessage),
      branch: clause(groups.branch, defaults.branch),
      author: clause(groups.author, defaults.author),
      repoName: clause(groups.repo, defaults.repoName),
      tagName: tagName || undefined,
    },
  };
}
