import type { CommitRecord, ComplianceResult, PullRequestSummary } from './types';

export const COMMIT_TYPES = ['feat', 'fix', 'docs', 'style', 'refactor', 'perf', 'test', 'build', 'ci', 'chore', 'revert'] as const;
export type CommitType = typeof COMMIT_TYPES[number];

const COMMIT_TYPE_SET: ReadonlySet<string> = new Set(COMMIT_TYPES);

export function isCommitType(s: string): s is CommitType {
  return COMMIT_TYPE_SET.has(s);
}

export type NonconformingReason =
  | 'unknown-type'
  | 'unterminated-scope'
  | 'empty-scope'
  | 'missing-colon'
  | 'missing-space'
  | 'empty-description';

export type ParsedHeader =
  | { kind: 'conventional'; type: CommitType; scope: string | null; breaking: boolean; description: string }
  | { kind: 'nonconforming'; reason: NonconformingReason };

export function headerLine(message: string): string {
  return message.replace(/^[\r\n]+/, '').split(/\r?\n/, 1)[0] ?? '';
}

function nonconforming(reason: NonconformingReason): ParsedHeader {
  return { kind: 'nonconforming', reason };
}

/** Scans `<type>[(scope)][!]: <description>` from the first line of a commit message. */
export function parseCommitHeader(message: string): ParsedHeader {
  const line = headerLine(message);
  let i = 0;
  while (i < line.length && /[A-Za-z]/.test(line.charAt(i))) i++;
  const type = line.slice(0, i);
  if (!isCommitType(type)) return nonconforming('unknown-type');

  let scope: string | null = null;
  if (line.charAt(i) === '(') {
    const close = line.indexOf(')', i + 1);
    if (close < 0) return nonconforming('unterminated-scope');
    scope = line.slice(i + 1, close);
    if (!scope.trim()) return nonconforming('empty-scope');
    i = close + 1;
  }

  let breaking = false;
  if (line.charAt(i) === '!') { breaking = true; i++; }

  if (line.charAt(i) !== ':') return nonconforming('missing-colon');
  i++;
  if (line.charAt(i) !== ' ') return nonconforming('missing-space');

  const description = line.slice(i + 1).trim();
  if (!description) return nonconforming('empty-description');
  return { kind: 'conventional', type, scope, breaking, description };
}

export function isConventionalCommit(message: string): boolean {
  return parseCommitHeader(message).kind === 'conventional';
}

export function isReviewBacked(pr: PullRequestSummary | null): boolean {
  return pr !== null && pr.merged && pr.approved;
}

export type PullRequestLookup = (sha: string) => Promise<PullRequestSummary | null>;

/**
 * Classifies one contributor's commits. A failed lookup counts the commit as
 * direct; `failures` reports how many lookups failed.
 */
export async function classifyContributor(
  commits: CommitRecord[],
  lookup: PullRequestLookup,
  onFailure: (sha: string, err: unknown) => void = () => {},
): Promise<{ result: ComplianceResult; failures: number }> {
  const result: ComplianceResult = { compliantCount: 0, totalCount: 0, reviewedCount: 0, directCount: 0 };
  let failures = 0;
  const reviewed = await Promise.all(commits.map(async c => {
    try {
      return isReviewBacked(await lookup(c.sha));
    } catch (err) {
      failures++;
      onFailure(c.sha, err);
      return false;
    }
  }));
  commits.forEach((c, i) => {
    result.totalCount++;
    if (isConventionalCommit(c.message)) result.compliantCount++;
    if (reviewed[i]) result.reviewedCount++;
    else result.directCount++;
  });
  return { result, failures };
}
