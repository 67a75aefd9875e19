import type { CommitRecord, ContributorSummary, LineCount, RepoYearStats } from './types';

/** Share of analyzed repositories flagged as hot, in percent. */
export const HOT_REPOSITORY_PERCENT = 20;
export const TOP_CONTRIBUTOR_COUNT = 5;

export type ContributorTally = { identity: string; name: string; commits: number };

export function commitIdentity(name: string, email: string): string {
  const e = email.trim().toLowerCase();
  return e || name.trim();
}

/** Counts commits per identity; the display name is the first one seen (git log lists newest first). */
export function tallyContributors(commits: CommitRecord[]): ContributorTally[] {
  const byIdentity = new Map<string, ContributorTally>();
  for (const c of commits) {
    if (!c.identity) continue;
    const t = byIdentity.get(c.identity);
    if (t) t.commits++;
    else byIdentity.set(c.identity, { identity: c.identity, name: c.authorName, commits: 1 });
  }
  return [...byIdentity.values()];
}

function compareIdentity(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function rankContributors(tallies: ContributorTally[], limit = TOP_CONTRIBUTOR_COUNT): ContributorSummary[] {
  return [...tallies]
    .sort((a, b) => (b.commits - a.commits) || compareIdentity(a.identity, b.identity))
    .slice(0, limit)
    .map((t, i) => ({ identity: t.identity, name: t.name, commits: t.commits, rank: i + 1 }));
}

export function hotRepositoryCount(n: number): number {
  if (n <= 0) return 0;
  return Math.ceil((n * HOT_REPOSITORY_PERCENT) / 100);
}

/**
 * Names of the hot repositories, best first. Input order is the tie-break,
 * so pass repositories in listing order.
 */
export function selectHotRepositories(repos: { name: string; commitCount: number }[]): string[] {
  const ranked = repos
    .map((r, index) => ({ ...r, index }))
    .sort((a, b) => (b.commitCount - a.commitCount) || (a.index - b.index));
  return ranked.slice(0, hotRepositoryCount(repos.length)).map(r => r.name);
}

export type SummaryInput = {
  latestCommitSha: string;
  defaultBranch: string;
  commits: CommitRecord[];
  lineCount: LineCount | null;
};

export function summarizeRepository(input: SummaryInput): RepoYearStats {
  let linesAdded = 0, linesDeleted = 0;
  for (const c of input.commits) { linesAdded += c.linesAdded; linesDeleted += c.linesDeleted; }
  return {
    latestCommitSha: input.latestCommitSha,
    defaultBranch: input.defaultBranch,
    commitCount: input.commits.length,
    linesAdded,
    linesDeleted,
    linesOfCode: input.lineCount,
    lineCountFailed: input.lineCount === null,
    hot: false,
    partial: input.lineCount === null,
    contributors: rankContributors(tallyContributors(input.commits)),
  };
}
