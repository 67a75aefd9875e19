import pLimit from 'p-limit';
import type { Logger } from './cli';
import type { LineCountResult } from './cloc';
import { classifyContributor } from './compliance';
import { AuthError, errorMessage } from './errors';
import { selectHotRepositories, summarizeRepository } from './metrics';
import { mergeReports } from './output';
import type { CommitRecord, PullRequestSummary, Report, RepoDescriptor, RepoEntry, RepoYearStats } from './types';

export interface RepoSource {
  listOrgRepos(org: string): Promise<RepoDescriptor[]>;
  latestCommitSha(repo: RepoDescriptor, year: number): Promise<string | null>;
  listCommits(repo: RepoDescriptor, year: number, opts?: { includeMerges?: boolean }): Promise<CommitRecord[]>;
  findPullRequestForCommit(repo: RepoDescriptor, sha: string): Promise<PullRequestSummary | null>;
}

export type PipelineDeps = {
  api: RepoSource;
  ensureLocalMirror: (repo: RepoDescriptor) => Promise<string>;
  readCommits: (localPath: string, repo: RepoDescriptor, year: number) => Promise<CommitRecord[]>;
  countLines: (localPath: string) => Promise<LineCountResult>;
  hasTests: (localPath: string) => boolean;
  logger: Logger;
};

export type PipelineOptions = {
  org: string;
  year: number;
  exclude: string[];
  concurrency: number;
  existing: Report;
  /** Applies to commits listed through the API; the git path is configured by the caller. */
  includeMerges?: boolean;
};

export type Outcome = 'succeeded' | 'unchanged' | 'partial' | 'skipped' | 'failed' | 'excluded';
export type RunSummary = Record<Outcome, number>;

type Analyzed = {
  repo: RepoDescriptor;
  entry: RepoEntry;
  stats: RepoYearStats;
  /** Commits read this run; absent when the stored stats were reused. */
  commits: CommitRecord[] | null;
  outcome: 'succeeded' | 'unchanged';
};

export function emptySummary(): RunSummary {
  return { succeeded: 0, unchanged: 0, partial: 0, skipped: 0, failed: 0, excluded: 0 };
}

export function formatSummary(s: RunSummary): string {
  return `Repositories: ${s.succeeded} succeeded, ${s.unchanged} unchanged, ${s.partial} partial, ${s.skipped} skipped, ${s.failed} failed, ${s.excluded} excluded`;
}

function createdAfter(repo: RepoDescriptor, year: number): boolean {
  if (!repo.createdAt) return false;
  const created = new Date(repo.createdAt);
  return !Number.isNaN(created.getTime()) && created.getUTCFullYear() > year;
}

/** Repositories the run will analyze, in listing order. */
export function selectRepositories(repos: RepoDescriptor[], exclude: string[], year: number): { selected: RepoDescriptor[]; excluded: number; skipped: RepoDescriptor[] } {
  const excludedNames = new Set(exclude);
  const selected: RepoDescriptor[] = [];
  const skipped: RepoDescriptor[] = [];
  let excluded = 0;
  for (const repo of repos) {
    if (excludedNames.has(repo.name)) excluded++;
    else if (createdAfter(repo, year)) skipped.push(repo);
    else selected.push(repo);
  }
  return { selected, excluded, skipped };
}

export async function runPipeline(opts: PipelineOptions, deps: PipelineDeps): Promise<{ report: Report; summary: RunSummary }> {
  const { logger } = deps;
  const yearKey = String(opts.year);
  const summary = emptySummary();
  const limit = pLimit(Math.max(1, opts.concurrency));

  const listed = await deps.api.listOrgRepos(opts.org);
  const { selected, excluded, skipped } = selectRepositories(listed, opts.exclude, opts.year);
  summary.excluded = excluded;
  summary.skipped = skipped.length;
  for (const repo of skipped) logger.debug(`${repo.name}: created after ${opts.year}, skipped`);
  logger.info(`Processing ${selected.length} repositories of ${opts.org} for ${opts.year} ...`);

  const results = new Map<string, Analyzed>();
  let done = 0;

  const collect = async (repo: RepoDescriptor): Promise<void> => {
    try {
      const latest = await deps.api.latestCommitSha(repo, opts.year);
      if (latest === null) {
        logger.debug(`${repo.name}: no commits up to ${opts.year}, skipped`);
        summary.skipped++;
        return;
      }
      const prior = opts.existing[repo.name];
      const priorStats = prior?.yearlyStats[yearKey];
      // Partial results are collected again
      if (prior && priorStats && priorStats.latestCommitSha === latest && !priorStats.partial) {
        logger.debug(`${repo.name}: unchanged since ${latest.slice(0, 12)}`);
        results.set(repo.name, { repo, entry: prior, stats: priorStats, commits: null, outcome: 'unchanged' });
        return;
      }
      const localPath = await deps.ensureLocalMirror(repo);
      const commits = await deps.readCommits(localPath, repo, opts.year);
      const lines = await deps.countLines(localPath);
      if (!lines.ok) logger.warn(`${repo.name}: line count unavailable (${lines.message})`);
      const stats = summarizeRepository({ latestCommitSha: latest, defaultBranch: repo.defaultBranch, commits, lineCount: lines.lineCount });
      const entry: RepoEntry = { localPath, hasTests: deps.hasTests(localPath), yearlyStats: {} };
      results.set(repo.name, { repo, entry, stats, commits, outcome: 'succeeded' });
    } catch (err) {
      if (err instanceof AuthError) throw err;
      summary.failed++;
      logger.error(`${repo.name}: ${errorMessage(err)}`);
    } finally {
      done++;
      logger.info(`  … ${done}/${selected.length}`);
    }
  };

  await Promise.all(selected.map(repo => limit(() => collect(repo))));

  // Rank in listing order so ties fall to the earlier repository
  const analyzed = selected.flatMap(repo => {
    const a = results.get(repo.name);
    return a ? [a] : [];
  });
  const hot = new Set(selectHotRepositories(analyzed.map(a => ({ name: a.repo.name, commitCount: a.stats.commitCount }))));
  if (hot.size > 0) logger.info(`Hot repositories: ${[...hot].join(', ')}`);

  await Promise.all(analyzed.map(async a => {
    a.stats = await annotateCompliance(a, hot.has(a.repo.name), opts, deps, limit);
  }));
  const carried = clearStaleHotFlags(opts.existing, yearKey, new Set(results.keys()));

  const incoming: Report = {};
  for (const a of analyzed) {
    incoming[a.repo.name] = { localPath: a.entry.localPath, hasTests: a.entry.hasTests, yearlyStats: { [yearKey]: a.stats } };
    if (a.stats.partial) summary.partial++;
    else summary[a.outcome]++;
  }

  return { report: mergeReports(carried, incoming, opts.exclude), summary };
}

/** Years from the earliest repository creation up to `year`, for backfilling a report. */
export function backfillYears(repos: RepoDescriptor[], year: number): number[] {
  let first = year;
  for (const repo of repos) {
    const created = repo.createdAt ? new Date(repo.createdAt).getUTCFullYear() : NaN;
    if (Number.isFinite(created) && created < first) first = created;
  }
  const years: number[] = [];
  for (let y = first; y <= year; y++) years.push(y);
  return years;
}

function withoutCompliance(stats: RepoYearStats): RepoYearStats {
  return { ...stats, hot: false, contributors: stats.contributors.map(({ compliance: _dropped, ...c }) => c) };
}

/**
 * Stored stats of the year for repositories not analyzed this run lose their
 * hot flag, since the hot set is ranked over this run's repositories only.
 */
export function clearStaleHotFlags(existing: Report, yearKey: string, analyzed: Set<string>): Report {
  const out: Report = {};
  for (const [name, entry] of Object.entries(existing)) {
    const stats = entry.yearlyStats[yearKey];
    if (analyzed.has(name) || !stats || !(stats.hot || stats.contributors.some(c => c.compliance))) {
      out[name] = entry;
      continue;
    }
    out[name] = { ...entry, yearlyStats: { ...entry.yearlyStats, [yearKey]: withoutCompliance(stats) } };
  }
  return out;
}

type Limit = ReturnType<typeof pLimit>;

async function annotateCompliance(a: Analyzed, isHot: boolean, opts: PipelineOptions, deps: PipelineDeps, limit: Limit): Promise<RepoYearStats> {
  if (!isHot) return withoutCompliance(a.stats);
  const stats: RepoYearStats = { ...a.stats, hot: true };
  if (a.commits === null && stats.contributors.every(c => c.compliance)) return stats;

  let commits = a.commits;
  if (commits === null) {
    try {
      commits = await limit(() => deps.api.listCommits(a.repo, opts.year, { includeMerges: opts.includeMerges }));
    } catch (err) {
      if (err instanceof AuthError) throw err;
      deps.logger.warn(`${a.repo.name}: could not list commits for compliance (${errorMessage(err)})`);
      return { ...stats, partial: true };
    }
  }

  let failures = 0;
  const byIdentity = new Map<string, CommitRecord[]>();
  for (const c of commits) {
    const list = byIdentity.get(c.identity);
    if (list) list.push(c);
    else byIdentity.set(c.identity, [c]);
  }
  const contributors = await Promise.all(stats.contributors.map(async contributor => {
    const own = byIdentity.get(contributor.identity) ?? [];
    const classified = await classifyContributor(
      own,
      sha => limit(() => deps.api.findPullRequestForCommit(a.repo, sha)),
      (sha, err) => deps.logger.warn(`${a.repo.name}: pull request lookup for ${sha.slice(0, 12)} failed (${errorMessage(err)})`),
    );
    failures += classified.failures;
    return { ...contributor, compliance: classified.result };
  }));
  return { ...stats, contributors, partial: stats.partial || failures > 0 };
}
