import { Octokit } from '@octokit/rest';
import type { Logger } from './cli';
import { silentLogger } from './cli';
import { AuthError, NetworkError, RateLimitedError, errorMessage } from './errors';
import type { CommitRecord, PullRequestSummary, RepoDescriptor } from './types';
import { commitIdentity } from './metrics';

type Headers = Record<string, string | number | undefined>;
type HttpFailure = { status: number; message?: string; response?: { headers?: Headers } };

export function isHttpFailure(err: unknown): err is HttpFailure {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

function header(headers: Headers | undefined, name: string): string | undefined {
  const v = headers?.[name];
  return v === undefined ? undefined : String(v);
}

/**
 * Rate-limit budget as last reported by GitHub. One instance is shared by
 * every request of a run.
 */
export class RateLimitState {
  remaining: number | null = null;
  /** Epoch milliseconds. */
  resetAt: number | null = null;
  waits = 0;

  observe(headers: Headers | undefined): void {
    const remaining = parseInt(header(headers, 'x-ratelimit-remaining') ?? '', 10);
    const reset = parseInt(header(headers, 'x-ratelimit-reset') ?? '', 10);
    if (Number.isFinite(remaining)) this.remaining = remaining;
    if (Number.isFinite(reset)) this.resetAt = reset * 1000;
  }

  /** How long to wait before the next request may go out. */
  pendingWait(now: number): number {
    if (this.remaining !== 0 || this.resetAt === null) return 0;
    return Math.max(0, this.resetAt - now + 1000);
  }

  /**
   * Delay before retrying a failed request, or null when the failure is not
   * a rate limit.
   */
  retryDelay(err: HttpFailure, attempt: number, now: number): number | null {
    const headers = err.response?.headers;
    const retryAfter = parseInt(header(headers, 'retry-after') ?? '', 10);
    const limited = err.status === 429 || (err.status === 403 && (header(headers, 'x-ratelimit-remaining') === '0' || Number.isFinite(retryAfter)));
    if (!limited) return null;
    this.observe(headers);
    if (Number.isFinite(retryAfter)) return Math.max(1000, retryAfter * 1000);
    if (this.resetAt !== null && this.resetAt > now) return this.resetAt - now + 1000;
    return Math.min(60_000, 1000 * 2 ** attempt);
  }
}

export type GitHubClientOptions = {
  token: string;
  rateLimit?: RateLimitState;
  maxRetries?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  baseUrl?: string;
  /** Replaces the fetch implementation Octokit sends requests through. */
  fetch?: typeof fetch;
};

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class GitHubClient {
  readonly octokit: Octokit;
  readonly rateLimit: RateLimitState;
  private readonly logger: Logger;

  constructor(private readonly opts: GitHubClientOptions) {
    this.rateLimit = opts.rateLimit ?? new RateLimitState();
    this.logger = opts.logger ?? silentLogger;
    const logger = this.logger;
    this.octokit = new Octokit({
      auth: opts.token,
      userAgent: 'org-repo-stats',
      ...(opts.baseUrl ? { baseUrl: opts.baseUrl } : {}),
      request: opts.fetch ? { fetch: opts.fetch } : {},
      log: { debug: (m: string) => logger.debug(m), info: (m: string) => logger.debug(m), warn: (m: string) => logger.debug(m), error: (m: string) => logger.debug(m) },
    });
    this.installRateLimitHook();
  }

  private installRateLimitHook(): void {
    const state = this.rateLimit;
    const sleep = this.opts.sleep ?? delay;
    const now = this.opts.now ?? Date.now;
    const maxRetries = this.opts.maxRetries ?? 5;
    const logger = this.logger;
    this.octokit.hook.wrap('request', async (request, options) => {
      for (let attempt = 0; ; attempt++) {
        const pending = state.pendingWait(now());
        if (pending > 0) {
          logger.info(`Rate limit exhausted; waiting ${Math.ceil(pending / 1000)}s for reset`);
          state.waits++;
          await sleep(pending);
          state.remaining = null;
        }
        try {
          const response = await request(options);
          state.observe(response.headers);
          return response;
        } catch (err) {
          if (!isHttpFailure(err)) throw err;
          const wait = state.retryDelay(err, attempt, now());
          if (wait === null) { state.observe(err.response?.headers); throw err; }
          if (attempt >= maxRetries) throw new RateLimitedError(`Rate limited on ${options.method} ${options.url} after ${attempt + 1} attempts`, { cause: err });
          logger.info(`Rate limited (HTTP ${err.status}); retrying in ${Math.ceil(wait / 1000)}s`);
          state.waits++;
          await sleep(wait);
          state.remaining = null;
        }
      }
    });
  }

  private translate(err: unknown, what: string): Error {
    if (err instanceof RateLimitedError) return err;
    if (isHttpFailure(err) && err.status === 401) return new AuthError(`GitHub rejected the token while ${what}`, { cause: err });
    return new NetworkError(`${what} failed: ${errorMessage(err)}`, { cause: err });
  }

  async authenticatedLogin(): Promise<string> {
    try {
      const { data } = await this.octokit.rest.users.getAuthenticated();
      return data.login;
    } catch (err) {
      throw this.translate(err, 'checking the token');
    }
  }

  async listOrgRepos(org: string): Promise<RepoDescriptor[]> {
    try {
      const repos = await this.octokit.paginate(this.octokit.rest.repos.listForOrg, { org, per_page: 100, type: 'all' });
      return repos.map(r => ({
        name: r.name,
        fullName: r.full_name,
        defaultBranch: r.default_branch ?? 'main',
        cloneUrl: r.clone_url ?? `https://github.com/${r.full_name}.git`,
        createdAt: r.created_at ?? null,
      }));
    } catch (err) {
      throw this.translate(err, `listing repositories of ${org}`);
    }
  }

  async latestCommitSha(repo: RepoDescriptor, year: number): Promise<string | null> {
    const [owner, name] = splitFullName(repo);
    try {
      const { data } = await this.octokit.rest.repos.listCommits({ owner, repo: name, sha: repo.defaultBranch, until: yearBounds(year).until, per_page: 1 });
      return data[0]?.sha ?? null;
    } catch (err) {
      // 409: the repository is empty
      if (isHttpFailure(err) && err.status === 409) return null;
      throw this.translate(err, `reading the latest commit of ${repo.fullName}`);
    }
  }

  /** Commits of the year on the default branch; merge commits only when asked for. */
  async listCommits(repo: RepoDescriptor, year: number, opts: { includeMerges?: boolean } = {}): Promise<CommitRecord[]> {
    const [owner, name] = splitFullName(repo);
    const { since, until } = yearBounds(year);
    try {
      const commits = await this.octokit.paginate(this.octokit.rest.repos.listCommits, { owner, repo: name, sha: repo.defaultBranch, since, until, per_page: 100 });
      return commits.filter(c => opts.includeMerges || c.parents.length < 2).map(c => {
        const authorName = c.commit.author?.name ?? c.author?.login ?? '';
        const authorEmail = c.commit.author?.email ?? '';
        return {
          sha: c.sha,
          authorName,
          authorEmail,
          identity: commitIdentity(authorName, authorEmail),
          timestamp: c.commit.committer?.date ?? c.commit.author?.date ?? '',
          message: c.commit.message,
          linesAdded: 0,
          linesDeleted: 0,
        };
      });
    } catch (err) {
      if (isHttpFailure(err) && err.status === 409) return [];
      throw this.translate(err, `listing commits of ${repo.fullName}`);
    }
  }

  async findPullRequestForCommit(repo: RepoDescriptor, sha: string): Promise<PullRequestSummary | null> {
    const [owner, name] = splitFullName(repo);
    try {
      const { data: pulls } = await this.octokit.rest.repos.listPullRequestsAssociatedWithCommit({ owner, repo: name, commit_sha: sha, per_page: 100 });
      let firstMerged: PullRequestSummary | null = null;
      for (const pull of pulls) {
        if (!pull.merged_at) continue;
        const reviews = await this.octokit.paginate(this.octokit.rest.pulls.listReviews, { owner, repo: name, pull_number: pull.number, per_page: 100 });
        const summary = { number: pull.number, merged: true, approved: reviews.some(r => r.state === 'APPROVED') };
        if (summary.approved) return summary;
        firstMerged ??= summary;
      }
      if (firstMerged) return firstMerged;
      const first = pulls[0];
      return first ? { number: first.number, merged: false, approved: false } : null;
    } catch (err) {
      if (isHttpFailure(err) && (err.status === 404 || err.status === 422)) return null;
      throw this.translate(err, `looking up pull requests for ${sha.slice(0, 12)} in ${repo.fullName}`);
    }
  }
}

export function yearBounds(year: number): { since: string; until: string } {
  return { since: `${year}-01-01T00:00:00Z`, until: `${year + 1}-01-01T00:00:00Z` };
}

function splitFullName(repo: RepoDescriptor): [string, string] {
  const slash = repo.fullName.indexOf('/');
  if (slash < 0) return [repo.fullName, repo.name];
  return [repo.fullName.slice(0, slash), repo.fullName.slice(slash + 1)];
}

/** Clone URL carrying the token as basic-auth credentials. */
export function authenticatedCloneUrl(cloneUrl: string, login: string, token: string): string {
  const u = new URL(cloneUrl);
  u.username = login;
  u.password = token;
  return u.toString();
}
