import fs from 'node:fs';
import path from 'node:path';
import { simpleGit } from 'simple-git';
import type { Logger } from './cli';
import { redact, silentLogger } from './cli';
import { NetworkError, ToolUnavailableError, errorMessage } from './errors';
import { yearBounds } from './github';
import { commitIdentity } from './metrics';
import type { CommitRecord } from './types';

export type MirrorOptions = {
  /** Directory the clone lives in. */
  localPath: string;
  /** Remote URL, possibly carrying credentials. */
  remoteUrl: string;
  branch: string;
  logger?: Logger;
  secrets?: string[];
};

export function hasGitDir(dir: string): boolean {
  try { return fs.statSync(path.join(dir, '.git')).isDirectory(); } catch { return false; }
}

/** Clones on first use, otherwise fetches and fast-forwards the branch. */
export async function ensureLocalMirror(opts: MirrorOptions): Promise<string> {
  const logger = opts.logger ?? silentLogger;
  const dest = path.resolve(opts.localPath);
  try {
    if (!hasGitDir(dest)) {
      logger.debug(`Cloning ${redact(opts.remoteUrl, opts.secrets)} into ${opts.localPath} ...`);
      fs.mkdirSync(path.dirname(dest), { recursive: true });
      await simpleGit().clone(opts.remoteUrl, dest, ['--branch', opts.branch]);
    } else {
      logger.debug(`Updating ${opts.localPath} (${opts.branch}) ...`);
      const git = simpleGit(dest);
      await git.remote(['set-url', 'origin', opts.remoteUrl]);
      await git.fetch('origin', opts.branch);
      await git.checkout(opts.branch);
      await git.merge(['--ff-only', 'FETCH_HEAD']);
    }
    return dest;
  } catch (err) {
    throw new NetworkError(`Could not mirror ${opts.localPath}: ${redact(errorMessage(err), opts.secrets)}`);
  }
}

// Record and field separators keep multi-line messages intact
const RS = '\x1e';
const FS = '\x1f';
const LOG_FORMAT = `--format=${RS}%H${FS}%an${FS}%ae${FS}%cI${FS}%B${FS}`;

export async function readCommits(localPath: string, branch: string, year: number, opts: { includeMerges?: boolean } = {}): Promise<CommitRecord[]> {
  const { since, until } = yearBounds(year);
  const args = ['log', branch, `--since=${since}`, `--until=${until}`, '--numstat', LOG_FORMAT];
  if (!opts.includeMerges) args.push('--no-merges');
  const out = await simpleGit(localPath).raw(args);
  return parseGitLog(out);
}

export function parseGitLog(out: string): CommitRecord[] {
  const commits: CommitRecord[] = [];
  for (const chunk of out.split(RS)) {
    if (!chunk.trim()) continue;
    const [sha = '', authorName = '', authorEmail = '', timestamp = '', message = '', numstat = ''] = chunk.split(FS);
    let linesAdded = 0, linesDeleted = 0;
    for (const line of numstat.split('\n')) {
      const m = /^(\d+|-)\t(\d+|-)\t/.exec(line);
      if (!m || m[1] === '-' || m[2] === '-') continue;
      linesAdded += parseInt(m[1] ?? '0', 10);
      linesDeleted += parseInt(m[2] ?? '0', 10);
    }
    commits.push({
      sha: sha.trim(),
      authorName,
      authorEmail,
      identity: commitIdentity(authorName, authorEmail),
      timestamp,
      message: message.replace(/\s+$/, ''),
      linesAdded,
      linesDeleted,
    });
  }
  return commits;
}

export async function checkGitAvailable(): Promise<void> {
  try {
    const v = await simpleGit().version();
    if (!v.installed) throw new Error('git executable not found');
  } catch (err) {
    throw new ToolUnavailableError('git', `git is not available: ${errorMessage(err)}`, { cause: err });
  }
}
