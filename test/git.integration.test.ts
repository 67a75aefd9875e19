import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { simpleGit } from 'simple-git';
import { NetworkError } from '../src/errors';
import { ensureLocalMirror, hasGitDir, parseGitLog, readCommits } from '../src/git';

// Builds a small upstream repository and mirrors it
describe('repository mirror (integration)', () => {
  let tmp: string;
  let origin: string;

  async function commitAt(iso: string, file: string, content: string, message: string, author?: string) {
    const g = simpleGit(origin).env({ PATH: process.env.PATH, HOME: process.env.HOME, GIT_AUTHOR_DATE: iso, GIT_COMMITTER_DATE: iso });
    fs.mkdirSync(path.dirname(path.join(origin, file)), { recursive: true });
    fs.writeFileSync(path.join(origin, file), content);
    await g.add([file]);
    await g.commit(message, undefined, author ? { '--author': author } : {});
  }

  beforeAll(async () => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'org-stats-git-'));
    origin = path.join(tmp, 'origin');
    fs.mkdirSync(origin);
    const g = simpleGit(origin);
    await g.init();
    await g.addConfig('user.email', 'test@example.com');
    await g.addConfig('user.name', 'Test User');
    await commitAt('2023-12-31T23:00:00Z', 'README.md', 'hello\n', 'chore: init', 'Old Timer <old@example.com>');
    await g.raw(['branch', '-M', 'main']);
    await commitAt('2024-03-01T10:00:00Z', 'src/a.ts', 'export const a = 1;\nexport const b = 2;\nexport const c = 3;\n', 'feat(core): add a\n\nbody text');
    await commitAt('2024-07-01T10:00:00Z', 'src/a.ts', 'export const a = 1;\nexport const b = 20;\nexport const c = 3;\n', 'tweak a');
  });

  afterAll(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('clones, reads the year window, then fast-forwards', async () => {
    const localPath = path.join(tmp, 'mirror', 'acme', 'api');
    const dest = await ensureLocalMirror({ localPath, remoteUrl: origin, branch: 'main' });
    expect(dest).toBe(path.resolve(localPath));
    expect(hasGitDir(dest)).toBe(true);

    const commits = await readCommits(dest, 'main', 2024);
    expect(commits.map(c => [c.message, c.identity, c.linesAdded, c.linesDeleted])).toEqual([
      ['tweak a', 'test@example.com', 1, 1],
      ['feat(core): add a\n\nbody text', 'test@example.com', 3, 0],
    ]);
    expect(commits[0]?.sha).toMatch(/^[0-9a-f]{40}$/);
    expect(new Date(commits[0]?.timestamp ?? '').toISOString()).toBe('2024-07-01T10:00:00.000Z');

    const older = await readCommits(dest, 'main', 2023);
    expect(older.map(c => [c.authorName, c.identity])).toEqual([['Old Timer', 'old@example.com']]);

    await commitAt('2024-09-01T08:00:00Z', 'src/b.ts', 'export {};\n', 'fix: later');
    await ensureLocalMirror({ localPath, remoteUrl: origin, branch: 'main' });
    expect((await readCommits(dest, 'main', 2024)).map(c => c.message)).toEqual(['fix: later', 'tweak a', 'feat(core): add a\n\nbody text']);
  });

  it('reports a failed clone as a NetworkError', async () => {
    await expect(ensureLocalMirror({ localPath: path.join(tmp, 'mirror', 'acme', 'gone'), remoteUrl: path.join(tmp, 'does-not-exist'), branch: 'main' }))
      .rejects.toBeInstanceOf(NetworkError);
  });
});

describe('parseGitLog', () => {
  it('ignores binary numstat rows', () => {
    const out = '\x1eaaa\x1fAda\x1fada@x.io\x1f2024-01-01T00:00:00+00:00\x1ffeat: x\n\x1f\n\n3\t1\tsrc/x.ts\n-\t-\tlogo.png\n';
    expect(parseGitLog(out)).toEqual([{
      sha: 'aaa', authorName: 'Ada', authorEmail: 'ada@x.io', identity: 'ada@x.io', timestamp: '2024-01-01T00:00:00+00:00', message: 'feat: x', linesAdded: 3, linesDeleted: 1,
    }]);
  });
});
