import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { findTestMarker, hasTests, isTestDirName, isTestFileName } from '../src/test-presence';

function touch(root: string, rel: string) {
  const p = path.join(root, rel);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, '');
}

describe('test-presence heuristic', () => {
  let tmp: string;
  beforeEach(() => { tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'org-stats-tree-')); });
  afterEach(() => { fs.rmSync(tmp, { recursive: true, force: true }); });

  it('recognizes test file names', () => {
    expect(['test_api.py', 'api_test.go', 'Button.test.tsx', 'client.spec.ts', 'UserSpec.scala', 'ParserTests.cs'].every(isTestFileName)).toBe(true);
    expect(['api.py', 'Tests.cs', 'latest.ts', 'contest.go', 'README.md'].some(isTestFileName)).toBe(false);
    expect(isTestDirName('__tests__')).toBe(true);
    expect(isTestDirName('Tests')).toBe(true);
    expect(isTestDirName('testing')).toBe(false);
  });

  it('finds a nested test directory', () => {
    touch(tmp, 'src/main.go');
    touch(tmp, 'pkg/server/tests/.keep');
    expect(findTestMarker(tmp)).toBe('pkg/server/tests');
    expect(hasTests(tmp)).toBe(true);
  });

  it('finds a test file next to sources', () => {
    touch(tmp, 'src/lib/parser.ts');
    touch(tmp, 'src/lib/parser.spec.ts');
    expect(findTestMarker(tmp)).toBe('src/lib/parser.spec.ts');
  });

  it('ignores vendored and VCS directories', () => {
    touch(tmp, 'node_modules/left-pad/test/index.js');
    touch(tmp, '.git/hooks/test_hook.sh');
    touch(tmp, 'main.c');
    expect(hasTests(tmp)).toBe(false);
  });

  it('stops at the depth budget', () => {
    touch(tmp, 'a/b/c/test_deep.py');
    expect(hasTests(tmp, { maxDepth: 3, maxEntries: 100 })).toBe(false);
    expect(hasTests(tmp, { maxDepth: 4, maxEntries: 100 })).toBe(true);
  });

  it('returns false for a missing directory', () => {
    expect(hasTests(path.join(tmp, 'nope'))).toBe(false);
  });
});
