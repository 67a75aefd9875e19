import fs from 'node:fs';
import path from 'node:path';
import { SKIP_DIRS } from './cloc';

const TEST_DIR_NAMES = new Set<string>(['test', 'tests', '__tests__', 'spec', 'specs', 'integration-tests', 'e2e']);
const TEST_FILE_SUFFIXES = ['_test', '.test', '.spec', 'Spec', 'Tests'];
const TEST_FILE_PREFIXES = ['test_', 'spec_'];
const SKIPPED = new Set<string>(['.git', ...SKIP_DIRS]);

export type WalkBudget = { maxDepth: number; maxEntries: number };
export const DEFAULT_BUDGET: WalkBudget = { maxDepth: 6, maxEntries: 20_000 };

export function isTestDirName(name: string): boolean {
  return TEST_DIR_NAMES.has(name.toLowerCase());
}

export function isTestFileName(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  const base = dot > 0 ? filename.slice(0, dot) : filename;
  if (TEST_FILE_PREFIXES.some(pref => base.startsWith(pref))) return true;
  return TEST_FILE_SUFFIXES.some(sfx => base.endsWith(sfx) && base.length > sfx.length);
}

/**
 * Breadth-first search for the first test directory or file. Returns its
 * path relative to `root`, or null when none is found within the budget.
 */
export function findTestMarker(root: string, budget: WalkBudget = DEFAULT_BUDGET): string | null {
  const queue: { dir: string; depth: number }[] = [{ dir: '', depth: 0 }];
  let seen = 0;
  while (queue.length > 0) {
    const next = queue.shift();
    if (!next) break;
    let entries: fs.Dirent[];
    try { entries = fs.readdirSync(path.join(root, next.dir), { withFileTypes: true }); } catch { continue; }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const e of entries) {
      if (++seen > budget.maxEntries) return null;
      const rel = next.dir ? `${next.dir}/${e.name}` : e.name;
      if (e.isDirectory()) {
        if (SKIPPED.has(e.name)) continue;
        if (isTestDirName(e.name)) return rel;
        if (next.depth + 1 < budget.maxDepth) queue.push({ dir: rel, depth: next.depth + 1 });
      } else if (e.isFile() && isTestFileName(e.name)) {
        return rel;
      }
    }
  }
  return null;
}

export function hasTests(root: string, budget: WalkBudget = DEFAULT_BUDGET): boolean {
  return findTestMarker(root, budget) !== null;
}
