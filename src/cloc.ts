import { execa } from 'execa';
import { z } from 'zod';
import { ParseError, ToolUnavailableError, errorMessage } from './errors';
import type { LineCount } from './types';

export const SKIP_DIRS = ['node_modules', 'vendor', 'third_party', 'dist', 'build', 'out', 'target', 'bin', 'obj', '.venv', 'venv', '__pycache__', 'Pods', '.idea', '.vscode'];

const ClocLanguage = z.object({ nFiles: z.number(), blank: z.number(), comment: z.number(), code: z.number() });
const ClocOutput = z.record(z.unknown());

export type LineCountResult =
  | { ok: true; lineCount: LineCount }
  | { ok: false; lineCount: null; reason: 'missing-tool' | 'failed' | 'unparseable'; message: string };

export function parseClocOutput(stdout: string): LineCount {
  if (!stdout.trim()) return { total: 0, byLanguage: {} };
  let json: unknown;
  try { json = JSON.parse(stdout); } catch (err) { throw new ParseError(`cloc printed invalid JSON: ${errorMessage(err)}`); }
  const parsed = ClocOutput.safeParse(json);
  if (!parsed.success) throw new ParseError('cloc output is not a JSON object');
  const byLanguage: Record<string, number> = {};
  let total = 0;
  for (const [lang, value] of Object.entries(parsed.data)) {
    if (lang === 'header' || lang === 'SUM') continue;
    const entry = ClocLanguage.safeParse(value);
    if (!entry.success) throw new ParseError(`cloc entry for ${lang} is malformed`);
    byLanguage[lang] = entry.data.code;
    total += entry.data.code;
  }
  return { total, byLanguage };
}

function isMissingExecutable(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export async function countLines(localPath: string, opts: { command?: string } = {}): Promise<LineCountResult> {
  const command = opts.command ?? 'cloc';
  let stdout: string;
  try {
    const result = await execa(command, ['--json', '--quiet', `--exclude-dir=${SKIP_DIRS.join(',')}`, localPath]);
    stdout = result.stdout;
  } catch (err) {
    if (isMissingExecutable(err)) return { ok: false, lineCount: null, reason: 'missing-tool', message: `${command} not found` };
    return { ok: false, lineCount: null, reason: 'failed', message: `${command} failed: ${errorMessage(err)}` };
  }
  try {
    return { ok: true, lineCount: parseClocOutput(stdout) };
  } catch (err) {
    return { ok: false, lineCount: null, reason: 'unparseable', message: errorMessage(err) };
  }
}

export async function checkClocAvailable(command = 'cloc'): Promise<void> {
  try {
    await execa(command, ['--version']);
  } catch (err) {
    throw new ToolUnavailableError(command, `${command} is not available: ${errorMessage(err)}`, { cause: err });
  }
}
