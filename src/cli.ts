import path from 'node:path';
import { UsageError } from './errors';

export type Args = {
  token: string; org: string; year: number; file: string; exclude: string[]; mirrorDir: string; concurrency: number; includeMerges: boolean; backfill: boolean; dryRun: boolean; verbose: boolean;
};

export const USAGE = 'Usage: npm start -- -t <token> -o <org> [-y YEAR] [-f report.json] [-e repo1,repo2] [--mirror-dir repos] [--concurrency N] [--include-merges] [--backfill] [--dry-run] [--verbose]';

export const DEFAULT_CONCURRENCY = 10;

export function parseArgs(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): Args {
  let token: string | undefined = env.GITHUB_TOKEN || undefined;
  let org: string | undefined;
  let year = now.getUTCFullYear();
  let file: string | undefined;
  let concurrency: number | null = null;
  const args: Omit<Args, 'token' | 'org' | 'year' | 'file' | 'concurrency'> = { exclude: [], mirrorDir: 'repos', includeMerges: false, backfill: false, dryRun: false, verbose: false };
  const value = (flag: string, i: number): string => {
    const v = argv[i];
    if (v === undefined || v.startsWith('-')) throw new UsageError(`Missing value for ${flag}`);
    return v;
  };
  for (let i = 0; i < argv.length; i++) {
    const t = argv[i];
    if (t === '-t' || t === '--token') token = value(t, ++i);
    else if (t === '-o' || t === '--org') org = value(t, ++i);
    else if (t === '-y' || t === '--year') {
      const raw = value(t, ++i);
      if (!/^\d{4}$/.test(raw)) throw new UsageError(`Invalid year: ${raw}`);
      year = parseInt(raw, 10);
    }
    else if (t === '-f' || t === '--file') file = value(t, ++i);
    else if (t === '-e' || t === '--exclude') args.exclude.push(...splitList(value(t, ++i)));
    else if (t === '--mirror-dir') args.mirrorDir = value(t, ++i);
    else if (t === '--concurrency') concurrency = parseInt(value(t, ++i), 10);
    else if (t === '--include-merges') args.includeMerges = true;
    else if (t === '--backfill') args.backfill = true;
    else if (t === '--dry-run') args.dryRun = true;
    else if (t === '--verbose') args.verbose = true;
    else throw new UsageError(`Unknown arg: ${t}`);
  }
  if (!token) throw new UsageError('A GitHub token is required (-t/--token or GITHUB_TOKEN)');
  if (!org) throw new UsageError('An organization is required (-o/--org)');
  return {
    ...args,
    token,
    org,
    year,
    file: file ?? defaultReportPath(org, year),
    concurrency: resolveConcurrency(concurrency, env),
  };
}

export function splitList(s: string): string[] {
  return s.split(',').map(x => x.trim()).filter(Boolean);
}

/** Flag beats MAX_CONCURRENCY beats the default; anything below 1 is ignored. */
export function resolveConcurrency(flag: number | null, env: NodeJS.ProcessEnv = process.env): number {
  if (flag !== null && Number.isFinite(flag) && flag >= 1) return flag;
  const fromEnv = parseInt(env.MAX_CONCURRENCY ?? '', 10);
  if (Number.isFinite(fromEnv) && fromEnv >= 1) return fromEnv;
  return DEFAULT_CONCURRENCY;
}

export function defaultReportPath(org: string, year: number): string {
  return `${sanitizeFileComponent(org)}_${year}_stats.json`;
}

export function sanitizeFileComponent(p: string): string {
  // Strip leading ./ and ../ so '../etc' does not become '.._etc'
  let s = p;
  while (s.startsWith('./') || s.startsWith('../')) s = s.slice(s.startsWith('./') ? 2 : 3);
  const joined = s.split(/[\/]+/).filter(Boolean).join('_');
  const clean = joined.replace(/[^A-Za-z0-9._-]/g, '_');
  if (!clean || clean === '.' || clean === '..') return 'org';
  return clean;
}

/** Masks URL credentials and any of the given secrets. */
export function redact(text: string, secrets: string[] = []): string {
  let out = text.replace(/([a-z][a-z0-9+.-]*:\/\/)[^@\s/]+@/gi, '$1****@');
  for (const s of secrets) {
    if (!s) continue;
    out = out.split(s).join('****');
    const encoded = encodeURIComponent(s);
    if (encoded !== s) out = out.split(encoded).join('****');
  }
  return out;
}

export function mirrorPathFor(mirrorDir: string, org: string, repoName: string): string {
  return path.join(mirrorDir, sanitizeFileComponent(org), sanitizeFileComponent(repoName));
}

export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
};

export function createLogger(opts: { verbose: boolean; secrets?: string[]; write?: (line: string) => void }): Logger {
  const write = opts.write ?? ((line: string) => { process.stderr.write(line + '\n'); });
  const emit = (prefix: string, msg: string) => write(prefix + redact(msg, opts.secrets));
  return {
    info: msg => emit('', msg),
    warn: msg => emit('Warning: ', msg),
    error: msg => emit('Error: ', msg),
    debug: msg => { if (opts.verbose) emit('', msg); },
  };
}

export const silentLogger: Logger = { info() {}, warn() {}, error() {}, debug() {} };
