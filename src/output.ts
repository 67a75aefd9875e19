import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from './cli';
import { silentLogger } from './cli';
import { errorMessage } from './errors';
import type { Report, RepoEntry } from './types';

const ComplianceSchema = z.object({
  compliantCount: z.number(),
  totalCount: z.number(),
  reviewedCount: z.number(),
  directCount: z.number(),
});

const RepoYearStatsSchema = z.object({
  latestCommitSha: z.string(),
  defaultBranch: z.string(),
  commitCount: z.number(),
  linesAdded: z.number(),
  linesDeleted: z.number(),
  linesOfCode: z.object({ total: z.number(), byLanguage: z.record(z.number()) }).nullable(),
  lineCountFailed: z.boolean(),
  hot: z.boolean(),
  partial: z.boolean(),
  contributors: z.array(z.object({
    identity: z.string(),
    name: z.string(),
    commits: z.number(),
    rank: z.number(),
    compliance: ComplianceSchema.optional(),
  })),
});

const RepoEntrySchema = z.object({
  localPath: z.string(),
  hasTests: z.boolean().nullable(),
  yearlyStats: z.record(RepoYearStatsSchema),
});

export const ReportSchema: z.ZodType<Report> = z.record(RepoEntrySchema);

/** Reads a prior report; a missing or unreadable file yields an empty one. */
export function loadReport(file: string, logger: Logger = silentLogger): Report {
  if (!fs.existsSync(file)) return {};
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    logger.warn(`Could not parse ${file} (${errorMessage(err)}); starting a new report.`);
    return {};
  }
  const parsed = ReportSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(`${file} does not look like a stats report; starting a new report.`);
    return {};
  }
  return parsed.data;
}

/**
 * Years present in `incoming` replace the same years in `existing`; every
 * other year and repository is kept. Excluded repositories are dropped.
 */
export function mergeReports(existing: Report, incoming: Report, exclude: Iterable<string> = []): Report {
  const excluded = new Set(exclude);
  const merged: Report = {};
  for (const [name, entry] of Object.entries(existing)) {
    if (!excluded.has(name)) merged[name] = entry;
  }
  for (const [name, entry] of Object.entries(incoming)) {
    if (excluded.has(name)) continue;
    const prior = merged[name];
    const next: RepoEntry = {
      localPath: entry.localPath,
      hasTests: entry.hasTests,
      yearlyStats: { ...(prior?.yearlyStats ?? {}), ...entry.yearlyStats },
    };
    merged[name] = next;
  }
  return merged;
}

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

function canonicalize(value: unknown): Json {
  if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === 'object') {
    const out: { [key: string]: Json } = {};
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) out[key] = canonicalize(v);
    }
    return out;
  }
  return null;
}

/** Keys sorted at every level so identical data serializes identically. */
export function serializeReport(report: Report): string {
  return JSON.stringify(canonicalize(report), null, 2) + '\n';
}

/** Writes beside the target and renames over it, so readers never see a partial file. */
export function writeReport(report: Report, file: string): void {
  const dir = path.dirname(path.resolve(file));
  fs.mkdirSync(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tmp, serializeReport(report), 'utf8');
    fs.renameSync(tmp, file);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}
