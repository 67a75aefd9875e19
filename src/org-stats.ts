import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { USAGE, createLogger, mirrorPathFor, parseArgs, redact } from './cli';
import * as Cloc from './cloc';
import { AuthError, ToolUnavailableError, UsageError, errorMessage } from './errors';
import * as Git from './git';
import { GitHubClient, authenticatedCloneUrl } from './github';
import * as Output from './output';
import type { PipelineDeps } from './pipeline';
import { backfillYears, formatSummary, runPipeline, selectRepositories } from './pipeline';
import { hasTests } from './test-presence';

export { parseArgs, defaultReportPath, resolveConcurrency } from './cli';
export { parseCommitHeader, isConventionalCommit, classifyContributor } from './compliance';
export { selectHotRepositories, rankContributors, tallyContributors, hotRepositoryCount } from './metrics';
export { mergeReports, loadReport, writeReport, serializeReport } from './output';
export { runPipeline, backfillYears } from './pipeline';
export { GitHubClient, RateLimitState } from './github';
export { ensureLocalMirror, readCommits } from './git';
export { countLines } from './cloc';
export { hasTests } from './test-presence';

/** Resolves to the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const args = parseArgs(argv);
  const logger = createLogger({ verbose: args.verbose, secrets: [args.token] });
  const client = new GitHubClient({ token: args.token, logger });

  const login = await client.authenticatedLogin();
  logger.debug(`Authenticated as ${login}`);

  if (args.dryRun) {
    const repos = await client.listOrgRepos(args.org);
    const { selected, excluded } = selectRepositories(repos, args.exclude, args.year);
    logger.info(`Dry run: would analyze ${selected.length} repositories of ${args.org} for ${args.year} (${excluded} excluded) and write ${args.file}; nothing is cloned or written.`);
    for (const r of selected) logger.info(`  ${r.name}`);
    return 0;
  }

  await Git.checkGitAvailable();
  await Cloc.checkClocAvailable();

  const deps: PipelineDeps = {
    api: client,
    ensureLocalMirror: repo => Git.ensureLocalMirror({
      localPath: mirrorPathFor(args.mirrorDir, args.org, repo.name),
      remoteUrl: authenticatedCloneUrl(repo.cloneUrl, login, args.token),
      branch: repo.defaultBranch,
      logger,
      secrets: [args.token],
    }),
    readCommits: (localPath, repo, year) => Git.readCommits(localPath, repo.defaultBranch, year, { includeMerges: args.includeMerges }),
    countLines: localPath => Cloc.countLines(localPath),
    hasTests: localPath => hasTests(localPath),
    logger,
  };

  const years = args.backfill ? backfillYears(await client.listOrgRepos(args.org), args.year) : [args.year];
  let report = Output.loadReport(args.file, logger);
  for (const year of years) {
    const run = await runPipeline(
      { org: args.org, year, exclude: args.exclude, concurrency: args.concurrency, existing: report, includeMerges: args.includeMerges },
      deps,
    );
    report = run.report;
    // Written after every year
    Output.writeReport(report, args.file);
    logger.info(`Wrote ${args.file}${years.length > 1 ? ` (${year})` : ''}`);
    logger.info(formatSummary(run.summary));
  }
  if (client.rateLimit.waits > 0) logger.info(`Waited for the GitHub rate limit ${client.rateLimit.waits} time(s)`);
  return 0;
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof UsageError) return 2;
  return 1;
}

/** Tokens that may appear in a fatal error, for redaction before parsing succeeded. */
function knownSecrets(argv: string[], env: NodeJS.ProcessEnv): string[] {
  const secrets = env.GITHUB_TOKEN ? [env.GITHUB_TOKEN] : [];
  const i = argv.findIndex(a => a === '-t' || a === '--token');
  const value = i >= 0 ? argv[i + 1] : undefined;
  if (value) secrets.push(value);
  return secrets;
}

const __filename = fileURLToPath(import.meta.url);
if (process.argv[1] && path.resolve(process.argv[1]) === path.resolve(__filename)) {
  main().then(code => { process.exitCode = code; }, (err: unknown) => {
    const verbose = process.argv.includes('--verbose');
    const secrets = knownSecrets(process.argv.slice(2), process.env);
    if (err instanceof UsageError) console.error(`${err.message}\n${USAGE}`);
    else if (verbose && !(err instanceof AuthError || err instanceof ToolUnavailableError) && err instanceof Error && err.stack) console.error(redact(err.stack, secrets));
    else console.error(redact(errorMessage(err), secrets));
    process.exitCode = exitCodeFor(err);
  });
}
