export class OrgStatsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing credential. Aborts the run. */
export class AuthError extends OrgStatsError {}

/** Raised once the retry budget for a rate-limited request is spent. */
export class RateLimitedError extends OrgStatsError {}

/** Per-repository API, clone or fetch failure. */
export class NetworkError extends OrgStatsError {}

export class ToolUnavailableError extends OrgStatsError {
  constructor(readonly tool: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Malformed output from an external tool. */
export class ParseError extends OrgStatsError {}

export class UsageError extends OrgStatsError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
