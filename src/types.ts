export type RepoDescriptor = {
  name: string;
  fullName: string;
  defaultBranch: string;
  cloneUrl: string;
  createdAt: string | null;
};

export type CommitRecord = {
  sha: string;
  authorName: string;
  authorEmail: string;
  /** Lower-cased e-mail, or the author name when git has no e-mail. */
  identity: string;
  timestamp: string;
  message: string;
  linesAdded: number;
  linesDeleted: number;
};

export type PullRequestSummary = { number: number; merged: boolean; approved: boolean };

export type LineCount = { total: number; byLanguage: Record<string, number> };

export type ComplianceResult = {
  compliantCount: number;
  totalCount: number;
  reviewedCount: number;
  directCount: number;
};

export type ContributorSummary = {
  identity: string;
  name: string;
  commits: number;
  rank: number;
  compliance?: ComplianceResult;
};

export type RepoYearStats = {
  latestCommitSha: string;
  defaultBranch: string;
  commitCount: number;
  linesAdded: number;
  linesDeleted: number;
  linesOfCode: LineCount | null;
  lineCountFailed: boolean;
  hot: boolean;
  partial: boolean;
  contributors: ContributorSummary[];
};

export type RepoEntry = {
  localPath: string;
  hasTests: boolean | null;
  yearlyStats: Record<string, RepoYearStats>;
};

/** Repository name -> entry. */
export type Report = Record<string, RepoEntry>;
