export interface DiffHunk {
  file: string;
  header: string;
  from: number;
  to: number;
  added: number;
  removed: number;
  lines: string[];
  hash: string;
  functionContext?: string;
}

export interface FileDiff {
  file: string;
  hunks: DiffHunk[];
  additions: number;
  deletions: number;
  untracked?: boolean;
}

export interface Identity {
  name: string;
  email: string;
}

export interface FileStat {
  path: string;
  additions: number;
  deletions: number;
}

/** One entry of `git log --numstat`, attributed to its author identity. */
export interface CommitRecord {
  hash: string;
  authorName: string;
  authorEmail: string;
  subject: string;
  files: FileStat[];
}

export interface ModifiedFile {
  path: string;
  count: number;
}

export interface LargeCommit {
  additions: number;
  deletions: number;
  message: string;
}

export interface ContributorStats extends Identity {
  commitCount: number;
  additions: number;
  deletions: number;
  filesChanged: ReadonlySet<string>;
  /** Descending by count; ties keep discovery order. */
  mostModifiedFiles: readonly ModifiedFile[];
  /** Unordered; sort by count when displaying. */
  fileTypes: ReadonlyMap<string, number>;
  /** Descending by additions + deletions; ties keep the earlier commit first. */
  largestCommits: readonly LargeCommit[];
}

export interface CommitDraft {
  /** Full text that would be committed. */
  message: string;
  /** Token before the first colon, unset when the text has none. */
  type?: string;
  description: string;
}

export interface FileAnalysis {
  path: string;
  explanation: string;
}

export type CommitOutcome =
  | { status: 'clean' }
  | { status: 'committed'; message: string }
  | { status: 'cancelled' };
