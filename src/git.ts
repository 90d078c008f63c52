import { simpleGit, type SimpleGit } from 'simple-git';
import crypto from 'node:crypto';
import { AccessError, NoChangesError, errorMessage } from './errors.js';
import { debug } from './log.js';
import { aggregateContributors, type AggregateLimits } from './stats.js';
import type { CommitRecord, ContributorStats, FileDiff, FileStat } from './types.js';

/** What the flows need from a repository. */
export interface Repository {
  /** Pending changes as unified diff text; throws `NoChangesError` when the tree is clean. */
  getDiff(): Promise<string>;
  getContributors(): Promise<ContributorStats[]>;
  /** Newest first, `"<short hash> <subject>"`. */
  getContributorCommits(name: string, email: string): Promise<string[]>;
  stageAndCommit(message: string): Promise<void>;
}

// Untracked files have no diff against HEAD; they are listed with a header only.
const UNTRACKED_MARKER = 'untracked file';

export const untrackedDiffSection = (path: string): string =>
  `diff --git a/${path} b/${path}\n${UNTRACKED_MARKER}`;

const HUNK_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@ ?(.*)$/;

export const parseDiffFromRaw = (raw: string): FileDiff[] => {
  if (!raw.trim()) return [];
  const lines = raw.split('\n');
  const files: FileDiff[] = [];
  let currentFile: FileDiff | null = null;
  for (const line of lines) {
    if (line.startsWith('diff --git a/')) {
      const pathMatch = line.match(/diff --git a\/(.+?) b\/(.+)$/);
      if (pathMatch) {
        currentFile = { file: pathMatch[2], hunks: [], additions: 0, deletions: 0 };
        files.push(currentFile);
      }
      continue;
    }
    if (line.startsWith('diff --git')) continue;
    if (line.startsWith('index ')) continue;
    // file headers only precede the first hunk; later `---`/`+++` lines are content
    if (currentFile && !currentFile.hunks.length) {
      if (line.startsWith('--- ') || line.startsWith('+++ ')) continue;
    }
    if (currentFile && line === UNTRACKED_MARKER) {
      currentFile.untracked = true;
      continue;
    }

    if (line.startsWith('@@')) {
      if (!currentFile) continue;
      const m = line.match(HUNK_HEADER_RE);
      if (!m) continue;
      const ctx = m[5]?.trim() || '';
      currentFile.hunks.push({
        file: currentFile.file,
        header: line,
        from: parseInt(m[1], 10),
        to: parseInt(m[3], 10),
        added: parseInt(m[4] || '1', 10),
        removed: parseInt(m[2] || '1', 10),
        lines: [],
        hash: '',
        functionContext: ctx || undefined,
      });
      continue;
    }
    if (currentFile && currentFile.hunks.length) {
      const hunk = currentFile.hunks[currentFile.hunks.length - 1];
      hunk.lines.push(line);
      if (line.startsWith('+')) currentFile.additions++;
      if (line.startsWith('-')) currentFile.deletions++;
    }
  }
  for (const f of files) {
    for (const h of f.hunks) {
      h.hash = crypto
        .createHash('sha1')
        .update(f.file + h.header + h.lines.join('\n'))
        .digest('hex')
        .slice(0, 8);
    }
  }
  return files;
};

const RECORD_SEP = '\x1e';
const FIELD_SEP = '\x1f';
export const HISTORY_FORMAT = '%x1e%H%x1f%an%x1f%ae%x1f%s';

const parseCount = (value: string) => (value === '-' ? 0 : parseInt(value, 10) || 0);

/** Parses `git log --numstat --format=HISTORY_FORMAT` output, newest commit first. */
export const parseHistoryLog = (raw: string): CommitRecord[] => {
  const commits: CommitRecord[] = [];
  for (const chunk of raw.split(RECORD_SEP)) {
    if (!chunk.trim()) continue;
    const [header, ...statLines] = chunk.split('\n');
    const fields = header.split(FIELD_SEP);
    if (fields.length < 4) continue;
    const [hash, authorName, authorEmail, ...subjectParts] = fields;
    const files: FileStat[] = [];
    for (const line of statLines) {
      const parts = line.split('\t');
      if (parts.length < 3) continue;
      // binary files report "-" for both counts
      files.push({
        path: parts.slice(2).join('\t'),
        additions: parseCount(parts[0]),
        deletions: parseCount(parts[1]),
      });
    }
    commits.push({
      hash: hash.trim(),
      authorName,
      authorEmail,
      subject: subjectParts.join(FIELD_SEP),
      files,
    });
  }
  return commits;
};

export const formatCommitSummary = (commit: CommitRecord): string =>
  `${commit.hash.slice(0, 7)} ${commit.subject}`;

async function access<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    debug('git', `${action} failed`, e);
    throw new AccessError(`Failed to ${action}`, errorMessage(e));
  }
}

async function hasCommits(git: SimpleGit): Promise<boolean> {
  try {
    await git.revparse(['--verify', 'HEAD']);
    return true;
  } catch {
    return false;
  }
}

export async function openRepository(
  limits: AggregateLimits,
  cwd: string = process.cwd(),
): Promise<Repository> {
  // unquoted paths, so non-ASCII names reach the parsers as written
  const git = simpleGit(cwd, { config: ['core.quotePath=false'] });
  const isRepo = await access('inspect repository', () => git.checkIsRepo());
  if (!isRepo) throw new AccessError(`Not a git repository: ${cwd}`);

  // One history scan per repository handle; the contributor list must not shift mid-session.
  let history: Promise<CommitRecord[]> | undefined;
  const readHistory = () => {
    if (!history) {
      history = access('read history', async () => {
        if (!(await hasCommits(git))) return [];
        const raw = await git.raw([
          'log',
          `--format=${HISTORY_FORMAT}`,
          '--numstat',
          '--no-renames',
        ]);
        return parseHistoryLog(raw);
      });
    }
    return history;
  };

  return {
    async getDiff() {
      const status = await access('read status', () => git.status());
      if (status.isClean()) throw new NoChangesError();
      const base = (await hasCommits(git)) ? 'HEAD' : '--cached';
      const tracked = await access('read diff', () =>
        git.diff([base, '--unified=3', '--no-color']),
      );
      const sections = [tracked.trimEnd(), ...status.not_added.map(untrackedDiffSection)];
      const diff = sections.filter((s) => s.length > 0).join('\n');
      if (!diff.trim()) throw new NoChangesError();
      return diff;
    },

    async getContributors() {
      return aggregateContributors(await readHistory(), limits);
    },

    async getContributorCommits(name, email) {
      const commits = await readHistory();
      return commits
        .filter((c) => c.authorName === name && c.authorEmail === email)
        .map(formatCommitSummary);
    },

    async stageAndCommit(message) {
      await access('stage changes', () => git.add(['--all']));
      await access('create commit', () => git.commit(message));
    },
  };
}
