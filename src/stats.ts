import type {
  CommitRecord,
  ContributorStats,
  Identity,
  LargeCommit,
  ModifiedFile,
} from './types.js';

export const NO_EXTENSION = 'no extension';

export interface AggregateLimits {
  /** How many of the biggest commits to keep per contributor. */
  largestCommits: number;
  /** How many entries `mostModifiedFiles` keeps. */
  topFiles: number;
}

export interface ContributorAggregate {
  stats: ContributorStats;
  /** The identity's own commits, in history order. */
  commits: CommitRecord[];
}

/**
 * Extension of the last path segment, without the dot. Dotfiles such as
 * `.gitignore` and names ending in a dot have none.
 */
export const fileExtension = (path: string): string => {
  const segment = path.slice(path.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  if (dot <= 0 || dot === segment.length - 1) return NO_EXTENSION;
  return segment.slice(dot + 1);
};

const sameIdentity = (commit: CommitRecord, identity: Identity) =>
  commit.authorName === identity.name && commit.authorEmail === identity.email;

const commitSize = (c: LargeCommit) => c.additions + c.deletions;

// `kept` stays sorted by size, descending. A candidate only displaces the
// smallest entry when strictly larger, so ties keep the earlier commit.
const offerLargest = (kept: LargeCommit[], candidate: LargeCommit, limit: number) => {
  if (limit <= 0) return;
  const size = commitSize(candidate);
  if (kept.length >= limit) {
    if (size <= commitSize(kept[kept.length - 1])) return;
    kept.pop();
  }
  const at = kept.findIndex((k) => commitSize(k) < size);
  kept.splice(at === -1 ? kept.length : at, 0, candidate);
};

const identityKey = (name: string, email: string) => `${name}\n${email}`;

interface IdentityGroup {
  identity: Identity;
  commits: CommitRecord[];
}

// Single pass over `history`; groups keep first-seen order.
const groupByIdentity = (history: readonly CommitRecord[]): IdentityGroup[] => {
  const groups = new Map<string, IdentityGroup>();
  for (const c of history) {
    const key = identityKey(c.authorName, c.authorEmail);
    const group = groups.get(key);
    if (group) group.commits.push(c);
    else groups.set(key, { identity: { name: c.authorName, email: c.authorEmail }, commits: [c] });
  }
  return [...groups.values()];
};

/** Identities in the order they first appear in `history`. */
export const collectIdentities = (history: readonly CommitRecord[]): Identity[] =>
  groupByIdentity(history).map((g) => g.identity);

export function aggregateContributor(
  history: readonly CommitRecord[],
  identity: Identity,
  limits: AggregateLimits,
): ContributorAggregate {
  return summarize(
    identity,
    history.filter((c) => sameIdentity(c, identity)),
    limits,
  );
}

function summarize(
  identity: Identity,
  authored: readonly CommitRecord[],
  limits: AggregateLimits,
): ContributorAggregate {
  const seenHashes = new Set<string>();
  const commits: CommitRecord[] = [];
  for (const c of authored) {
    if (seenHashes.has(c.hash)) continue;
    seenHashes.add(c.hash);
    commits.push(c);
  }
  if (!commits.length) {
    throw new Error(`No commits found for ${identity.name} <${identity.email}>`);
  }

  let additions = 0;
  let deletions = 0;
  const filesChanged = new Set<string>();
  const modifications = new Map<string, number>();
  const fileTypes = new Map<string, number>();
  const largest: LargeCommit[] = [];

  for (const commit of commits) {
    let commitAdditions = 0;
    let commitDeletions = 0;
    for (const file of commit.files) {
      commitAdditions += file.additions;
      commitDeletions += file.deletions;
      filesChanged.add(file.path);
      modifications.set(file.path, (modifications.get(file.path) || 0) + 1);
      const ext = fileExtension(file.path);
      fileTypes.set(ext, (fileTypes.get(ext) || 0) + 1);
    }
    additions += commitAdditions;
    deletions += commitDeletions;
    offerLargest(
      largest,
      { additions: commitAdditions, deletions: commitDeletions, message: commit.subject },
      limits.largestCommits,
    );
  }

  // Array.prototype.sort is stable, so equal counts keep discovery order.
  const mostModifiedFiles: ModifiedFile[] = [...modifications.entries()]
    .map(([path, count]) => ({ path, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, limits.topFiles));

  const stats: ContributorStats = {
    name: identity.name,
    email: identity.email,
    commitCount: commits.length,
    additions,
    deletions,
    filesChanged,
    mostModifiedFiles,
    fileTypes,
    largestCommits: largest,
  };
  return { stats, commits };
}

/** Every identity in `history`, most commits first; ties keep first-seen order. */
export const aggregateContributors = (
  history: readonly CommitRecord[],
  limits: AggregateLimits,
): ContributorStats[] =>
  groupByIdentity(history)
    .map((g) => summarize(g.identity, g.commits, limits).stats)
    .sort((a, b) => b.commitCount - a.commitCount);

/** File types as `[extension, count]`, most frequent first. */
export const sortedFileTypes = (stats: ContributorStats): Array<[string, number]> =>
  [...stats.fileTypes.entries()].sort((a, b) => b[1] - a[1]);
