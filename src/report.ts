import { sortedFileTypes } from './stats.js';
import type { ContributorStats } from './types.js';

const section = (title: string, lines: string[]) => `### ${title}\n${lines.join('\n')}`;

const bullets = (items: readonly string[]) => items.map((item) => `- ${item}`);

/**
 * Builds the Markdown block sent to the backend for one contributor.
 * Empty lists keep their heading with an empty body.
 */
export function formatContributorReport(
  stats: ContributorStats,
  recentCommits: readonly string[],
  filesChanged: readonly string[] = [...stats.filesChanged],
): string {
  return [
    `## Contributor: ${stats.name} <${stats.email}>`,
    section('Statistics', [
      `- Total commits: ${stats.commitCount}`,
      `- Lines added: ${stats.additions}`,
      `- Lines deleted: ${stats.deletions}`,
      `- Files modified: ${stats.filesChanged.size}`,
    ]),
    section(
      'Most frequently modified files',
      bullets(stats.mostModifiedFiles.map((f) => `${f.path} (${f.count} modifications)`)),
    ),
    section(
      'File type distribution',
      bullets(sortedFileTypes(stats).map(([ext, count]) => `${ext}: ${count} files`)),
    ),
    section(
      'Largest contributions',
      bullets(stats.largestCommits.map((c) => `+${c.additions} -${c.deletions} : ${c.message}`)),
    ),
    section('Recent commits', bullets(recentCommits)),
    section('Modified files', bullets(filesChanged)),
  ].join('\n\n');
}
