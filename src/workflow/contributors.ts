import chalk from 'chalk';
import { formatContributorReport } from '../report.js';
import { sortedFileTypes } from '../stats.js';
import type { ContributorStats } from '../types.js';
import type { FlowContext } from './context.js';

export const EXIT_LABEL = '❌ Exit';

export const contributorLabel = (c: ContributorStats) =>
  `${c.name} <${c.email}> (${c.commitCount} commits)`;

function showContributor(ctx: FlowContext, c: ContributorStats) {
  const { term } = ctx;
  term.section(`👤 Contributor Details: ${c.name}`);
  term.panel(c.name, [
    `📧 ${c.email}`,
    `Commits: ${c.commitCount}`,
    `Lines: ${chalk.green('+' + c.additions)} ${chalk.red('-' + c.deletions)}`,
    `Files changed: ${c.filesChanged.size}`,
  ]);

  term.subsection('📁 Most Modified Files');
  c.mostModifiedFiles.forEach((f) => term.line(`• ${f.path} (${f.count} modifications)`));

  term.subsection('🔧 File Types');
  sortedFileTypes(c).forEach(([ext, count]) => term.line(`• ${ext}: ${count} files`));

  term.subsection('📈 Largest Contributions');
  c.largestCommits.forEach((l) =>
    term.line(`• ${chalk.green('+' + l.additions)} ${chalk.red('-' + l.deletions)} : ${l.message}`),
  );
}

/**
 * Browse loop over a contributor list fixed at start. The last entry exits;
 * any other shows stats and an AI summary, then waits for Enter.
 */
export async function runContributorFlow(ctx: FlowContext): Promise<void> {
  const { term, repo, backend, config } = ctx;
  const contributors = await term.step('Reading history', () => repo.getContributors());

  term.section('👥 Repository Contributors');
  if (!contributors.length) term.line(chalk.dim('No commits yet.'));
  const items: readonly string[] = [...contributors.map(contributorLabel), EXIT_LABEL];
  const exitIndex = items.length - 1;

  for (;;) {
    const selection = await term.select('Select a contributor to view details', items, 0);
    if (selection === exitIndex) break;
    const contributor = contributors[selection];
    if (!contributor) throw new Error(`Selection out of range: ${selection}`);

    showContributor(ctx, contributor);

    const commits = await repo.getContributorCommits(contributor.name, contributor.email);
    const recent = commits.slice(0, config.recentCommits);
    term.subsection('🔄 Recent Commits');
    recent.forEach((commit) => term.line(`• ${commit}`));

    const report = formatContributorReport(contributor, recent);
    const summary = await term.step("Analyzing contributor's work", () =>
      backend.analyzeContributor(report),
    );

    term.section('🤖 AI Analysis');
    term.markdown(summary);
    term.line();
    await term.pause('Press Enter to continue...');
    term.clear();
  }

  term.close('👋 Done.');
}
