import { runFileAnalysisFlow } from './analyze.js';
import { runCommitFlow } from './commit.js';
import type { FlowContext } from './context.js';
import { runContributorFlow } from './contributors.js';
import type { Terminal } from './ui.js';

export const MODES = ['commit-message', 'file-analysis', 'contributors'] as const;
export type Mode = (typeof MODES)[number];

export const MODE_LABELS: Record<Mode, string> = {
  'commit-message': '📝 Generate commit message',
  'file-analysis': '🔍 Analyze file changes',
  contributors: '👥 Analyze contributors',
};

export async function chooseMode(term: Terminal): Promise<Mode> {
  const index = await term.select(
    'What would you like to do?',
    MODES.map((m) => MODE_LABELS[m]),
    0,
  );
  const mode = MODES[index];
  if (!mode) throw new Error(`Selection out of range: ${index}`);
  return mode;
}

export async function runMode(mode: Mode, ctx: FlowContext): Promise<void> {
  switch (mode) {
    case 'commit-message':
      await runCommitFlow(ctx);
      return;
    case 'file-analysis':
      await runFileAnalysisFlow(ctx);
      return;
    case 'contributors':
      await runContributorFlow(ctx);
      return;
  }
}
