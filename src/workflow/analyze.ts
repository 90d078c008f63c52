import { NoChangesError } from '../errors.js';
import type { FileAnalysis } from '../types.js';
import type { FlowContext } from './context.js';

/** Explains each pending file change. Returns the analyses, or `null` on a clean tree. */
export async function runFileAnalysisFlow(ctx: FlowContext): Promise<FileAnalysis[] | null> {
  let diff: string;
  try {
    diff = await ctx.repo.getDiff();
  } catch (e) {
    if (!(e instanceof NoChangesError)) throw e;
    ctx.term.section('📊 Repository Status');
    ctx.term.line('No changes to analyze. Your working directory is clean.');
    ctx.term.close('Nothing to do.');
    return null;
  }

  const analyses = await ctx.term.step('Analyzing changes', () =>
    ctx.backend.analyzeChanges(diff),
  );

  ctx.term.section('📊 File Analysis Results');
  for (const analysis of analyses) {
    ctx.term.markdown(`## 📁 ${analysis.path}\n${analysis.explanation}`);
    ctx.term.line();
  }
  ctx.term.close(`✨ ${analyses.length} ${analyses.length === 1 ? 'file' : 'files'} analyzed.`);
  return analyses;
}
