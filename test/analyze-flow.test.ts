import { describe, it, expect } from 'vitest';
import { BackendError, NoChangesError } from '../src/errors.js';
import { runFileAnalysisFlow } from '../src/workflow/analyze.js';
import { FakeTerminal, fakeBackend, fakeRepo, makeContext } from './helpers/fakes.js';

describe('runFileAnalysisFlow', () => {
  it('reports a clean tree without calling the backend', async () => {
    const term = new FakeTerminal();
    const repo = fakeRepo({
      getDiff: async () => {
        throw new NoChangesError();
      },
    });
    const backend = fakeBackend();
    expect(await runFileAnalysisFlow(makeContext(term, repo, backend))).toBeNull();
    expect(backend.analyzeChanges).not.toHaveBeenCalled();
    expect(term.steps).toEqual([]);
    expect(term.failedSteps).toEqual([]);
    expect(term.output).toEqual([
      'section: 📊 Repository Status',
      'No changes to analyze. Your working directory is clean.',
      'close: Nothing to do.',
    ]);
  });

  it('renders one block per analyzed file', async () => {
    const term = new FakeTerminal();
    const analyses = [
      { path: 'src/a.ts', explanation: 'Adds `retry`.' },
      { path: 'README.md', explanation: 'Documents it.' },
    ];
    const backend = fakeBackend({ analyzeChanges: async () => analyses });
    const result = await runFileAnalysisFlow(makeContext(term, fakeRepo(), backend));
    expect(result).toEqual(analyses);
    expect(backend.analyzeChanges).toHaveBeenCalledWith('diff --git a/a.ts b/a.ts');
    expect(term.steps).toEqual(['Analyzing changes']);
    expect(term.output).toEqual([
      'section: 📊 File Analysis Results',
      'markdown: ## 📁 src/a.ts\nAdds `retry`.',
      '',
      'markdown: ## 📁 README.md\nDocuments it.',
      '',
      'close: ✨ 2 files analyzed.',
    ]);
  });

  it('propagates malformed backend output', async () => {
    const term = new FakeTerminal();
    const backend = fakeBackend({
      analyzeChanges: async () => {
        throw new BackendError('Invalid JSON in model output.');
      },
    });
    await expect(runFileAnalysisFlow(makeContext(term, fakeRepo(), backend))).rejects.toThrow(
      'Invalid JSON in model output.',
    );
    expect(term.failedSteps).toEqual(['Analyzing changes: Invalid JSON in model output.']);
  });
});
