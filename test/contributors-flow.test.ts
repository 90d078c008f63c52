import { describe, it, expect } from 'vitest';
import { BackendError } from '../src/errors.js';
import { formatContributorReport } from '../src/report.js';
import { EXIT_LABEL, contributorLabel, runContributorFlow } from '../src/workflow/contributors.js';
import { FakeTerminal, contributor, fakeBackend, fakeRepo, makeContext } from './helpers/fakes.js';

const ada = contributor('Ada', 3);
const bob = contributor('Bob', 1);
const cy = contributor('Cy', 1);

describe('runContributorFlow', () => {
  it('lists contributors with an exit entry last', async () => {
    const term = new FakeTerminal([3]);
    const repo = fakeRepo({ getContributors: async () => [ada, bob, cy] });
    const backend = fakeBackend();
    await runContributorFlow(makeContext(term, repo, backend));
    expect(term.selects).toEqual([
      {
        message: 'Select a contributor to view details',
        options: [
          'Ada <ada@example.com> (3 commits)',
          'Bob <bob@example.com> (1 commits)',
          'Cy <cy@example.com> (1 commits)',
          EXIT_LABEL,
        ],
        defaultIndex: 0,
      },
    ]);
    expect(backend.analyzeContributor).not.toHaveBeenCalled();
    expect(repo.getContributorCommits).not.toHaveBeenCalled();
    expect(term.output[term.output.length - 1]).toBe('close: 👋 Done.');
  });

  it('analyzes the chosen contributor, then returns to the list', async () => {
    const term = new FakeTerminal([0, 2]);
    const repo = fakeRepo({
      getContributors: async () => [ada, bob],
      getContributorCommits: async () => ['a1 one', 'a2 two', 'a3 three'],
    });
    const backend = fakeBackend({ analyzeContributor: async () => '**Ada** works on `src`.' });
    await runContributorFlow(makeContext(term, repo, backend));

    expect(repo.getContributors).toHaveBeenCalledTimes(1);
    expect(repo.getContributorCommits).toHaveBeenCalledWith('Ada', 'ada@example.com');
    expect(backend.analyzeContributor).toHaveBeenCalledTimes(1);
    expect(backend.analyzeContributor).toHaveBeenCalledWith(
      formatContributorReport(ada, ['a1 one', 'a2 two']),
    );
    expect(term.selects).toHaveLength(2);
    expect(term.selects[1].options).toEqual(term.selects[0].options);
    expect(term.output).toContain('section: 👤 Contributor Details: Ada');
    expect(term.output).toContain('• a2 two');
    expect(term.output).not.toContain('• a3 three');
    expect(term.output).toContain('section: 🤖 AI Analysis');
    expect(term.output).toContain('markdown: **Ada** works on `src`.');
    expect(term.pauses).toBe(1);
    expect(term.clears).toBe(1);
    expect(term.steps).toEqual(['Reading history', "Analyzing contributor's work"]);
  });

  it('offers only the exit entry for an empty history', async () => {
    const term = new FakeTerminal([0]);
    const backend = fakeBackend();
    await runContributorFlow(makeContext(term, fakeRepo(), backend));
    expect(term.selects[0].options).toEqual([EXIT_LABEL]);
    expect(backend.analyzeContributor).not.toHaveBeenCalled();
  });

  it('propagates backend failures', async () => {
    const term = new FakeTerminal([1, 2]);
    const repo = fakeRepo({ getContributors: async () => [ada, bob] });
    const backend = fakeBackend({
      analyzeContributor: async () => {
        throw new BackendError('opencode invocation failed');
      },
    });
    await expect(runContributorFlow(makeContext(term, repo, backend))).rejects.toThrow(
      'opencode invocation failed',
    );
    expect(term.pauses).toBe(0);
  });
});

describe('contributorLabel', () => {
  it('shows identity and commit count', () => {
    expect(contributorLabel(bob)).toBe('Bob <bob@example.com> (1 commits)');
  });
});
