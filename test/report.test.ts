import { describe, it, expect } from 'vitest';
import { formatContributorReport } from '../src/report.js';
import type { ContributorStats } from '../src/types.js';

const ada: ContributorStats = {
  name: 'Ada',
  email: 'ada@example.com',
  commitCount: 2,
  additions: 12,
  deletions: 3,
  filesChanged: new Set(['src/a.ts', 'docs/b.md']),
  mostModifiedFiles: [
    { path: 'src/a.ts', count: 2 },
    { path: 'docs/b.md', count: 1 },
  ],
  fileTypes: new Map([
    ['md', 1],
    ['ts', 2],
  ]),
  largestCommits: [
    { additions: 10, deletions: 2, message: 'add a' },
    { additions: 2, deletions: 1, message: 'docs' },
  ],
};

describe('formatContributorReport', () => {
  it('renders every section in order', () => {
    const report = formatContributorReport(ada, ['abc1234 add a', 'def5678 docs']);
    expect(report).toBe(
      [
        '## Contributor: Ada <ada@example.com>',
        '',
        '### Statistics',
        '- Total commits: 2',
        '- Lines added: 12',
        '- Lines deleted: 3',
        '- Files modified: 2',
        '',
        '### Most frequently modified files',
        '- src/a.ts (2 modifications)',
        '- docs/b.md (1 modifications)',
        '',
        '### File type distribution',
        '- ts: 2 files',
        '- md: 1 files',
        '',
        '### Largest contributions',
        '- +10 -2 : add a',
        '- +2 -1 : docs',
        '',
        '### Recent commits',
        '- abc1234 add a',
        '- def5678 docs',
        '',
        '### Modified files',
        '- src/a.ts',
        '- docs/b.md',
      ].join('\n'),
    );
  });

  it('keeps headings of empty sections', () => {
    const empty: ContributorStats = {
      ...ada,
      filesChanged: new Set(),
      mostModifiedFiles: [],
      fileTypes: new Map(),
      largestCommits: [],
    };
    const report = formatContributorReport(empty, []);
    expect(report).toContain('### Most frequently modified files\n\n\n### File type distribution\n');
    expect(report).toContain('### Recent commits\n\n\n### Modified files\n');
    expect(report.endsWith('### Modified files\n')).toBe(true);
  });

  it('uses the given file list for the modified files section', () => {
    const report = formatContributorReport(ada, [], ['only.ts']);
    expect(report.endsWith('### Modified files\n- only.ts')).toBe(true);
  });
});
