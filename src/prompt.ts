import type { AppConfig } from './config.js';
import { COMMIT_TYPES } from './draft.js';
import type { ChatMessage } from './model/provider.js';
import type { FileDiff } from './types.js';

const MAX_HUNK_LINES = 40;

const fileHeader = (f: FileDiff) => `file: ${f.file}${f.untracked ? ' (new, untracked)' : ''}`;

export const summarizeDiffForPrompt = (
  files: FileDiff[],
  privacy: AppConfig['privacy'],
): string => {
  if (privacy === 'high') {
    return files
      .map((f) => `${fileHeader(f)} (+${f.additions} -${f.deletions}) hunks:${f.hunks.length}`)
      .join('\n');
  }
  if (privacy === 'medium') {
    return files
      .map(
        (f) =>
          `${fileHeader(f)}\n` +
          f.hunks
            .map(
              (h) =>
                `  hunk ${h.hash} context:${h.functionContext || ''} +${h.added} -${h.removed}`,
            )
            .join('\n'),
      )
      .join('\n');
  }
  // low
  return files
    .map(
      (f) =>
        `${fileHeader(f)}\n` +
        f.hunks
          .map(
            (h) =>
              `${h.header}\n${h.lines
                .slice(0, MAX_HUNK_LINES)
                .join('\n')}${h.lines.length > MAX_HUNK_LINES ? '\n[truncated]' : ''}`,
          )
          .join('\n'),
    )
    .join('\n');
};

export const buildCommitMessages = (opts: {
  files: FileDiff[];
  config: AppConfig;
}): ChatMessage[] => {
  const { files, config } = opts;
  const typeMap = Object.fromEntries(COMMIT_TYPES.map((t) => [t.type, t.label]));

  const rules: string[] = [];
  rules.push('Purpose: Write one commit message for the provided git diff.');
  rules.push('Locale: en');
  rules.push('Format: <type>: <description>');
  rules.push('TypeMap: ' + JSON.stringify(typeMap));
  rules.push('Use exactly one colon, directly after the type, followed by a single space.');
  rules.push(
    'Description Rules: imperative mood, present tense, lowercase start unless proper noun, no trailing period, at most 72 characters in total.',
  );
  rules.push('Fallback Type: use chore when no other type clearly fits.');
  rules.push('Never fabricate content not present or implied by the diff.');
  rules.push('Return ONLY the commit message line. No quotes, no markdown, no explanation.');

  return [
    { role: 'system', content: rules.join('\n') },
    {
      role: 'user',
      content: `Diff:\n${summarizeDiffForPrompt(files, config.privacy)}\nWrite the commit message now.`,
    },
  ];
};

export const buildFileAnalysisMessages = (opts: {
  files: FileDiff[];
  config: AppConfig;
}): ChatMessage[] => {
  const { files, config } = opts;
  const rules: string[] = [];
  rules.push('Purpose: Explain the pending changes of each file in the provided git diff.');
  rules.push('Locale: en');
  rules.push('Output JSON Schema: { "files": [ { "path": string, "explanation": string } ] }');
  rules.push('Provide exactly one entry per changed file, in diff order, using the diff path.');
  rules.push(
    'Explanation: 2-5 sentences of Markdown covering what changed and why it likely matters; cite functions, types or tests by name.',
  );
  rules.push('Never fabricate content not present or implied by the diff.');
  rules.push('Return ONLY the JSON object. No surrounding text or markdown.');

  return [
    { role: 'system', content: rules.join('\n') },
    {
      role: 'user',
      content: `Files: ${files.map((f) => f.file).join(', ')}\nDiff:\n${summarizeDiffForPrompt(files, config.privacy)}\nAnalyze the changes now.`,
    },
  ];
};

export const buildContributorMessages = (report: string): ChatMessage[] => {
  const rules: string[] = [];
  rules.push("Purpose: Summarize a contributor's work in this repository from the statistics report.");
  rules.push('Locale: en');
  rules.push('Output: Markdown, at most 250 words, no top-level heading.');
  rules.push(
    'Cover: main areas of the codebase they work on, kind of work (features, fixes, maintenance), notable large contributions, and technologies suggested by file types.',
  );
  rules.push('Base every statement on the report; do not guess at anything it does not show.');

  return [
    { role: 'system', content: rules.join('\n') },
    { role: 'user', content: `${report}\n\nWrite the summary now.` },
  ];
};
