import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { BackendError, NoChangesError, errorMessage } from '../errors.js';
import { parseDiffFromRaw } from '../git.js';
import {
  buildCommitMessages,
  buildContributorMessages,
  buildFileAnalysisMessages,
} from '../prompt.js';
import type { FileAnalysis } from '../types.js';
import type { Provider } from './provider.js';

/** Text generation as the flows see it. */
export interface GenerationBackend {
  generateCommitMessage(diff: string): Promise<string>;
  analyzeChanges(diff: string): Promise<FileAnalysis[]>;
  analyzeContributor(report: string): Promise<string>;
}

const AnalysisSchema = z.object({
  files: z.array(
    z.object({
      path: z.string().min(1),
      explanation: z.string(),
    }),
  ),
});

export const extractJSON = (raw: string): unknown => {
  const trimmed = raw.trim();
  let jsonText: string | null = null;
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    jsonText = trimmed;
  } else {
    const match = raw.match(/\{[\s\S]*\}/);
    if (match) jsonText = match[0];
  }
  if (!jsonText) throw new BackendError('No JSON object detected in model output.');
  try {
    return JSON.parse(jsonText);
  } catch (e) {
    throw new BackendError('Invalid JSON in model output.', errorMessage(e));
  }
};

export const parseFileAnalyses = (raw: string): FileAnalysis[] => {
  const parsed = AnalysisSchema.safeParse(extractJSON(raw));
  if (!parsed.success) {
    throw new BackendError('Model output does not match the analysis schema.', parsed.error.message);
  }
  return parsed.data.files;
};

const FENCE_RE = /^```[\w-]*\n([\s\S]*?)\n?```$/;
const QUOTED_RE = /^(["'`])([\s\S]*)\1$/;

/** Strips the code fence or quotes a model sometimes wraps a one-line answer in. */
export const normalizeGeneratedMessage = (raw: string): string => {
  let text = raw.trim();
  const fenced = text.match(FENCE_RE);
  if (fenced) text = fenced[1].trim();
  const quoted = text.match(QUOTED_RE);
  if (quoted) text = quoted[2].trim();
  if (!text) throw new BackendError('Model returned an empty commit message.');
  return text;
};

async function call<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof BackendError) throw e;
    throw new BackendError('Generation backend failed', errorMessage(e));
  }
}

export class ProviderBackend implements GenerationBackend {
  constructor(
    private provider: Provider,
    private config: AppConfig,
  ) {}

  async generateCommitMessage(diff: string): Promise<string> {
    const files = parseDiffFromRaw(diff);
    if (!files.length) throw new NoChangesError();
    const raw = await call(() =>
      this.provider.chat(buildCommitMessages({ files, config: this.config })),
    );
    return normalizeGeneratedMessage(raw);
  }

  async analyzeChanges(diff: string): Promise<FileAnalysis[]> {
    const files = parseDiffFromRaw(diff);
    if (!files.length) throw new NoChangesError('No changes to analyze');
    const raw = await call(() =>
      this.provider.chat(buildFileAnalysisMessages({ files, config: this.config }), {
        expectJSON: true,
      }),
    );
    return parseFileAnalyses(raw);
  }

  async analyzeContributor(report: string): Promise<string> {
    const raw = await call(() => this.provider.chat(buildContributorMessages(report)));
    const summary = raw.trim();
    if (!summary) throw new BackendError('Model returned an empty contributor summary.');
    return summary;
  }
}
