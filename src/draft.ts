import type { CommitDraft } from './types.js';

export const COMMIT_TYPES = [
  { type: 'feat', label: '✨ New feature' },
  { type: 'fix', label: '🐛 Bug fix' },
  { type: 'docs', label: '📚 Documentation' },
  { type: 'style', label: '💅 Formatting' },
  { type: 'refactor', label: '♻️ Code restructure' },
  { type: 'test', label: '🧪 Testing' },
  { type: 'chore', label: '🔧 Maintenance' },
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number]['type'];

/**
 * Splits generated text at its first colon. Without one the whole text is
 * the description and the type stays unset.
 */
export const parseDraft = (text: string): CommitDraft => {
  const message = text.trim();
  const idx = message.indexOf(':');
  if (idx === -1) return { message, description: message };
  const type = message.slice(0, idx).trim();
  return {
    message,
    type: type || undefined,
    description: message.slice(idx + 1).trim(),
  };
};

/** Replaces only the type token; the description is carried over verbatim. */
export const withType = (draft: CommitDraft, type: string): CommitDraft => ({
  message: `${type}: ${draft.description}`,
  type,
  description: draft.description,
});
