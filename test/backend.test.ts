import { describe, it, expect, vi } from 'vitest';
import { BackendError, NoChangesError } from '../src/errors.js';
import {
  ProviderBackend,
  normalizeGeneratedMessage,
  parseFileAnalyses,
} from '../src/model/backend.js';
import type { ChatMessage, ChatOptions, Provider } from '../src/model/provider.js';
import { testConfig } from './helpers/fakes.js';

const DIFF = `diff --git a/src/retry.ts b/src/retry.ts
--- a/src/retry.ts
+++ b/src/retry.ts
@@ -1,1 +1,2 @@
 const attempts = 3;
+const delayMs = 100;`;

function fakeProvider(reply: (messages: ChatMessage[]) => Promise<string>) {
  const chat = vi.fn<(messages: ChatMessage[], opts?: ChatOptions) => Promise<string>>(reply);
  const provider: Provider = { name: () => 'fake', chat };
  return { provider, chat };
}

describe('normalizeGeneratedMessage', () => {
  it('unwraps code fences and quotes', () => {
    expect(normalizeGeneratedMessage('```\nfeat: add retry\n```')).toBe('feat: add retry');
    expect(normalizeGeneratedMessage('```text\nfix: handle null\n```')).toBe('fix: handle null');
    expect(normalizeGeneratedMessage('  "docs: explain retry"  ')).toBe('docs: explain retry');
  });

  it('leaves plain text alone', () => {
    expect(normalizeGeneratedMessage('chore: bump "deps"')).toBe('chore: bump "deps"');
  });

  it('rejects empty output', () => {
    expect(() => normalizeGeneratedMessage(' \n ')).toThrow(BackendError);
  });
});

describe('parseFileAnalyses', () => {
  it('reads the JSON object out of surrounding text', () => {
    const raw = 'Here you go: {"files":[{"path":"a.ts","explanation":"Adds a."}]} done';
    expect(parseFileAnalyses(raw)).toEqual([{ path: 'a.ts', explanation: 'Adds a.' }]);
  });

  it('rejects output without JSON', () => {
    expect(() => parseFileAnalyses('no idea')).toThrow('No JSON object detected in model output.');
  });

  it('rejects broken JSON', () => {
    expect(() => parseFileAnalyses('{"files": [}')).toThrow('Invalid JSON in model output.');
  });

  it('rejects JSON of the wrong shape', () => {
    expect(() => parseFileAnalyses('{"files":[{"path":""}]}')).toThrow(
      'Model output does not match the analysis schema.',
    );
  });
});

describe('ProviderBackend', () => {
  it('sends the diff and normalizes the reply', async () => {
    const { provider, chat } = fakeProvider(async () => ' "feat: add retry delay" ');
    const backend = new ProviderBackend(provider, testConfig);
    expect(await backend.generateCommitMessage(DIFF)).toBe('feat: add retry delay');
    expect(chat).toHaveBeenCalledTimes(1);
    const [messages] = chat.mock.calls[0];
    expect(messages[1].content).toContain('file: src/retry.ts\n@@ -1,1 +1,2 @@');
  });

  it('refuses an empty diff without calling the provider', async () => {
    const { provider, chat } = fakeProvider(async () => 'x');
    const backend = new ProviderBackend(provider, testConfig);
    await expect(backend.generateCommitMessage('')).rejects.toBeInstanceOf(NoChangesError);
    await expect(backend.analyzeChanges('')).rejects.toThrow('No changes to analyze');
    expect(chat).not.toHaveBeenCalled();
  });

  it('asks for JSON when analyzing changes', async () => {
    const { provider, chat } = fakeProvider(
      async () => '{"files":[{"path":"src/retry.ts","explanation":"Adds a delay."}]}',
    );
    const backend = new ProviderBackend(provider, testConfig);
    expect(await backend.analyzeChanges(DIFF)).toEqual([
      { path: 'src/retry.ts', explanation: 'Adds a delay.' },
    ]);
    expect(chat).toHaveBeenCalledWith(expect.any(Array), { expectJSON: true });
  });

  it('wraps provider failures', async () => {
    const { provider } = fakeProvider(async () => {
      throw new Error('spawn failed');
    });
    const error = await new ProviderBackend(provider, testConfig)
      .generateCommitMessage(DIFF)
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BackendError);
    if (!(error instanceof BackendError)) return;
    expect(error.message).toBe('Generation backend failed');
    expect(error.detail).toBe('spawn failed');
  });

  it('passes backend errors through unchanged', async () => {
    const { provider } = fakeProvider(async () => {
      throw new BackendError('Model call timed out after 1000ms (elapsed=1001ms)');
    });
    const backend = new ProviderBackend(provider, testConfig);
    await expect(backend.analyzeContributor('## Contributor')).rejects.toThrow(
      'Model call timed out after 1000ms (elapsed=1001ms)',
    );
  });

  it('trims the contributor summary and rejects an empty one', async () => {
    const { provider, chat } = fakeProvider(async () => '\n- works on parsing\n');
    const backend = new ProviderBackend(provider, testConfig);
    expect(await backend.analyzeContributor('## Contributor: Ada')).toBe('- works on parsing');
    expect(chat.mock.calls[0][0][1].content).toBe('## Contributor: Ada\n\nWrite the summary now.');

    chat.mockResolvedValueOnce('   ');
    await expect(backend.analyzeContributor('## Contributor: Ada')).rejects.toThrow(
      'Model returned an empty contributor summary.',
    );
  });
});
