import { execa, ExecaError } from 'execa';
import { BackendError, errorMessage } from '../errors.js';
import { debug } from '../log.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  /** Resolve as soon as a complete JSON object has streamed in. */
  expectJSON?: boolean;
}

export interface Provider {
  name(): string;
  chat(messages: ChatMessage[], opts?: ChatOptions): Promise<string>;
}

/** Runs prompts through the `opencode` CLI (`opencode run <prompt> --model <model>`). */
export class OpenCodeProvider implements Provider {
  constructor(
    private model: string = 'github-copilot/gpt-4.1',
    private timeoutMs: number = 120_000,
  ) {}

  name() {
    return 'opencode';
  }

  async chat(messages: ChatMessage[], opts: ChatOptions = {}): Promise<string> {
    // opencode takes a single prompt argument, so the roles are flattened into it.
    const fullPrompt = messages.map((m) => `${m.role.toUpperCase()}: ${m.content}`).join('\n\n');
    const eager = opts.expectJSON === true && process.env.GIT_SCRIBE_EAGER_PARSE !== 'false';
    const start = Date.now();

    return await new Promise<string>((resolve, reject) => {
      let resolved = false;
      let acc = '';

      const args = ['run', fullPrompt, '--model', this.model];
      if (process.env.GIT_SCRIBE_PRINT_LOGS === 'true') args.push('--print-logs');
      const subprocess = execa('opencode', args, {
        timeout: this.timeoutMs,
        input: '', // close stdin so the CLI never waits on it
      });

      const finish = (value: string) => {
        if (resolved) return;
        resolved = true;
        debug(
          'provider',
          `model=${this.model} elapsedMs=${Date.now() - start} promptChars=${fullPrompt.length} bytesOut=${value.length}`,
        );
        resolve(value);
      };

      const tryEager = () => {
        if (!eager) return;
        const first = acc.indexOf('{');
        const last = acc.lastIndexOf('}');
        if (first === -1 || last <= first) return;
        const candidate = acc.slice(first, last + 1).trim();
        try {
          JSON.parse(candidate);
        } catch {
          return; // incomplete, keep reading
        }
        debug('provider', 'complete JSON received, terminating opencode');
        subprocess.kill('SIGTERM');
        finish(candidate);
      };

      subprocess.stdout?.on('data', (chunk: Buffer) => {
        acc += chunk.toString();
        tryEager();
      });

      subprocess.stderr?.on('data', (chunk: Buffer) => {
        debug('provider:stderr', chunk.toString().trim());
      });

      subprocess
        .then(({ stdout }) => finish(String(stdout)))
        .catch((e: unknown) => {
          if (resolved) return; // killed after an eager resolve
          const elapsed = Date.now() - start;
          if (e instanceof ExecaError) {
            if (e.timedOut) {
              return reject(
                new BackendError(
                  `Model call timed out after ${this.timeoutMs}ms (elapsed=${elapsed}ms)`,
                ),
              );
            }
            if (e.code === 'ENOENT') {
              return reject(
                new BackendError(
                  'opencode CLI not found in PATH. Install it or make sure the binary is available.',
                ),
              );
            }
            debug('provider', 'failure', e.stderr || e.shortMessage);
            return reject(
              new BackendError('opencode invocation failed', String(e.stderr || e.shortMessage)),
            );
          }
          reject(new BackendError('opencode invocation failed', errorMessage(e)));
        });
    });
  }
}
