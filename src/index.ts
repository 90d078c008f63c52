#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import chalk from 'chalk';
import { Cli, Command, Option } from 'clipanion';
import { z } from 'zod';
import {
  CONFIG_KEYS,
  PartialConfigSchema,
  isConfigKey,
  loadConfig,
  loadConfigDetailed,
  saveGlobalConfig,
  type AppConfig,
} from './config.js';
import { errorDetail, errorMessage } from './errors.js';
import { openRepository } from './git.js';
import { ProviderBackend } from './model/backend.js';
import { OpenCodeProvider } from './model/provider.js';
import type { FlowContext } from './workflow/context.js';
import { chooseMode, runMode, type Mode } from './workflow/modes.js';
import { animateHeaderBase, createTerminal } from './workflow/ui.js';

const PackageSchema = z.object({ version: z.string() });
const pkgVersion = PackageSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')),
).version;

async function createContext(overrides: Partial<AppConfig>): Promise<FlowContext> {
  const config = await loadConfig(process.cwd(), overrides);
  const repo = await openRepository({
    largestCommits: config.largestCommits,
    topFiles: config.topFiles,
  });
  const provider = new OpenCodeProvider(config.model, config.modelTimeoutMs);
  return { config, repo, backend: new ProviderBackend(provider, config), term: createTerminal() };
}

abstract class FlowCommand extends Command {
  model = Option.String('-m,--model', {
    required: false,
    description: 'Model provider/name (e.g. github-copilot/gpt-4.1)',
  });

  protected abstract pickMode(ctx: FlowContext): Promise<Mode>;

  async execute(): Promise<number> {
    const overrides: Partial<AppConfig> = {};
    if (this.model) overrides.model = this.model;
    let verbose = false;
    try {
      const ctx = await createContext(overrides);
      verbose = ctx.config.verbose;
      if (process.stdout.isTTY) await animateHeaderBase('git-scribe', ctx.config.model);
      await runMode(await this.pickMode(ctx), ctx);
      return 0;
    } catch (e) {
      this.context.stderr.write(chalk.red(`✖ ${errorMessage(e)}`) + '\n');
      const detail = errorDetail(e);
      if (verbose && detail) this.context.stderr.write(chalk.dim(detail) + '\n');
      return 1;
    }
  }
}

// Root command (default): interactive mode chooser.
class RootCommand extends FlowCommand {
  static paths = [Command.Default];
  static usage = Command.Usage({
    description: 'Choose a mode interactively (default command).',
    details: `Commands:\n\n⋅ commit: Generate, refine and commit a message for pending changes\n\n⋅ analyze: Explain pending changes file by file\n\n⋅ contributors: Browse contributors and summarize their work\n\n⋅ config show: Show merged config + sources\n\n⋅ config get <key>: Get a single config value\n\n⋅ config set <k> <v>: Persist a global config value`,
    examples: [
      ['Pick a mode', 'git-scribe'],
      ['Use another model for this run', 'git-scribe --model github-copilot/gpt-4.1'],
      ['Show config JSON', 'git-scribe config show --json'],
    ],
  });

  protected pickMode(ctx: FlowContext) {
    return chooseMode(ctx.term);
  }
}

class CommitCommand extends FlowCommand {
  static paths = [[`commit`]];
  static usage = Command.Usage({
    description: 'Generate a commit message for pending changes and refine it interactively.',
    details: `Regenerate the message, change its type, then stage everything and commit, or cancel. Nothing is committed without an explicit confirmation.`,
    examples: [['Basic usage', 'git-scribe commit']],
  });

  protected async pickMode(): Promise<Mode> {
    return 'commit-message';
  }
}

class AnalyzeCommand extends FlowCommand {
  static paths = [[`analyze`]];
  static usage = Command.Usage({
    description: 'Explain pending changes file by file.',
    examples: [['Basic usage', 'git-scribe analyze']],
  });

  protected async pickMode(): Promise<Mode> {
    return 'file-analysis';
  }
}

class ContributorsCommand extends FlowCommand {
  static paths = [[`contributors`]];
  static usage = Command.Usage({
    description: 'Browse contributors and get an AI summary of their work.',
    examples: [['Basic usage', 'git-scribe contributors']],
  });

  protected async pickMode(): Promise<Mode> {
    return 'contributors';
  }
}

class ConfigShowCommand extends Command {
  static paths = [[`config`, `show`]];
  static usage = Command.Usage({
    description: 'Show effective configuration with source metadata.',
    details:
      'Outputs merged config fields, their values, and source precedence info. Use --json for raw JSON including _sources.',
    examples: [
      ['Human readable', 'git-scribe config show'],
      ['JSON with sources', 'git-scribe config show --json'],
    ],
  });
  json = Option.Boolean('--json', false, { description: 'Output JSON including _sources' });
  async execute() {
    const { config, raw } = await loadConfigDetailed();
    if (this.json) {
      this.context.stdout.write(JSON.stringify({ config, raw }, null, 2) + '\n');
      return;
    }
    const lines = CONFIG_KEYS.map(
      (k) => `${k} = ${JSON.stringify(config[k])}  (${config._sources[k]})`,
    );
    this.context.stdout.write(lines.join('\n') + '\n');
  }
}

class ConfigGetCommand extends Command {
  static paths = [[`config`, `get`]];
  static usage = Command.Usage({
    description: 'Get a single configuration value (effective).',
    details: 'Returns the effective value after merging sources. Optionally show its source.',
    examples: [
      ['Get model', 'git-scribe config get model'],
      ['Get model with source', 'git-scribe config get model --with-source'],
    ],
  });
  key = Option.String();
  withSource = Option.Boolean('--with-source', false, { description: 'Append source label' });
  async execute() {
    const key = this.key;
    if (!isConfigKey(key)) {
      this.context.stderr.write(`Unknown config key: ${key}\n`);
      return 1;
    }
    const { config } = await loadConfigDetailed();
    const value = JSON.stringify(config[key]);
    this.context.stdout.write(
      this.withSource ? `${value} (${config._sources[key]})\n` : `${value}\n`,
    );
  }
}

class ConfigSetCommand extends Command {
  static paths = [[`config`, `set`]];
  static usage = Command.Usage({
    description: 'Set and persist a global configuration key.',
    details: `Writes to the global config.json (XDG config). Allowed keys: ${CONFIG_KEYS.join(', ')}.`,
    examples: [
      ['Set default model', 'git-scribe config set model github-copilot/gpt-4.1'],
      ['Send file names only', 'git-scribe config set privacy high'],
      ['Keep ten recent commits per report', 'git-scribe config set recentCommits 10'],
    ],
  });
  key = Option.String();
  value = Option.String();
  async execute() {
    if (!isConfigKey(this.key)) {
      this.context.stderr.write(`Cannot set key: ${this.key}\n`);
      return 1;
    }
    let parsed: unknown = this.value;
    if (/^(true|false)$/i.test(this.value)) parsed = this.value.toLowerCase() === 'true';
    else if (/^[0-9]+$/.test(this.value)) parsed = parseInt(this.value, 10);
    const result = PartialConfigSchema.safeParse({ [this.key]: parsed });
    if (!result.success) {
      this.context.stderr.write(
        `Invalid value for ${this.key}: ${result.error.issues[0]?.message}\n`,
      );
      return 1;
    }
    const path = saveGlobalConfig(result.data);
    this.context.stdout.write(`Saved ${this.key} to ${path}\n`);
  }
}

class VersionCommand extends Command {
  static paths = [[`--version`], [`-V`]];
  async execute() {
    this.context.stdout.write(`${pkgVersion}\n`);
  }
}

const cli = new Cli({
  binaryLabel: 'git-scribe',
  binaryName: 'git-scribe',
  binaryVersion: pkgVersion,
});

cli.register(RootCommand);
cli.register(CommitCommand);
cli.register(AnalyzeCommand);
cli.register(ContributorsCommand);
cli.register(ConfigShowCommand);
cli.register(ConfigGetCommand);
cli.register(ConfigSetCommand);
cli.register(VersionCommand);

void cli.runExit(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
});
