import { cosmiconfig } from 'cosmiconfig';
import { resolve, dirname, join } from 'node:path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import { warn } from './log.js';

export const ConfigSchema = z.object({
  model: z.string().min(1),
  privacy: z.enum(['low', 'medium', 'high']),
  modelTimeoutMs: z.number().int().positive(),
  recentCommits: z.number().int().positive(),
  largestCommits: z.number().int().positive(),
  topFiles: z.number().int().positive(),
  verbose: z.boolean(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof AppConfig;
export type ConfigSource = 'default' | 'global' | 'project' | 'env' | 'override';

export const PartialConfigSchema = ConfigSchema.partial();
export const CONFIG_KEYS = ConfigSchema.keyof().options;

const DEFAULTS: AppConfig = {
  model: 'github-copilot/gpt-4.1',
  privacy: 'low',
  modelTimeoutMs: 120_000,
  recentCommits: 5,
  largestCommits: 5,
  topFiles: 10,
  verbose: false,
};

export const isConfigKey = (key: string): key is ConfigKey => CONFIG_KEYS.some((k) => k === key);

export function getGlobalConfigPath(): string {
  const base = process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return resolve(base, 'git-scribe', 'config.json');
}

function readGlobalConfig(filePath: string): Partial<AppConfig> {
  if (!existsSync(filePath)) return {};
  try {
    const parsed = PartialConfigSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf8')));
    if (parsed.success) return parsed.data;
    warn('config', `Ignoring invalid global config ${filePath}`);
  } catch (e) {
    warn('config', `Failed to parse global config ${filePath}, ignoring: ${errorMessage(e)}`);
  }
  return {};
}

export function saveGlobalConfig(partial: Partial<AppConfig>): string {
  const filePath = getGlobalConfigPath();
  const dir = dirname(filePath);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  const merged = { ...readGlobalConfig(filePath), ...partial };
  writeFileSync(filePath, JSON.stringify(merged, null, 2) + '\n', 'utf8');
  return filePath;
}

/** Reads `GIT_SCRIBE_*` variables. A malformed value throws. */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<AppConfig> {
  const raw: Record<string, unknown> = {};
  if (env.GIT_SCRIBE_MODEL) raw.model = env.GIT_SCRIBE_MODEL;
  if (env.GIT_SCRIBE_PRIVACY) raw.privacy = env.GIT_SCRIBE_PRIVACY;
  if (env.GIT_SCRIBE_MODEL_TIMEOUT_MS)
    raw.modelTimeoutMs = parseInt(env.GIT_SCRIBE_MODEL_TIMEOUT_MS, 10);
  if (env.GIT_SCRIBE_RECENT_COMMITS)
    raw.recentCommits = parseInt(env.GIT_SCRIBE_RECENT_COMMITS, 10);
  if (env.GIT_SCRIBE_LARGEST_COMMITS)
    raw.largestCommits = parseInt(env.GIT_SCRIBE_LARGEST_COMMITS, 10);
  if (env.GIT_SCRIBE_TOP_FILES) raw.topFiles = parseInt(env.GIT_SCRIBE_TOP_FILES, 10);
  if (env.GIT_SCRIBE_VERBOSE) raw.verbose = env.GIT_SCRIBE_VERBOSE === 'true';

  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid GIT_SCRIBE_* environment value for ${issue?.path.join('.')}: ${issue?.message}`,
    );
  }
  return parsed.data;
}

export interface AppConfigWithMeta extends AppConfig {
  _sources: Record<ConfigKey, ConfigSource>;
}

export async function loadConfig(
  cwd = process.cwd(),
  overrides: Partial<AppConfig> = {},
): Promise<AppConfig> {
  return (await loadConfigDetailed(cwd, overrides)).config;
}

export async function loadConfigDetailed(
  cwd = process.cwd(),
  overrides: Partial<AppConfig> = {},
): Promise<{
  config: AppConfigWithMeta;
  raw: {
    defaults: AppConfig;
    global: Partial<AppConfig>;
    project: Partial<AppConfig>;
    env: Partial<AppConfig>;
  };
}> {
  const globalCfg = readGlobalConfig(getGlobalConfigPath());

  const explorer = cosmiconfig('gitscribe');
  const result = await explorer.search(cwd);
  let projectCfg: Partial<AppConfig> = {};
  if (result && !result.isEmpty) {
    const parsed = PartialConfigSchema.safeParse(result.config);
    if (!parsed.success) {
      throw new Error(`Invalid configuration in ${result.filepath}: ${parsed.error.message}`);
    }
    projectCfg = parsed.data;
  }

  const envCfg = readEnvConfig();

  const merged: AppConfig = {
    ...DEFAULTS,
    ...globalCfg,
    ...projectCfg,
    ...envCfg,
    ...overrides,
  };

  const sourceOf = (k: ConfigKey): ConfigSource => {
    if (k in overrides) return 'override';
    if (k in envCfg) return 'env';
    if (k in projectCfg) return 'project';
    if (k in globalCfg) return 'global';
    return 'default';
  };
  const sources: Record<ConfigKey, ConfigSource> = {
    model: sourceOf('model'),
    privacy: sourceOf('privacy'),
    modelTimeoutMs: sourceOf('modelTimeoutMs'),
    recentCommits: sourceOf('recentCommits'),
    largestCommits: sourceOf('largestCommits'),
    topFiles: sourceOf('topFiles'),
    verbose: sourceOf('verbose'),
  };

  return {
    config: { ...merged, _sources: sources },
    raw: { defaults: DEFAULTS, global: globalCfg, project: projectCfg, env: envCfg },
  };
}
