import chalk from 'chalk';

const PREFIX = '[git-scribe]';

export const isDebug = (): boolean => process.env.GIT_SCRIBE_DEBUG === 'true';

export function debug(scope: string, ...args: unknown[]) {
  if (!isDebug()) return;
  console.error(chalk.dim(`${PREFIX}[${scope}]`), ...args);
}

export function warn(scope: string, message: string) {
  console.error(chalk.yellow(`${PREFIX}[${scope}] ${message}`));
}
