import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { errorMessage } from '../errors.js';
import { renderMarkdown } from './markdown.js';
import { buildPanel } from './panel.js';
import { prompt } from './util.js';

/** Everything a flow needs from the terminal. Calls block until the user answers. */
export interface Terminal {
  section(title: string): void;
  subsection(title: string): void;
  line(text?: string): void;
  markdown(text: string): void;
  panel(title: string, lines: string[]): void;
  select(message: string, options: readonly string[], defaultIndex?: number): Promise<number>;
  /** Shows a spinner while `fn` runs and clears it afterwards. */
  step<T>(label: string, fn: () => Promise<T>): Promise<T>;
  pause(message: string): Promise<void>;
  clear(): void;
  /** Closing line of a flow. */
  close(message: string): void;
}

const PALETTE = [
  '#3a0d6d',
  '#5a1ea3',
  '#7a32d6',
  '#9a4dff',
  '#b267ff',
  '#c37dff',
  '#b267ff',
  '#9a4dff',
  '#7a32d6',
  '#5a1ea3',
];

const animationDisabled = () => !process.stdout.isTTY || !!process.env.GIT_SCRIBE_NO_ANIMATION;

export async function animateHeaderBase(text = 'git-scribe', model?: string) {
  const suffix = model ? chalk.dim(` (model ${model})`) : '';
  if (animationDisabled()) {
    console.log('\n┌ ' + chalk.bold(text) + suffix);
    return;
  }
  process.stdout.write('\n');
  for (const color of PALETTE) {
    process.stdout.write('\r┌ ' + chalk.bold.hex(color)(text));
    await new Promise((r) => setTimeout(r, 60));
  }
  process.stdout.write(suffix + '\n');
}

export function borderLine(content?: string) {
  if (!content) console.log('│');
  else console.log('│ ' + content);
}

export function sectionTitle(label: string) {
  console.log('⊙ ' + chalk.bold(label));
}

async function runWithSpinner<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const spinner = ora({ text: chalk.bold(label), spinner: 'dots' }).start();
  let interval: NodeJS.Timeout | null = null;
  if (!animationDisabled()) {
    let i = 0;
    interval = setInterval(() => {
      spinner.text = chalk.bold.hex(PALETTE[i])(label);
      i = (i + 1) % PALETTE.length;
    }, 80);
  }
  const stopAnim = () => {
    if (interval) clearInterval(interval);
    interval = null;
  };
  try {
    const result = await fn();
    stopAnim();
    spinner.stop();
    return result;
  } catch (e) {
    stopAnim();
    spinner.fail(`${label} failed: ${errorMessage(e)}`);
    throw e;
  }
}

export function createTerminal(): Terminal {
  return {
    section(title) {
      borderLine();
      sectionTitle(title);
    },
    subsection(title) {
      borderLine();
      borderLine(chalk.hex('#9a4dff').bold(title));
    },
    line(text) {
      borderLine(text);
    },
    markdown(text) {
      renderMarkdown(text).forEach((l) => borderLine(l));
    },
    panel(title, lines) {
      console.log(buildPanel({ title, lines }));
    },
    async select(message, options, defaultIndex = 0) {
      const { index } = await inquirer.prompt<{ index: number }>([
        {
          type: 'list',
          name: 'index',
          message,
          choices: options.map((name, value) => ({ name, value })),
          default: defaultIndex,
          pageSize: Math.min(Math.max(options.length, 7), 15),
        },
      ]);
      return index;
    },
    step(label, fn) {
      return runWithSpinner(label, fn);
    },
    async pause(message) {
      await prompt(chalk.dim(message));
    },
    clear() {
      if (process.stdout.isTTY) process.stdout.write('\x1B[2J\x1B[1;1H');
    },
    close(message) {
      console.log('└ ' + message);
      console.log();
    },
  };
}
