import chalk from 'chalk';

export interface PanelOptions {
  title?: string;
  lines?: string[]; // pre-rendered lines without borders
  width?: number;
  columns?: number; // terminal width, defaults to stdout
}

// minimal ansi stripper for width calc
export const stripAnsi = (str: string) => str.replace(/\u001B\[[0-9;]*m/g, '');

const visibleLength = (s: string) => Array.from(stripAnsi(s)).length;

const truncate = (s: string, max: number) => {
  const plain = Array.from(stripAnsi(s));
  return plain.length > max ? plain.slice(0, Math.max(0, max - 1)).join('') + '…' : s;
};

export function buildPanel(opts: PanelOptions): string {
  const termWidth = opts.columns || process.stdout.columns || 80;
  const contentLines = opts.lines || [];
  const maxContent = Math.max(
    opts.title ? visibleLength(opts.title) : 0,
    ...contentLines.map(visibleLength),
  );
  const innerWidth = Math.min(opts.width || maxContent, termWidth - 4); // 2 border chars + 2 padding
  const pad = (s: string) => {
    const fitted = truncate(s, innerWidth);
    return fitted + ' '.repeat(Math.max(0, innerWidth - visibleLength(fitted)));
  };
  const title = opts.title ? chalk.bold(truncate(opts.title, innerWidth)) : '';
  const top = '┌ ' + pad(title) + ' ┐';
  const body = contentLines.map((l) => '│ ' + pad(l) + ' │');
  const bottom = '└' + '─'.repeat(innerWidth + 2) + '┘';
  return [top, ...body, bottom].join('\n');
}
