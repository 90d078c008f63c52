import chalk, { type ChalkInstance } from 'chalk';

const HEADING_RE = /^(#{1,6})\s+(.*)$/;
const BULLET_RE = /^(\s*)[-*+]\s+(.*)$/;
const FENCE_RE = /^\s*```/;

const inline = (text: string, c: ChalkInstance) =>
  text
    .replace(/\*\*(.+?)\*\*/g, (_, s: string) => c.bold(s))
    .replace(/`([^`]+)`/g, (_, s: string) => c.cyan(s));

/**
 * Line-by-line Markdown for the terminal: headings, bullets, bold, inline
 * code and fenced blocks. Anything else passes through.
 */
export function renderMarkdown(text: string, c: ChalkInstance = chalk): string[] {
  const out: string[] = [];
  let inFence = false;
  for (const line of text.replace(/\r\n/g, '\n').split('\n')) {
    if (FENCE_RE.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      out.push('  ' + c.dim(line));
      continue;
    }
    const heading = line.match(HEADING_RE);
    if (heading) {
      const title = inline(heading[2], c);
      out.push(heading[1].length <= 2 ? c.hex('#9a4dff').bold(title) : c.bold(title));
      continue;
    }
    const bullet = line.match(BULLET_RE);
    if (bullet) {
      out.push(`${bullet[1]}• ${inline(bullet[2], c)}`);
      continue;
    }
    out.push(inline(line, c));
  }
  return out;
}
