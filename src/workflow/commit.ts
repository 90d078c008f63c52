import chalk from 'chalk';
import { COMMIT_TYPES, parseDraft, withType } from '../draft.js';
import { NoChangesError } from '../errors.js';
import type { CommitDraft, CommitOutcome } from '../types.js';
import type { FlowContext } from './context.js';
import { formatDuration } from './util.js';

export type RefineState =
  | { kind: 'drafting' }
  | { kind: 'presenting'; draft: CommitDraft }
  | { kind: 'typeSelection'; draft: CommitDraft }
  | { kind: 'confirmEdited'; draft: CommitDraft }
  | { kind: 'committed'; message: string }
  | { kind: 'cancelled' };

export type RefineEvent =
  | { kind: 'drafted'; draft: CommitDraft }
  | { kind: 'regenerate' }
  | { kind: 'editType' }
  | { kind: 'typePicked'; type: string }
  | { kind: 'confirm' }
  | { kind: 'startOver' }
  | { kind: 'cancel' };

const invalid = (state: RefineState, event: RefineEvent): never => {
  throw new Error(`Invalid transition: "${event.kind}" while ${state.kind}`);
};

/** Pure transition function; every state lists the events it accepts. */
export function transition(state: RefineState, event: RefineEvent): RefineState {
  switch (state.kind) {
    case 'drafting':
      if (event.kind === 'drafted') return { kind: 'presenting', draft: event.draft };
      return invalid(state, event);
    case 'presenting':
      switch (event.kind) {
        case 'regenerate':
          return { kind: 'drafting' };
        case 'editType':
          return { kind: 'typeSelection', draft: state.draft };
        case 'confirm':
          return { kind: 'committed', message: state.draft.message };
        case 'cancel':
          return { kind: 'cancelled' };
        default:
          return invalid(state, event);
      }
    case 'typeSelection':
      if (event.kind === 'typePicked') {
        return { kind: 'confirmEdited', draft: withType(state.draft, event.type) };
      }
      return invalid(state, event);
    case 'confirmEdited':
      switch (event.kind) {
        case 'confirm':
          return { kind: 'committed', message: state.draft.message };
        case 'startOver':
          return { kind: 'drafting' };
        case 'cancel':
          return { kind: 'cancelled' };
        default:
          return invalid(state, event);
      }
    case 'committed':
    case 'cancelled':
      return invalid(state, event);
  }
}

type MenuEvent = Extract<
  RefineEvent,
  { kind: 'regenerate' | 'editType' | 'confirm' | 'startOver' | 'cancel' }
>;

interface MenuChoice {
  label: string;
  event: MenuEvent;
}

export const ACTION_MENU: readonly MenuChoice[] = [
  { label: '✨ Regenerate message', event: { kind: 'regenerate' } },
  { label: '📝 Edit commit type', event: { kind: 'editType' } },
  { label: '✅ Stage and commit', event: { kind: 'confirm' } },
  { label: '❌ Cancel', event: { kind: 'cancel' } },
];
export const ACTION_DEFAULT = 2;

export const CONFIRM_MENU: readonly MenuChoice[] = [
  { label: '✅ Confirm and commit', event: { kind: 'confirm' } },
  { label: '🔄 Start over', event: { kind: 'startOver' } },
  { label: '❌ Cancel', event: { kind: 'cancel' } },
];

export const TYPE_MENU = COMMIT_TYPES.map((t) => `${t.type}: ${t.label}`);

async function chooseFrom<T>(
  ctx: FlowContext,
  message: string,
  labels: readonly string[],
  items: readonly T[],
  defaultIndex: number,
): Promise<T> {
  const index = await ctx.term.select(message, labels, defaultIndex);
  const item = items[index];
  if (item === undefined) throw new Error(`Selection out of range: ${index}`);
  return item;
}

const chooseEvent = (
  ctx: FlowContext,
  message: string,
  menu: readonly MenuChoice[],
  defaultIndex: number,
) =>
  chooseFrom(
    ctx,
    message,
    menu.map((c) => c.label),
    menu.map((c) => c.event),
    defaultIndex,
  );

function showMessage(ctx: FlowContext, title: string, message: string) {
  ctx.term.section(title);
  message.split('\n').forEach((l) => ctx.term.line(l ? chalk.white(l) : undefined));
  ctx.term.line();
}

/**
 * Generate → present → regenerate | edit type | commit | cancel.
 * The commit is made once, only from the `committed` state.
 */
export async function runCommitFlow(ctx: FlowContext): Promise<CommitOutcome> {
  const startedAt = Date.now();
  let diff: string;
  try {
    diff = await ctx.repo.getDiff();
  } catch (e) {
    if (!(e instanceof NoChangesError)) throw e;
    ctx.term.section('📝 Repository Status');
    ctx.term.line('No changes to commit. Your working directory is clean.');
    ctx.term.close('Nothing to do.');
    return { status: 'clean' };
  }

  let state: RefineState = { kind: 'drafting' };
  for (;;) {
    switch (state.kind) {
      case 'drafting': {
        const text = await ctx.term.step('Generating commit message', () =>
          ctx.backend.generateCommitMessage(diff),
        );
        const draft = parseDraft(text);
        showMessage(ctx, '📝 Generated Commit Message', draft.message);
        state = transition(state, { kind: 'drafted', draft });
        break;
      }
      case 'presenting': {
        const event = await chooseEvent(
          ctx,
          'What would you like to do?',
          ACTION_MENU,
          ACTION_DEFAULT,
        );
        state = transition(state, event);
        break;
      }
      case 'typeSelection': {
        const picked = await chooseFrom(ctx, 'Select commit type', TYPE_MENU, COMMIT_TYPES, 0);
        state = transition(state, { kind: 'typePicked', type: picked.type });
        if (state.kind === 'confirmEdited') {
          showMessage(ctx, '📝 New Commit Message', state.draft.message);
        }
        break;
      }
      case 'confirmEdited': {
        const event = await chooseEvent(
          ctx,
          'Would you like to proceed with this commit message?',
          CONFIRM_MENU,
          0,
        );
        state = transition(state, event);
        break;
      }
      case 'committed': {
        const message = state.message;
        await ctx.term.step('Committing changes', () => ctx.repo.stageAndCommit(message));
        ctx.term.line('Changes committed successfully!');
        ctx.term.close(`✨ commit created in ${formatDuration(startedAt)}.`);
        return { status: 'committed', message };
      }
      case 'cancelled':
        ctx.term.close('🙅 No commit created.');
        return { status: 'cancelled' };
    }
  }
}
