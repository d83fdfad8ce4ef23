import { AbortRequestedError, UnsupportedRecurrenceError } from '../errors.js';
import type { LocalTaskPayload } from '../model.js';
import type { Prompter } from '../prompt.js';
import { isLocalPriority, toRecur } from '../task-fields.js';

export type OverrideCommand =
  | { type: 'accept' }
  | { type: 'skip' }
  | { type: 'edit-description' }
  | { type: 'edit-tags' }
  | { type: 'edit-project' }
  | { type: 'edit-priority' }
  | { type: 'edit-recur' }
  | { type: 'abort' }
  | { type: 'help' };

export type OverrideResult = { action: 'accept'; payload: LocalTaskPayload } | { action: 'skip' };

/** Input that clears a field during an edit. Empty input keeps the current value. */
export const CLEAR = '-';

export const NO_DUE_FOR_RECUR = 'A recurring task needs a due date; this task has none';

export const COMMAND_PROMPT = 'Add task? [y,n,d,t,p,P,r,q,?] ';

export const HELP_LINES = [
  'y - add the task as shown',
  'n - skip this task',
  'd - edit description',
  't - edit tags',
  'p - edit project',
  'P - edit priority',
  'r - edit recurrence',
  'q - abort the whole run',
  '? - show this help',
  `(when editing: empty input keeps the value, '${CLEAR}' clears it)`,
];

export function parseCommand(input: string): OverrideCommand | undefined {
  switch (input.trim()) {
    case 'y':
      return { type: 'accept' };
    case 'n':
      return { type: 'skip' };
    case 'd':
      return { type: 'edit-description' };
    case 't':
      return { type: 'edit-tags' };
    case 'p':
      return { type: 'edit-project' };
    case 'P':
      return { type: 'edit-priority' };
    case 'r':
      return { type: 'edit-recur' };
    case 'q':
      return { type: 'abort' };
    case '?':
      return { type: 'help' };
    default:
      return undefined;
  }
}

const none = (v?: string) => (v ? v : '(none)');

export function describePayload(p: LocalTaskPayload): string[] {
  return [
    `  Description: ${p.description}`,
    `  Project:     ${none(p.project)}`,
    `  Tags:        ${p.tags.length ? p.tags.join(', ') : '(none)'}`,
    `  Priority:    ${none(p.priority)}`,
    `  Entry:       ${p.entry}`,
    `  Due:         ${none(p.due)}`,
    `  Recurrence:  ${none(p.recur)}`,
  ];
}

/**
 * Ask for a Todoist-style recurrence until it translates. Empty input means
 * no recurrence.
 */
export async function promptRecurrence(prompter: Prompter, question = 'Set recurrence (todoist style): '): Promise<string | undefined> {
  for (;;) {
    const answer = (await prompter.ask(question)).trim();
    if (!answer || answer === CLEAR) return undefined;
    try {
      return toRecur(answer);
    } catch (e) {
      if (!(e instanceof UnsupportedRecurrenceError)) throw e;
      prompter.say(`${e.message}. Please enter a valid value`);
    }
  }
}

async function askText(prompter: Prompter, label: string, current?: string): Promise<string | undefined> {
  const answer = (await prompter.ask(`${label} [${current ?? ''}]: `)).trim();
  if (!answer) return current;
  if (answer === CLEAR) return undefined;
  return answer;
}

async function askPriority(prompter: Prompter, current?: LocalTaskPayload['priority']) {
  for (;;) {
    const answer = (await prompter.ask(`Priority (H, M, L) [${current ?? ''}]: `)).trim().toUpperCase();
    if (!answer) return current;
    if (answer === CLEAR) return undefined;
    if (isLocalPriority(answer)) return answer;
    prompter.say(`Invalid priority '${answer}'`);
  }
}

/**
 * Present a creation payload and loop on operator commands until it is
 * accepted or skipped. `q` throws `AbortRequestedError`.
 */
export async function runOverrideLoop(payload: LocalTaskPayload, prompter: Prompter): Promise<OverrideResult> {
  let current: LocalTaskPayload = { ...payload, tags: [...payload.tags] };

  for (;;) {
    for (const line of describePayload(current)) prompter.say(line);

    const command: OverrideCommand = parseCommand(await prompter.ask(COMMAND_PROMPT)) ?? { type: 'help' };

    switch (command.type) {
      case 'accept':
        return { action: 'accept', payload: current };
      case 'skip':
        return { action: 'skip' };
      case 'abort':
        throw new AbortRequestedError();
      case 'help':
        for (const line of HELP_LINES) prompter.say(line);
        break;
      case 'edit-description':
        current = { ...current, description: (await askText(prompter, 'Description', current.description)) ?? current.description };
        break;
      case 'edit-tags': {
        const raw = await askText(prompter, 'Tags', current.tags.join(' '));
        current = { ...current, tags: raw ? raw.split(/[\s,]+/).filter(Boolean) : [] };
        break;
      }
      case 'edit-project':
        current = { ...current, project: await askText(prompter, 'Project', current.project) };
        break;
      case 'edit-priority':
        current = { ...current, priority: await askPriority(prompter, current.priority) };
        break;
      case 'edit-recur': {
        if (!current.due) {
          prompter.say(NO_DUE_FOR_RECUR);
          break;
        }
        const answer = (await prompter.ask(`Recurrence (todoist style) [${current.recur ?? ''}]: `)).trim();
        if (!answer) break;
        if (answer === CLEAR) {
          current = { ...current, recur: undefined };
          break;
        }
        try {
          current = { ...current, recur: toRecur(answer) };
        } catch (e) {
          if (!(e instanceof UnsupportedRecurrenceError)) throw e;
          prompter.say(`${e.message}. Please enter a valid value`);
          current = { ...current, recur: await promptRecurrence(prompter) };
        }
        break;
      }
    }
  }
}
