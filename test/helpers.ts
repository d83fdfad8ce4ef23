import type { LocalTask, RemoteTask } from '../src/model.js';
import type { Prompter } from '../src/prompt.js';

export function remoteTask(overrides: Partial<RemoteTask> & { id: string }): RemoteTask {
  return {
    content: `Task ${overrides.id}`,
    priority: 1,
    labels: [],
    addedAt: '2026-01-05T08:30:00Z',
    checked: false,
    ...overrides,
  };
}

export function localTask(overrides: Partial<LocalTask> & { id: string; todoistId: string }): LocalTask {
  return {
    description: `Local ${overrides.id}`,
    tags: [],
    entry: '20260105T083000Z',
    status: 'pending',
    ...overrides,
  };
}

/** Prompter that replays `answers` in order and records everything shown. */
export function scriptedPrompter(answers: string[]) {
  const queue = [...answers];
  const asked: string[] = [];
  const said: string[] = [];
  const prompter: Prompter = {
    ask: async (question) => {
      asked.push(question);
      const next = queue.shift();
      if (next === undefined) throw new Error(`No scripted answer for: ${question}`);
      return next;
    },
    say: (line) => {
      said.push(line);
    },
  };
  return { prompter, asked, said, remaining: queue };
}
