import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { DuplicateMappingError, TaskwarriorError } from '../errors.js';
import type { Logger } from '../log.js';
import type { LocalTask, LocalTaskPayload, LocalTaskUpdate } from '../model.js';
import { isLocalPriority, toTaskDate } from '../task-fields.js';
import type { LocalTaskStore } from './provider.js';

/** Runs the `task` binary with `args`, feeding `input` on stdin; resolves with stdout. */
export type TaskRunner = (args: string[], input?: string) => Promise<string>;

export const FOREIGN_KEY_UDA = 'todoist_id';

export interface TaskwarriorStoreOptions {
  /** Path to the taskrc (`rc:` override). */
  taskrc: string;
  /** Inject a runner for tests */
  runner?: TaskRunner;
  logger?: Logger;
}

export function spawnTaskRunner(bin = 'task'): TaskRunner {
  return (args, input) =>
    new Promise((resolve, reject) => {
      const child = spawn(bin, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });
      child.on('error', reject);
      child.on('close', (code) => {
        if (code === 0) resolve(stdout);
        else reject(new TaskwarriorError(args, code, stderr));
      });
      child.stdin.end(input ?? '');
    });
}

// `task export` shape (subset). Unknown attributes are kept so updates re-import them untouched.
const ExportedTaskSchema = z
  .object({
    uuid: z.string(),
    status: z.string(),
    description: z.string(),
    project: z.string().optional(),
    tags: z.array(z.string()).optional(),
    priority: z.string().optional(),
    entry: z.string(),
    due: z.string().optional(),
    recur: z.string().optional(),
    [FOREIGN_KEY_UDA]: z.union([z.string(), z.number()]).transform(String).optional(),
  })
  .passthrough();

type ExportedTask = z.output<typeof ExportedTaskSchema>;

function toLocalTask(t: ExportedTask, todoistId: string): LocalTask {
  return {
    id: t.uuid,
    todoistId,
    // recurring templates and waiting tasks are still open
    status: t.status === 'completed' ? 'completed' : 'pending',
    description: t.description,
    project: t.project,
    tags: t.tags ?? [],
    priority: t.priority && isLocalPriority(t.priority) ? t.priority : undefined,
    entry: t.entry,
    due: t.due,
    recur: t.recur,
  };
}

/**
 * Taskwarrior through its CLI (`export` / `import` / `done`).
 *
 * The Todoist id lives in the `todoist_id` UDA, declared on every call so the
 * user's taskrc does not need to define it.
 */
export class TaskwarriorStore implements LocalTaskStore {
  private runner: TaskRunner;

  constructor(private opts: TaskwarriorStoreOptions) {
    this.runner = opts.runner ?? spawnTaskRunner();
  }

  private base(): string[] {
    return [
      `rc:${this.opts.taskrc}`,
      'rc.confirmation=off',
      'rc.verbose=nothing',
      'rc.json.array=on',
      `rc.uda.${FOREIGN_KEY_UDA}.type=string`,
      `rc.uda.${FOREIGN_KEY_UDA}.label=Todoist ID`,
    ];
  }

  private async run(args: string[], input?: string): Promise<string> {
    this.opts.logger?.debug('task', args);
    return this.runner([...this.base(), ...args], input);
  }

  private async export(filter: string[]): Promise<ExportedTask[]> {
    const out = (await this.run([...filter, 'export'])).trim();
    if (!out) return [];
    return z.array(ExportedTaskSchema).parse(JSON.parse(out));
  }

  private async import(task: Record<string, unknown>): Promise<void> {
    await this.run(['import', '-'], JSON.stringify([task]));
  }

  async findByForeignKey(todoistId: string): Promise<LocalTask | null> {
    // -CHILD: recurrence instances inherit the UDA from their template.
    const found = await this.export([`${FOREIGN_KEY_UDA}:${todoistId}`, 'status.not:deleted', '-CHILD']);
    const matches = found.filter((t) => t[FOREIGN_KEY_UDA] === todoistId);
    if (matches.length > 1) throw new DuplicateMappingError(todoistId, matches.map((t) => t.uuid));
    const [match] = matches;
    return match ? toLocalTask(match, todoistId) : null;
  }

  async create(payload: LocalTaskPayload): Promise<LocalTask> {
    const uuid = randomUUID();
    await this.import({
      uuid,
      // Taskwarrior keeps recurring tasks as a template with status "recurring".
      status: payload.recur ? 'recurring' : 'pending',
      description: payload.description,
      entry: payload.entry,
      project: payload.project,
      tags: payload.tags.length ? payload.tags : undefined,
      priority: payload.priority,
      due: payload.due,
      recur: payload.recur,
      [FOREIGN_KEY_UDA]: payload.todoistId,
    });
    return { ...payload, id: uuid, status: 'pending' };
  }

  private async exportOne(id: string): Promise<ExportedTask> {
    const [raw] = await this.export([id]);
    if (!raw) throw new Error(`Taskwarrior task ${id} disappeared`);
    return raw;
  }

  async update(existing: LocalTask, changes: LocalTaskUpdate): Promise<LocalTask> {
    const raw = await this.exportOne(existing.id);

    const next: Record<string, unknown> = { ...raw, description: changes.description };
    if (changes.project === undefined) delete next.project;
    else next.project = changes.project;
    // a recurring template cannot lose its due date
    if (changes.due !== undefined) next.due = changes.due;
    else if (!raw.recur) delete next.due;

    await this.import(next);
    return { ...existing, ...changes, due: changes.due ?? (raw.recur ? raw.due : undefined) };
  }

  /**
   * `done` only takes pending or waiting tasks, so a recurring template is
   * completed by re-importing it.
   */
  async close(id: string): Promise<void> {
    const raw = await this.exportOne(id);
    if (raw.status === 'recurring') {
      await this.import({ ...raw, status: 'completed', end: toTaskDate(new Date()) });
      return;
    }
    await this.run([id, 'done']);
  }
}
