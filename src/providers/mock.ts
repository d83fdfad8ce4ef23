import { randomUUID } from 'node:crypto';
import { DuplicateMappingError } from '../errors.js';
import type {
  LocalTask,
  LocalTaskPayload,
  LocalTaskUpdate,
  RemoteLabel,
  RemoteProject,
  RemoteTask,
  TaskFilter,
} from '../model.js';
import type { LocalTaskStore, RemoteTaskSource } from './provider.js';

export type RemoteCall =
  | { op: 'close'; id: string }
  | { op: 'commitAndRefresh'; closed: string[] }
  | { op: 'refresh' };

/**
 * In-memory Todoist stand-in for tests.
 *
 * - `close` only queues; the task flips to checked on `commitAndRefresh`.
 * - Labels resolve by id, falling back to the raw value as the name.
 */
export class MockRemoteSource implements RemoteTaskSource {
  readonly calls: RemoteCall[] = [];
  private tasks: RemoteTask[];
  private projects = new Map<string, RemoteProject>();
  private labels = new Map<string, RemoteLabel>();
  private pending: string[] = [];

  constructor(opts?: { tasks?: RemoteTask[]; projects?: RemoteProject[]; labels?: RemoteLabel[] }) {
    this.tasks = [...(opts?.tasks ?? [])];
    for (const p of opts?.projects ?? []) this.projects.set(p.id, p);
    for (const l of opts?.labels ?? []) this.labels.set(l.id, l);
  }

  async fetch(filter: TaskFilter = {}): Promise<RemoteTask[]> {
    return this.tasks
      .filter((t) => filter.id === undefined || t.id === filter.id)
      .filter((t) => filter.projectId === undefined || t.projectId === filter.projectId)
      .map((t) => ({ ...t, labels: [...t.labels] }));
  }

  async resolveProject(id: string): Promise<RemoteProject | null> {
    return this.projects.get(id) ?? null;
  }

  async resolveLabel(id: string): Promise<RemoteLabel> {
    return this.labels.get(id) ?? { id, name: id };
  }

  async close(id: string): Promise<void> {
    this.calls.push({ op: 'close', id });
    this.pending.push(id);
  }

  async commitAndRefresh(): Promise<void> {
    const closed = this.pending;
    this.pending = [];
    this.tasks = this.tasks.map((t) => (closed.includes(t.id) ? { ...t, checked: true } : t));
    this.calls.push({ op: 'commitAndRefresh', closed });
  }

  async refresh(): Promise<void> {
    this.calls.push({ op: 'refresh' });
  }

  /** Test helper: replace a task as if it changed remotely. */
  put(task: RemoteTask): void {
    const idx = this.tasks.findIndex((t) => t.id === task.id);
    if (idx === -1) this.tasks.push(task);
    else this.tasks[idx] = task;
  }
}

export type LocalCall =
  | { op: 'create'; payload: LocalTaskPayload }
  | { op: 'update'; id: string; changes: LocalTaskUpdate }
  | { op: 'close'; id: string };

/** In-memory Taskwarrior stand-in. Records every mutation in `calls`. */
export class MockLocalStore implements LocalTaskStore {
  readonly calls: LocalCall[] = [];
  private tasks = new Map<string, LocalTask>();

  constructor(opts?: { tasks?: LocalTask[] }) {
    for (const t of opts?.tasks ?? []) this.tasks.set(t.id, t);
  }

  async findByForeignKey(todoistId: string): Promise<LocalTask | null> {
    const matches = this.all().filter((t) => t.todoistId === todoistId);
    if (matches.length > 1) throw new DuplicateMappingError(todoistId, matches.map((t) => t.id));
    return matches[0] ?? null;
  }

  async create(payload: LocalTaskPayload): Promise<LocalTask> {
    this.calls.push({ op: 'create', payload });
    const task: LocalTask = { ...payload, tags: [...payload.tags], id: randomUUID(), status: 'pending' };
    this.tasks.set(task.id, task);
    return { ...task };
  }

  async update(existing: LocalTask, changes: LocalTaskUpdate): Promise<LocalTask> {
    this.calls.push({ op: 'update', id: existing.id, changes });
    const current = this.tasks.get(existing.id);
    if (!current) throw new Error(`Unknown local task: ${existing.id}`);
    const next: LocalTask = { ...current, ...changes };
    this.tasks.set(next.id, next);
    return { ...next };
  }

  async close(id: string): Promise<void> {
    this.calls.push({ op: 'close', id });
    const current = this.tasks.get(id);
    if (!current) throw new Error(`Unknown local task: ${id}`);
    this.tasks.set(id, { ...current, status: 'completed' });
  }

  all(): LocalTask[] {
    return [...this.tasks.values()];
  }
}
