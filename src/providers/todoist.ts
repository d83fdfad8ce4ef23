import { randomUUID } from 'node:crypto';
import { ConfigError, InvalidRemoteDataError, TodoistCommandError, type TodoistCommandFailure } from '../errors.js';
import { requestJson, type FetchLike } from '../http.js';
import type { Logger } from '../log.js';
import type { RemoteLabel, RemoteProject, RemoteTask, TaskFilter } from '../model.js';
import type { CacheState, CacheStore } from '../store/cacheStore.js';
import type { RemoteTaskSource } from './provider.js';
import { SyncResponseSchema, type SyncResponse, type TodoistItem } from './todoist-schemas.js';

export const TODOIST_SYNC_URL = 'https://api.todoist.com/sync/v9/sync';

const RESOURCE_TYPES = ['items', 'projects', 'labels'] as const;

export interface TodoistSourceOptions {
  /** Only needed for `refresh` / `commitAndRefresh`; cached reads work without it. */
  apiToken?: string;
  cache: CacheStore;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  logger?: Logger;
  /** Override for tests / proxies. */
  syncUrl?: string;
}

interface QueuedCommand {
  type: 'item_close';
  uuid: string;
  args: { id: string };
}

function toRemoteTask(item: TodoistItem): RemoteTask {
  const addedAt = item.added_at ?? item.date_added;
  if (!addedAt) throw new InvalidRemoteDataError(`Todoist item ${item.id} has no creation date`);
  return {
    id: item.id,
    content: item.content,
    projectId: item.project_id ?? undefined,
    priority: item.priority,
    labels: item.labels,
    addedAt,
    due: item.due
      ? {
          string: item.due.string,
          date: item.due.date,
          isRecurring: item.due.is_recurring,
        }
      : undefined,
    checked: item.checked,
  };
}

/** Merge an incremental resource list into the cached one by id; `is_deleted` drops the entry. */
function mergeById<T extends { id: string; is_deleted: boolean }>(current: T[], incoming: T[] | undefined, fullSync: boolean): T[] {
  if (!incoming) return fullSync ? [] : current;
  const byId = new Map((fullSync ? [] : current).map((r) => [r.id, r] as const));
  for (const r of incoming) {
    if (r.is_deleted) byId.delete(r.id);
    else byId.set(r.id, r);
  }
  return [...byId.values()];
}

/**
 * Todoist via the Sync API, read through an on-disk cache.
 *
 * Reads (`fetch`, `resolve*`) never touch the network. `refresh` and
 * `commitAndRefresh` do one incremental sync each; closes are queued and
 * sent with the next commit.
 */
export class TodoistSource implements RemoteTaskSource {
  private fetcher: FetchLike;
  private state?: CacheState;
  private queue: QueuedCommand[] = [];

  constructor(private opts: TodoistSourceOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  private async cached(): Promise<CacheState> {
    if (!this.state) this.state = await this.opts.cache.load();
    return this.state;
  }

  async fetch(filter: TaskFilter = {}): Promise<RemoteTask[]> {
    const state = await this.cached();
    return state.items
      .filter((i) => filter.id === undefined || i.id === filter.id)
      .filter((i) => filter.projectId === undefined || i.project_id === filter.projectId)
      .map(toRemoteTask);
  }

  async resolveProject(id: string): Promise<RemoteProject | null> {
    const state = await this.cached();
    const p = state.projects.find((x) => x.id === id);
    if (!p) return null;
    return { id: p.id, name: p.name, parentId: p.parent_id ?? undefined };
  }

  async resolveLabel(id: string): Promise<RemoteLabel> {
    const state = await this.cached();
    const label = state.labels.find((l) => l.id === id) ?? state.labels.find((l) => l.name === id);
    // Shared labels are not listed in the labels resource; the item carries the name.
    return label ? { id: label.id, name: label.name } : { id, name: id };
  }

  async close(id: string): Promise<void> {
    const state = await this.cached();
    this.queue.push({ type: 'item_close', uuid: randomUUID(), args: { id } });
    state.items = state.items.map((i) => (i.id === id ? { ...i, checked: true } : i));
  }

  async commitAndRefresh(): Promise<void> {
    const commands = this.queue;
    this.queue = [];
    const res = await this.sync(commands);

    const failures: TodoistCommandFailure[] = [];
    for (const cmd of commands) {
      const status = res.sync_status?.[cmd.uuid];
      if (status === undefined || status === 'ok') continue;
      failures.push({ uuid: cmd.uuid, type: cmd.type, error: status.error });
    }
    if (failures.length) throw new TodoistCommandError(failures);
  }

  async refresh(): Promise<void> {
    await this.sync([]);
  }

  private async sync(commands: QueuedCommand[]): Promise<SyncResponse> {
    const { apiToken } = this.opts;
    if (!apiToken) throw new ConfigError('Missing Todoist API key: set TODOIST_API_KEY or pass --todoist-api-key');
    const state = await this.cached();

    const form: Record<string, string> = {
      sync_token: state.syncToken,
      resource_types: JSON.stringify(RESOURCE_TYPES),
    };
    if (commands.length) form.commands = JSON.stringify(commands);

    this.opts.logger?.debug('sync', { syncToken: state.syncToken, commands: commands.length });
    const raw = await requestJson(
      this.opts.syncUrl ?? TODOIST_SYNC_URL,
      { method: 'POST', headers: { authorization: `Bearer ${apiToken}` }, form },
      this.fetcher,
    );

    const parsed = SyncResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidRemoteDataError(`Unexpected Todoist sync response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    const res = parsed.data;

    this.state = {
      version: 1,
      syncToken: res.sync_token,
      syncedAt: new Date().toISOString(),
      items: mergeById(state.items, res.items, res.full_sync),
      projects: mergeById(state.projects, res.projects, res.full_sync),
      labels: mergeById(state.labels, res.labels, res.full_sync),
    };
    await this.opts.cache.save(this.state);

    this.opts.logger?.debug('sync done', {
      fullSync: res.full_sync,
      items: this.state.items.length,
      projects: this.state.projects.length,
      labels: this.state.labels.length,
    });
    return res;
  }
}
