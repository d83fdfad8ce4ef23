import { mkdir, readFile, writeFile, rename, copyFile, stat, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../log.js';
import {
  TodoistItemSchema,
  TodoistLabelSchema,
  TodoistProjectSchema,
} from '../providers/todoist-schemas.js';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.todoist-sync');

/** Sync token meaning "no state yet, send everything". */
export const FULL_SYNC_TOKEN = '*';

const CacheStateSchema = z.object({
  /** Cache schema version. */
  version: z.literal(1),
  syncToken: z.string(),
  syncedAt: z.string().optional(),
  items: z.array(TodoistItemSchema),
  projects: z.array(TodoistProjectSchema),
  labels: z.array(TodoistLabelSchema),
});

export type CacheState = z.output<typeof CacheStateSchema>;

function emptyState(): CacheState {
  return { version: 1, syncToken: FULL_SYNC_TOKEN, items: [], projects: [], labels: [] };
}

/**
 * On-disk copy of the Todoist resources this tool reads, so `migrate --no-sync`
 * works offline.
 */
export class CacheStore {
  constructor(
    private dir = DEFAULT_CACHE_DIR,
    private logger?: Logger,
  ) {}

  getDir() {
    return this.dir;
  }

  statePath() {
    return path.join(this.dir, 'state.json');
  }

  /** Missing, unreadable or outdated caches load as empty, forcing a full sync. */
  async load(): Promise<CacheState> {
    let raw: string;
    try {
      raw = await readFile(this.statePath(), 'utf8');
    } catch {
      return emptyState();
    }

    try {
      const parsed = CacheStateSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      this.logger?.warn('discarding incompatible cache', parsed.error.issues[0]?.message);
    } catch (e) {
      this.logger?.warn('discarding unreadable cache', e instanceof Error ? e.message : String(e));
    }
    return emptyState();
  }

  private async backupStateFile(): Promise<void> {
    try {
      await stat(this.statePath());
    } catch {
      return;
    }
    await copyFile(this.statePath(), this.statePath() + '.bak');
  }

  async save(state: CacheState): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await this.backupStateFile();
    const tmp = this.statePath() + '.tmp';
    await writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf8');
    await rename(tmp, this.statePath());
  }

  /** Remove the cache directory. Returns false when there was nothing to remove. */
  async clean(): Promise<boolean> {
    try {
      await stat(this.dir);
    } catch {
      return false;
    }
    await rm(this.dir, { recursive: true, force: true });
    return true;
  }
}
