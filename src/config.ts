import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CACHE_DIR } from './store/cacheStore.js';

const str = z.string().min(1);

export const EnvSchema = z.object({
  TODOIST_API_KEY: str.optional(),
  TASKRC: str.optional(),
  TASK_BIN: str.optional(),

  // behavior
  TODOIST_SYNC_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
  TODOIST_SYNC_CACHE_DIR: str.optional(),
  TODOIST_SYNC_HTTP_RPS: z.coerce.number().positive().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

/** Expand a leading `~` the way a shell would. */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export interface ResolvedPaths {
  taskrc: string;
  cacheDir: string;
  taskBin: string;
}

export function resolvePaths(env: EnvConfig, overrides: { taskrc?: string; cacheDir?: string } = {}): ResolvedPaths {
  return {
    taskrc: expandHome(overrides.taskrc ?? env.TASKRC ?? '~/.taskrc'),
    cacheDir: expandHome(overrides.cacheDir ?? env.TODOIST_SYNC_CACHE_DIR ?? DEFAULT_CACHE_DIR),
    taskBin: env.TASK_BIN ?? 'task',
  };
}

export function doctorReport(
  env = readEnv(),
  overrides: { taskrc?: string; cacheDir?: string } = {},
  exists: (p: string) => boolean = existsSync,
) {
  const paths = resolvePaths(env, overrides);
  const missing: string[] = [];
  const notes: string[] = [];

  if (!env.TODOIST_API_KEY) missing.push('TODOIST_API_KEY');
  if (!exists(paths.taskrc)) {
    notes.push(`taskrc not found at ${paths.taskrc} (set TASKRC or pass --taskrc).`);
  }
  if (!exists(paths.cacheDir)) {
    notes.push(`No Todoist cache at ${paths.cacheDir} yet; run: todoist-taskwarrior synchronize`);
  }
  notes.push(`Taskwarrior binary: ${paths.taskBin} (override with TASK_BIN).`);

  return {
    paths,
    missing,
    notes,
  };
}
