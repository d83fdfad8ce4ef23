#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { doctorReport, readEnv, resolvePaths } from './config.js';
import { loadEnvFiles } from './env.js';
import { ConfigError, exitCodeFor } from './errors.js';
import { createLogger } from './log.js';
import { MappingTable, parseMappingArg } from './mapping.js';
import type { TaskFilter } from './model.js';
import { confirm, createTerminalPrompter, type ClosablePrompter } from './prompt.js';
import { TaskwarriorStore, spawnTaskRunner } from './providers/taskwarrior.js';
import { TodoistSource } from './providers/todoist.js';
import { SyncEngine } from './sync/engine.js';
import { formatEvent, type SyncEvent } from './sync/report.js';
import { CacheStore } from './store/cacheStore.js';
import { acquireLock } from './store/lock.js';

loadEnvFiles();

interface GlobalOpts {
  todoistApiKey?: string;
  taskrc?: string;
  cacheDir?: string;
  debug?: boolean;
}

interface MappingOpts {
  mapProject: string[];
  mapTag: string[];
  interactive?: boolean;
}

const program = new Command();

program
  .name('todoist-taskwarrior')
  .description('Migrate tasks from Todoist into Taskwarrior and keep completion in sync')
  .version('0.1.0')
  .option('--todoist-api-key <key>', 'Todoist API token (default: TODOIST_API_KEY)')
  .option('--taskrc <path>', 'Taskwarrior config file (default: TASKRC or ~/.taskrc)')
  .option('--cache-dir <dir>', 'Todoist cache dir (default: TODOIST_SYNC_CACHE_DIR or ~/.todoist-sync)')
  .option('--debug', 'Enable debug logging');

function collectMapping(value: string, previous: string[]): string[] {
  try {
    parseMappingArg(value);
  } catch (e) {
    throw new InvalidArgumentError(e instanceof Error ? e.message : String(e));
  }
  return [...previous, value];
}

function printEvent(event: SyncEvent) {
  for (const line of formatEvent(event)) console.log(line);
}

function setup() {
  const g = program.opts<GlobalOpts>();
  const env = readEnv();
  const logger = createLogger(g.debug ? 'debug' : env.TODOIST_SYNC_LOG_LEVEL ?? 'info');
  const paths = resolvePaths(env, { taskrc: g.taskrc, cacheDir: g.cacheDir });
  const cache = new CacheStore(paths.cacheDir, logger.child('cache'));

  const source = new TodoistSource({
    apiToken: g.todoistApiKey ?? env.TODOIST_API_KEY,
    cache,
    logger: logger.child('todoist'),
  });
  const store = new TaskwarriorStore({
    taskrc: paths.taskrc,
    runner: spawnTaskRunner(paths.taskBin),
    logger: logger.child('taskwarrior'),
  });

  return { logger, paths, cache, source, store };
}

/** A terminal prompter when stdin is a TTY. `--interactive` without one is a config error. */
function openPrompter(interactive?: boolean): ClosablePrompter | undefined {
  if (process.stdin.isTTY) return createTerminalPrompter();
  if (interactive) throw new ConfigError('--interactive needs a terminal on stdin');
  return undefined;
}

async function withEngine<T>(interactive: boolean | undefined, fn: (engine: SyncEngine) => Promise<T>): Promise<T> {
  const { logger, paths, source, store } = setup();
  const prompter = openPrompter(interactive);
  const engine = new SyncEngine({
    source,
    store,
    prompter,
    onEvent: printEvent,
    logger,
    lock: () => acquireLock(paths.cacheDir),
  });
  try {
    return await fn(engine);
  } finally {
    prompter?.close();
  }
}

function mappingTables(opts: MappingOpts) {
  return {
    mapProject: MappingTable.parse(opts.mapProject),
    mapTag: MappingTable.parse(opts.mapTag),
  };
}

program
  .command('synchronize')
  .description('Update the local Todoist task cache (lets `migrate --no-sync` run offline)')
  .action(async () => {
    await withEngine(false, async (engine) => {
      console.log('Syncing tasks with todoist...');
      await engine.refresh();
      console.log('Done.');
    });
  });

program
  .command('clean')
  .description('Remove the local Todoist task cache')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (opts: { yes?: boolean }) => {
    const { cache } = setup();
    const dir = cache.getDir();

    if (!opts.yes) {
      if (!process.stdin.isTTY) throw new ConfigError('clean needs --yes when stdin is not a terminal');
      const prompter = createTerminalPrompter();
      try {
        if (!(await confirm(prompter, `Are you sure you want to delete ${dir}?`))) {
          console.log('Aborted.');
          return;
        }
      } finally {
        prompter.close();
      }
    }

    const removed = await cache.clean();
    console.log(removed ? `Removed ${dir}` : `Nothing to remove at ${dir}`);
  });

program
  .command('migrate')
  .description('Migrate tasks from Todoist to Taskwarrior (safe to re-run: tasks are matched by todoist_id)')
  .option('--no-sync', 'Use the cached Todoist data without syncing first')
  .option('-p, --map-project <SRC=DST>', 'Rename project path SRC to DST; "SRC=" removes the project', collectMapping, [])
  .option('-t, --map-tag <SRC=DST>', 'Rename tag SRC to DST; "SRC=" removes the tag', collectMapping, [])
  .option('--filter-task-id <id>', 'Only migrate the task with this Todoist id')
  .option('--filter-proj-id <id>', 'Only migrate tasks in the project with this Todoist id')
  .option('-i, --interactive', 'Review and edit every new task before it is added')
  .action(async (opts: MappingOpts & { sync: boolean; filterTaskId?: string; filterProjId?: string }) => {
    const filter: TaskFilter = {
      ...(opts.filterTaskId ? { id: opts.filterTaskId } : {}),
      ...(opts.filterProjId ? { projectId: opts.filterProjId } : {}),
    };
    const tables = mappingTables(opts);

    await withEngine(opts.interactive, (engine) =>
      engine.migrate({ refresh: opts.sync, filter, interactive: opts.interactive, ...tables }),
    );
  });

program
  .command('sync')
  .description('Two-way sync: close Todoist tasks completed in Taskwarrior, then migrate')
  .option('--no-sync', 'Use the cached Todoist data without syncing first')
  .option('--no-taskw', 'Do not migrate Todoist changes into Taskwarrior')
  .option('--no-todoist', 'Do not close Todoist tasks completed in Taskwarrior')
  .option('-p, --map-project <SRC=DST>', 'Rename project path SRC to DST; "SRC=" removes the project', collectMapping, [])
  .option('-t, --map-tag <SRC=DST>', 'Rename tag SRC to DST; "SRC=" removes the tag', collectMapping, [])
  .option('-i, --interactive', 'Review and edit every new task before it is added')
  .action(async (opts: MappingOpts & { sync: boolean; taskw: boolean; todoist: boolean }) => {
    const tables = mappingTables(opts);

    await withEngine(opts.interactive, (engine) =>
      engine.sync({
        refresh: opts.sync,
        pushClosures: opts.todoist,
        pullTasks: opts.taskw,
        interactive: opts.interactive,
        ...tables,
      }),
    );
  });

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const g = program.opts<GlobalOpts>();
    const report = doctorReport(readEnv(), { taskrc: g.taskrc, cacheDir: g.cacheDir });
    console.log('todoist-taskwarrior doctor');
    console.log('paths:', report.paths);
    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = exitCodeFor(err);
});
