import type { Logger } from '../log.js';
import type { MappingTable } from '../mapping.js';
import type { TaskFilter } from '../model.js';
import type { Prompter } from '../prompt.js';
import type { LocalTaskStore, RemoteTaskSource } from '../providers/provider.js';
import type { LockHandle } from '../store/lock.js';
import { FieldMapper } from './mapper.js';
import { propagateCompletions } from './propagator.js';
import { Reconciler } from './reconciler.js';
import type { CloseSummary, EventSink, RunSummary } from './report.js';

export interface EngineDeps {
  source: RemoteTaskSource;
  store: LocalTaskStore;
  /** Operator channel, when a terminal is attached. */
  prompter?: Prompter;
  onEvent?: EventSink;
  logger?: Logger;
  /** Held for the duration of each run. */
  lock?: () => Promise<LockHandle>;
}

export interface MigrateOptions {
  /** Refresh the remote cache first. Default: true. */
  refresh?: boolean;
  filter?: TaskFilter;
  mapProject?: MappingTable;
  mapTag?: MappingTable;
  interactive?: boolean;
}

export interface SyncOptions extends Omit<MigrateOptions, 'filter'> {
  /** Close remote tasks completed locally. Default: true. */
  pushClosures?: boolean;
  /** Run the forward migration. Default: true. */
  pullTasks?: boolean;
}

export interface SyncResult {
  closures?: CloseSummary;
  migration?: RunSummary;
}

export class SyncEngine {
  constructor(private readonly deps: EngineDeps) {}

  /** Refresh the remote cache only. */
  async refresh(): Promise<void> {
    await this.withLock(() => this.deps.source.refresh());
  }

  /** Forward migration of (optionally filtered) remote tasks. */
  async migrate(opts: MigrateOptions = {}): Promise<RunSummary> {
    return this.withLock(() => this.runMigrate(opts));
  }

  /**
   * Two-way sync: push local completions to the remote first, then migrate.
   * The cache is refreshed at most once up front; the closure commit
   * refreshes it again before the migration reads it.
   */
  async sync(opts: SyncOptions = {}): Promise<SyncResult> {
    return this.withLock(async () => {
      const { source, store } = this.deps;
      const result: SyncResult = {};

      if (opts.refresh ?? true) await source.refresh();

      if (opts.pushClosures ?? true) {
        const tasks = await source.fetch();
        result.closures = await propagateCompletions(tasks, source, store, {
          onEvent: this.deps.onEvent,
          logger: this.deps.logger?.child('close-remote'),
        });
      }

      if (opts.pullTasks ?? true) {
        result.migration = await this.runMigrate({ ...opts, refresh: false });
      }

      return result;
    });
  }

  private async runMigrate(opts: MigrateOptions): Promise<RunSummary> {
    const { source, store, logger } = this.deps;

    if (opts.refresh ?? true) await source.refresh();

    const tasks = await source.fetch(opts.filter ?? {});
    logger?.debug('migrate', { tasks: tasks.length, filter: opts.filter ?? {} });

    const mapper = new FieldMapper(source, {
      mapProject: opts.mapProject,
      mapTag: opts.mapTag,
      logger: logger?.child('mapper'),
    });
    const reconciler = new Reconciler(store, mapper, {
      interactive: opts.interactive,
      prompter: this.deps.prompter,
      onEvent: this.deps.onEvent,
      logger: logger?.child('reconcile'),
    });
    return reconciler.run(tasks);
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const lock = await this.deps.lock?.();
    try {
      return await fn();
    } finally {
      await lock?.release();
    }
  }
}
