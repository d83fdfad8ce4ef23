import { UnsupportedRecurrenceError } from '../errors.js';
import type { Logger } from '../log.js';
import type { LocalTask, LocalTaskPayload, LocalTaskUpdate, RemoteTask } from '../model.js';
import type { Prompter } from '../prompt.js';
import type { LocalTaskStore } from '../providers/provider.js';
import { promptRecurrence, runOverrideLoop } from './interactive.js';
import type { FieldMapper } from './mapper.js';
import { emptyCounts, type EventSink, type RunSummary, type TaskEvent, type TaskOutcome } from './report.js';

export interface ReconcilerOptions {
  /** Route every create of a pending task through the override loop. Requires `prompter`. */
  interactive?: boolean;
  /** Operator channel; also used to recover unsupported recurrences. */
  prompter?: Prompter;
  onEvent?: EventSink;
  logger?: Logger;
}

function sameUpdate(existing: LocalTask, next: LocalTaskUpdate) {
  return existing.description === next.description && existing.due === next.due && existing.project === next.project;
}

/**
 * Forward migration: decides create / update / close / no-op for each Todoist
 * task against its Taskwarrior counterpart (found by `todoist_id`).
 *
 * Tasks are processed strictly one after another. There is no rollback: work
 * done before an abort or error stays committed.
 */
export class Reconciler {
  constructor(
    private readonly store: LocalTaskStore,
    private readonly mapper: FieldMapper,
    private readonly opts: ReconcilerOptions = {},
  ) {
    if (opts.interactive && !opts.prompter) throw new Error('Interactive mode requires a prompter');
  }

  async run(tasks: RemoteTask[]): Promise<RunSummary> {
    const counts = emptyCounts();
    const total = tasks.length;

    if (!total) {
      const summary: RunSummary = { kind: 'summary', total: 0, empty: true, counts };
      this.opts.onEvent?.(summary);
      return summary;
    }

    this.opts.onEvent?.({ kind: 'start', total });

    for (const [i, task] of tasks.entries()) {
      this.opts.logger?.debug('reconcile', { todoistId: task.id, checked: task.checked });
      const event = await this.reconcile(task, i + 1, total);
      counts[event.outcome]++;
      this.opts.onEvent?.(event);
    }

    const summary: RunSummary = { kind: 'summary', total, empty: false, counts };
    this.opts.onEvent?.(summary);
    return summary;
  }

  private async reconcile(task: RemoteTask, index: number, total: number): Promise<TaskEvent> {
    const event = (outcome: TaskOutcome, localId?: string, completed?: boolean): TaskEvent => ({
      kind: 'task',
      outcome,
      index,
      total,
      todoistId: task.id,
      content: task.content,
      localId,
      ...(completed ? { completed } : {}),
    });

    const existing = await this.store.findByForeignKey(task.id);

    if (!existing) {
      if (task.checked) {
        // close needs the id from create
        const created = await this.store.create(await this.payloadFor(task));
        await this.store.close(created.id);
        return event('created', created.id, true);
      }

      let payload = await this.payloadFor(task);
      if (this.opts.interactive && this.opts.prompter) {
        const result = await runOverrideLoop(payload, this.opts.prompter);
        if (result.action === 'skip') return event('skipped');
        payload = result.payload;
      }
      const created = await this.store.create(payload);
      return event('created', created.id);
    }

    // Completed locally is terminal for this pass, whatever the remote state.
    if (existing.status === 'completed') return event('matched', existing.id);

    if (task.checked) {
      await this.store.close(existing.id);
      return event('closed', existing.id);
    }

    const update = await this.mapper.toUpdate(task);
    // a recurring task keeps its due date
    const changes = existing.recur && update.due === undefined ? { ...update, due: existing.due } : update;
    if (sameUpdate(existing, changes)) return event('matched', existing.id);
    await this.store.update(existing, changes);
    return event('updated', existing.id);
  }

  /** Creation payload, recovering an unsupported recurrence through the prompter when there is one. */
  private async payloadFor(task: RemoteTask): Promise<LocalTaskPayload> {
    try {
      return await this.mapper.toPayload(task);
    } catch (e) {
      if (!(e instanceof UnsupportedRecurrenceError) || !this.opts.prompter) throw e;
      this.opts.prompter.say(`${e.message}. Please enter a valid value`);
      const recur = await promptRecurrence(this.opts.prompter);
      return this.mapper.toPayload(task, { recur });
    }
  }
}
