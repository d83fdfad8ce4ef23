import type { Logger } from '../log.js';
import type { RemoteTask } from '../model.js';
import type { LocalTaskStore, RemoteTaskSource } from '../providers/provider.js';
import type { CloseSummary, EventSink } from './report.js';

export interface PropagateOptions {
  onEvent?: EventSink;
  logger?: Logger;
}

/**
 * Reverse direction: close Todoist tasks whose Taskwarrior counterpart is
 * completed. Closes are queued and committed in a single batch at the end.
 * Local tasks are never touched.
 */
export async function propagateCompletions(
  tasks: RemoteTask[],
  source: RemoteTaskSource,
  store: LocalTaskStore,
  opts: PropagateOptions = {},
): Promise<CloseSummary> {
  let closed = 0;

  for (const task of tasks) {
    if (task.checked) continue;
    const local = await store.findByForeignKey(task.id);
    if (local?.status !== 'completed') continue;

    opts.logger?.debug('queue remote close', { todoistId: task.id, localId: local.id });
    await source.close(task.id);
    closed++;
    opts.onEvent?.({ kind: 'remote-close', todoistId: task.id, content: task.content, localId: local.id });
  }

  await source.commitAndRefresh();

  const summary: CloseSummary = { kind: 'close-summary', total: tasks.length, closed };
  opts.onEvent?.(summary);
  return summary;
}
