export type TaskOutcome = 'created' | 'matched' | 'updated' | 'closed' | 'skipped';

export interface StartEvent {
  kind: 'start';
  total: number;
}

/** One per reconciled Todoist task. */
export interface TaskEvent {
  kind: 'task';
  outcome: TaskOutcome;
  /** 1-based position in the pass. */
  index: number;
  total: number;
  todoistId: string;
  content: string;
  localId?: string;
  /** Set on `created` when the task was closed right after creation. */
  completed?: boolean;
}

export interface RunSummary {
  kind: 'summary';
  total: number;
  /** Nothing matched the filter; no mutation happened. */
  empty: boolean;
  counts: Record<TaskOutcome, number>;
}

export interface RemoteCloseEvent {
  kind: 'remote-close';
  todoistId: string;
  content: string;
  localId: string;
}

export interface CloseSummary {
  kind: 'close-summary';
  total: number;
  closed: number;
}

export type SyncEvent = StartEvent | TaskEvent | RunSummary | RemoteCloseEvent | CloseSummary;

export type EventSink = (event: SyncEvent) => void;

export function emptyCounts(): Record<TaskOutcome, number> {
  return { created: 0, matched: 0, updated: 0, closed: 0, skipped: 0 };
}

/** Human-readable progress lines for one event. */
export function formatEvent(event: SyncEvent): string[] {
  switch (event.kind) {
    case 'start':
      return [`Starting migration of ${event.total} tasks...`];
    case 'task': {
      const ref = `(todoist_id=${event.todoistId})`;
      const head = `Task ${event.index} of ${event.total}: ${event.content}`;
      switch (event.outcome) {
        case 'created':
          return [head, event.completed ? `Created and closed task ${ref}` : `Created task ${ref}`];
        case 'matched':
          return [head, `Already exists ${ref}`];
        case 'updated':
          return [head, `Updated task ${ref}`];
        case 'closed':
          return [head, `Closed task ${ref}`];
        case 'skipped':
          return [head, `Skipped task ${ref}`];
      }
    }
    case 'summary': {
      if (event.empty) return ['No matching tasks found (are you using filters?)'];
      const c = event.counts;
      return [
        `Processed ${event.total} tasks: ${c.created} created, ${c.updated} updated, ${c.closed} closed, ${c.matched} unchanged, ${c.skipped} skipped`,
      ];
    }
    case 'remote-close':
      return [`Closed Todoist task (todoist_id=${event.todoistId})`];
    case 'close-summary':
      return [`Closed ${event.closed} of ${event.total} Todoist tasks`];
  }
}
