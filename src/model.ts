/** Todoist due specification (subset of the Sync API `due` object). */
export interface RemoteDue {
  /** Human-readable due string as typed in Todoist, e.g. "every 2 weeks". */
  string: string;
  /** `YYYY-MM-DD`, floating `YYYY-MM-DDTHH:MM:SS`, or a UTC date-time. */
  date: string;
  isRecurring: boolean;
}

export interface RemoteTask {
  /** Todoist item id (opaque). */
  id: string;
  content: string;
  projectId?: string;
  /** Todoist priority, 1 (natural) to 4 (urgent). */
  priority: number;
  /** Label references in source order. */
  labels: string[];
  /** Creation timestamp (ISO). */
  addedAt: string;
  due?: RemoteDue;
  checked: boolean;
}

export interface RemoteProject {
  id: string;
  name: string;
  parentId?: string;
}

export interface RemoteLabel {
  id: string;
  name: string;
}

export interface TaskFilter {
  id?: string;
  projectId?: string;
}

export type LocalPriority = 'H' | 'M' | 'L';

export type LocalStatus = 'pending' | 'completed';

/** Fields written when a Taskwarrior task is created. Dates use `YYYYMMDDTHHMMSSZ`. */
export interface LocalTaskPayload {
  /** Foreign key: the Todoist id this task was migrated from. */
  todoistId: string;
  description: string;
  project?: string;
  tags: string[];
  priority?: LocalPriority;
  entry: string;
  due?: string;
  recur?: string;
}

/** The subset re-applied to a pending task on later runs. */
export type LocalTaskUpdate = Pick<LocalTaskPayload, 'description' | 'due' | 'project'>;

export interface LocalTask extends LocalTaskPayload {
  /** Taskwarrior uuid. */
  id: string;
  status: LocalStatus;
}
