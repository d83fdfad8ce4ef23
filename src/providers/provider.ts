import type {
  LocalTask,
  LocalTaskPayload,
  LocalTaskUpdate,
  RemoteLabel,
  RemoteProject,
  RemoteTask,
  TaskFilter,
} from '../model.js';

/** Read side of the cloud to-do service plus the completion write-back. */
export interface RemoteTaskSource {
  /** Tasks from the local cache matching every given filter key. */
  fetch(filter?: TaskFilter): Promise<RemoteTask[]>;

  resolveProject(id: string): Promise<RemoteProject | null>;

  resolveLabel(id: string): Promise<RemoteLabel>;

  /** Queue a close. Nothing is sent until `commitAndRefresh`. */
  close(id: string): Promise<void>;

  /** Send queued commands and refresh the cache in one round trip. */
  commitAndRefresh(): Promise<void>;

  /** Refresh the cache without sending commands. */
  refresh(): Promise<void>;
}

/** The task manager side. Assumed to be exclusively ours for a run. */
export interface LocalTaskStore {
  /** Throws `DuplicateMappingError` if more than one task carries `todoistId`. */
  findByForeignKey(todoistId: string): Promise<LocalTask | null>;

  create(payload: LocalTaskPayload): Promise<LocalTask>;

  /** `undefined` values in `changes` unset the attribute. */
  update(existing: LocalTask, changes: LocalTaskUpdate): Promise<LocalTask>;

  close(id: string): Promise<void>;
}
