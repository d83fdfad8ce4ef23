import { ProjectCycleError } from '../errors.js';
import type { Logger } from '../log.js';
import { MappingTable } from '../mapping.js';
import type { LocalTaskPayload, LocalTaskUpdate, RemoteTask } from '../model.js';
import type { RemoteTaskSource } from '../providers/provider.js';
import { toLocalDate, toLocalDue, toLocalPriority, toLocalRecur } from '../task-fields.js';

export const PROJECT_SEPARATOR = '.';

export interface FieldMapperOptions {
  mapProject?: MappingTable;
  mapTag?: MappingTable;
  logger?: Logger;
}

export interface PayloadOverrides {
  /** Use this recurrence instead of parsing the due string (`undefined` clears it). */
  recur: string | undefined;
}

/**
 * Translates one Todoist task into the Taskwarrior schema.
 *
 * No writes; the only lookups are project ancestry and label names through
 * the remote source.
 */
export class FieldMapper {
  private readonly mapProject: MappingTable;
  private readonly mapTag: MappingTable;

  constructor(
    private readonly source: RemoteTaskSource,
    private readonly opts: FieldMapperOptions = {},
  ) {
    this.mapProject = opts.mapProject ?? MappingTable.empty();
    this.mapTag = opts.mapTag ?? MappingTable.empty();
  }

  /** Root-first dot-joined project path, after the project mapping table. */
  async projectPath(projectId?: string): Promise<string | undefined> {
    if (!projectId) return undefined;

    const names: string[] = [];
    const visited: string[] = [];
    let nextId: string | undefined = projectId;

    while (nextId) {
      if (visited.includes(nextId)) throw new ProjectCycleError([...visited, nextId]);
      visited.push(nextId);

      const project = await this.source.resolveProject(nextId);
      if (!project) break;
      names.unshift(project.name);
      nextId = project.parentId;
    }

    if (!names.length) return undefined;
    const joined = names.join(PROJECT_SEPARATOR);
    this.opts.logger?.debug('project hierarchy', { projectId, path: joined });
    return this.mapProject.apply(joined);
  }

  /** Label names in source order after the tag mapping table; removed tags are dropped. */
  async tags(labels: readonly string[]): Promise<string[]> {
    const out: string[] = [];
    for (const id of labels) {
      const label = await this.source.resolveLabel(id);
      const mapped = this.mapTag.apply(label.name);
      if (mapped) out.push(mapped);
    }
    return out;
  }

  /**
   * Full creation payload. Throws `UnsupportedRecurrenceError` when the due
   * string repeats in a way Taskwarrior cannot express, unless `overrides`
   * supplies the recurrence.
   */
  async toPayload(task: RemoteTask, overrides?: PayloadOverrides): Promise<LocalTaskPayload> {
    const recur = overrides ? overrides.recur : toLocalRecur(task.due);
    return {
      todoistId: task.id,
      description: task.content,
      project: await this.projectPath(task.projectId),
      tags: await this.tags(task.labels),
      priority: toLocalPriority(task.priority),
      entry: toLocalDate(task.addedAt),
      due: toLocalDue(task.due),
      recur,
    };
  }

  /** The fields re-applied to an existing pending task. Never parses recurrence. */
  async toUpdate(task: RemoteTask): Promise<LocalTaskUpdate> {
    return {
      description: task.content,
      due: toLocalDue(task.due),
      project: await this.projectPath(task.projectId),
    };
  }
}
