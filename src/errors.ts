export class UnsupportedRecurrenceError extends Error {
  constructor(public readonly raw: string) {
    super(`Unsupported recurrence: '${raw}'`);
    this.name = 'UnsupportedRecurrenceError';
  }
}

/** Two local tasks reference the same Todoist id. The store is corrupt; never auto-resolved. */
export class DuplicateMappingError extends Error {
  constructor(
    public readonly todoistId: string,
    public readonly localIds: string[],
  ) {
    super(`Multiple local tasks reference todoist_id=${todoistId}: ${localIds.join(', ')}`);
    this.name = 'DuplicateMappingError';
  }
}

export class AbortRequestedError extends Error {
  constructor() {
    super('Aborted by operator');
    this.name = 'AbortRequestedError';
  }
}

export class ProjectCycleError extends Error {
  constructor(public readonly projectIds: string[]) {
    super(`Cycle in project hierarchy: ${projectIds.join(' -> ')}`);
    this.name = 'ProjectCycleError';
  }
}

export class MappingConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MappingConfigError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class InvalidRemoteDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRemoteDataError';
  }
}

export interface TodoistCommandFailure {
  uuid: string;
  type: string;
  error: string;
}

export class TodoistCommandError extends Error {
  constructor(public readonly failures: TodoistCommandFailure[]) {
    super(`Todoist rejected ${failures.length} command(s): ${failures.map((f) => `${f.type} ${f.error}`).join('; ')}`);
    this.name = 'TodoistCommandError';
  }
}

export class TaskwarriorError extends Error {
  constructor(
    public readonly args: string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`task ${args.join(' ')} failed (exit ${exitCode ?? 'signal'}): ${stderr.trim()}`);
    this.name = 'TaskwarriorError';
  }
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof AbortRequestedError) return 3;
  if (err instanceof MappingConfigError || err instanceof ConfigError) return 2;
  return 1;
}
