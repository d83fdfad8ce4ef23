import { z } from 'zod';

// Todoist ids became strings in Sync API v9; older caches hold numbers.
const Id = z.union([z.string(), z.number()]).transform(String);

const Flag = z.union([z.boolean(), z.number()]).transform((v) => v === true || v === 1);

export const TodoistDueSchema = z.object({
  date: z.string(),
  string: z.string().default(''),
  is_recurring: z.boolean().default(false),
});

export const TodoistItemSchema = z.object({
  id: Id,
  content: z.string(),
  project_id: Id.nullish(),
  priority: z.number().int().default(1),
  /** v9 carries label names; older payloads carry label ids. */
  labels: z.array(Id).default([]),
  added_at: z.string().nullish(),
  date_added: z.string().nullish(),
  due: TodoistDueSchema.nullish(),
  checked: Flag.default(false),
  is_deleted: Flag.default(false),
});

export const TodoistProjectSchema = z.object({
  id: Id,
  name: z.string(),
  parent_id: Id.nullish(),
  is_deleted: Flag.default(false),
});

export const TodoistLabelSchema = z.object({
  id: Id,
  name: z.string(),
  is_deleted: Flag.default(false),
});

export const SyncStatusSchema = z.union([
  z.literal('ok'),
  z.object({ error_code: z.number().optional(), error: z.string() }),
]);

export const SyncResponseSchema = z.object({
  sync_token: z.string(),
  full_sync: z.boolean().default(false),
  items: z.array(TodoistItemSchema).optional(),
  projects: z.array(TodoistProjectSchema).optional(),
  labels: z.array(TodoistLabelSchema).optional(),
  sync_status: z.record(SyncStatusSchema).optional(),
});

export type TodoistItem = z.output<typeof TodoistItemSchema>;
export type SyncResponse = z.output<typeof SyncResponseSchema>;
