import { describe, expect, it } from 'vitest';
import { AbortRequestedError, DuplicateMappingError, UnsupportedRecurrenceError } from '../src/errors.js';
import type { LocalTask, RemoteTask } from '../src/model.js';
import type { Prompter } from '../src/prompt.js';
import { MockLocalStore, MockRemoteSource } from '../src/providers/mock.js';
import { FieldMapper } from '../src/sync/mapper.js';
import { Reconciler } from '../src/sync/reconciler.js';
import type { SyncEvent } from '../src/sync/report.js';
import { localTask, remoteTask, scriptedPrompter } from './helpers.js';

function setup(opts: { tasks?: RemoteTask[]; local?: LocalTask[]; interactive?: boolean; prompter?: Prompter } = {}) {
  const source = new MockRemoteSource({
    tasks: opts.tasks,
    projects: [
      { id: 'p1', name: 'Work' },
      { id: 'p2', name: 'Errands', parentId: 'p1' },
    ],
    labels: [{ id: 'l1', name: 'urgent' }],
  });
  const store = new MockLocalStore({ tasks: opts.local });
  const events: SyncEvent[] = [];
  const reconciler = new Reconciler(store, new FieldMapper(source), {
    interactive: opts.interactive,
    prompter: opts.prompter,
    onEvent: (e) => events.push(e),
  });
  return { source, store, events, reconciler };
}

describe('Reconciler', () => {
  it('creates unmapped pending tasks', async () => {
    const task = remoteTask({ id: '1', content: 'Buy milk', projectId: 'p2', labels: ['l1'], priority: 3 });
    const { store, reconciler } = setup();

    const summary = await reconciler.run([task]);

    expect(summary.counts.created).toBe(1);
    expect(store.calls).toEqual([
      {
        op: 'create',
        payload: {
          todoistId: '1',
          description: 'Buy milk',
          project: 'Work.Errands',
          tags: ['urgent'],
          priority: 'M',
          entry: '20260105T083000Z',
          due: undefined,
          recur: undefined,
        },
      },
    ]);
    expect(store.all()[0]?.status).toBe('pending');
  });

  it('creates then immediately closes tasks already completed remotely', async () => {
    const { store, events, reconciler } = setup();

    await reconciler.run([remoteTask({ id: '1', checked: true })]);

    expect(store.calls.map((c) => c.op)).toEqual(['create', 'close']);
    const created = store.all()[0];
    expect(created?.status).toBe('completed');
    expect(store.calls[1]).toEqual({ op: 'close', id: created?.id });
    expect(events[1]).toMatchObject({ kind: 'task', outcome: 'created', completed: true });
  });

  it('is idempotent: a second pass over the same tasks mutates nothing', async () => {
    const tasks = [
      remoteTask({ id: '1', projectId: 'p2', due: { string: 'Feb 10', date: '2026-02-10T09:00:00Z', isRecurring: false } }),
      remoteTask({ id: '2', checked: true }),
    ];
    const { store, events, reconciler } = setup();

    await reconciler.run(tasks);
    const mutations = store.calls.length;
    events.length = 0;
    const second = await reconciler.run(tasks);

    expect(store.calls.length).toBe(mutations);
    expect(store.all()).toHaveLength(2);
    expect(second.counts).toEqual({ created: 0, matched: 2, updated: 0, closed: 0, skipped: 0 });
  });

  it('closes a pending task completed remotely without updating it', async () => {
    const local = localTask({ id: 'L1', todoistId: '1', description: 'Old' });
    const { store, reconciler } = setup({ local: [local] });

    await reconciler.run([remoteTask({ id: '1', content: 'New', checked: true })]);

    expect(store.calls).toEqual([{ op: 'close', id: 'L1' }]);
    expect(store.all()[0]).toMatchObject({ description: 'Old', status: 'completed' });
  });

  it('updates only description, due and project of pending tasks', async () => {
    const local = localTask({ id: 'L1', todoistId: '1', description: 'Old', tags: ['old'], priority: 'L' });
    const { store, reconciler } = setup({ local: [local] });

    await reconciler.run([remoteTask({ id: '1', content: 'New', labels: ['l1'], priority: 4, projectId: 'p1' })]);

    expect(store.calls).toEqual([
      { op: 'update', id: 'L1', changes: { description: 'New', due: undefined, project: 'Work' } },
    ]);
    expect(store.all()[0]).toMatchObject({ description: 'New', project: 'Work', tags: ['old'], priority: 'L' });
  });

  it('keeps the due date of a recurring task when the remote drops it', async () => {
    const local = localTask({ id: 'L1', todoistId: '1', description: 'Task 1', due: '20260110T080000Z', recur: 'weekly' });
    const { store, events, reconciler } = setup({ local: [local] });

    await reconciler.run([remoteTask({ id: '1' })]);

    expect(store.calls).toEqual([]);
    expect(events[1]).toMatchObject({ outcome: 'matched', localId: 'L1' });
  });

  it('leaves locally completed tasks alone whatever the remote state', async () => {
    const local = localTask({ id: 'L1', todoistId: '1', status: 'completed' });
    const { store, events, reconciler } = setup({ local: [local] });

    await reconciler.run([remoteTask({ id: '1', content: 'Changed' })]);

    expect(store.calls).toEqual([]);
    expect(events[1]).toMatchObject({ outcome: 'matched', localId: 'L1' });
  });

  it('reports an empty pass without mutations', async () => {
    const { store, events, reconciler } = setup();

    const summary = await reconciler.run([]);

    expect(summary).toEqual({
      kind: 'summary',
      total: 0,
      empty: true,
      counts: { created: 0, matched: 0, updated: 0, closed: 0, skipped: 0 },
    });
    expect(events).toEqual([summary]);
    expect(store.calls).toEqual([]);
  });

  it('stops on duplicate mappings', async () => {
    const local = [localTask({ id: 'L1', todoistId: '1' }), localTask({ id: 'L2', todoistId: '1' })];
    const { store, reconciler } = setup({ local });

    await expect(reconciler.run([remoteTask({ id: '1' })])).rejects.toBeInstanceOf(DuplicateMappingError);
    expect(store.calls).toEqual([]);
  });

  it('fails on unsupported recurrence without an operator', async () => {
    const due = { string: 'every mon, fri', date: '2026-02-09', isRecurring: true };
    const { store, reconciler } = setup();

    await expect(reconciler.run([remoteTask({ id: '1', due })])).rejects.toBeInstanceOf(UnsupportedRecurrenceError);
    expect(store.calls).toEqual([]);
  });

  it('asks the operator for a replacement recurrence', async () => {
    const due = { string: 'every mon, fri', date: '2026-02-09T08:00:00Z', isRecurring: true };
    const script = scriptedPrompter(['every day']);
    const { store, reconciler } = setup({ prompter: script.prompter });

    await reconciler.run([remoteTask({ id: '1', due })]);

    expect(script.said).toEqual(["Unsupported recurrence: 'every mon, fri'. Please enter a valid value"]);
    expect(script.asked).toEqual(['Set recurrence (todoist style): ']);
    expect(store.all()[0]).toMatchObject({ recur: 'daily', due: '20260209T080000Z' });
  });

  it('skips tasks the operator declines', async () => {
    const script = scriptedPrompter(['n']);
    const { store, events, reconciler } = setup({ interactive: true, prompter: script.prompter });

    const summary = await reconciler.run([remoteTask({ id: '1' })]);

    expect(store.calls).toEqual([]);
    expect(summary.counts.skipped).toBe(1);
    expect(events[1]).toMatchObject({ outcome: 'skipped', todoistId: '1' });
  });

  it('creates the edited payload', async () => {
    const script = scriptedPrompter(['d', 'Renamed', 'y']);
    const { store, reconciler } = setup({ interactive: true, prompter: script.prompter });

    await reconciler.run([remoteTask({ id: '1', content: 'Original' })]);

    expect(store.all()[0]?.description).toBe('Renamed');
  });

  it('does not prompt for tasks created already completed', async () => {
    const script = scriptedPrompter([]);
    const { store, reconciler } = setup({ interactive: true, prompter: script.prompter });

    await reconciler.run([remoteTask({ id: '1', checked: true })]);

    expect(script.asked).toEqual([]);
    expect(store.all()[0]?.status).toBe('completed');
  });

  it('keeps earlier work when the operator aborts', async () => {
    const script = scriptedPrompter(['y', 'q']);
    const { store, reconciler } = setup({ interactive: true, prompter: script.prompter });

    await expect(reconciler.run([remoteTask({ id: '1' }), remoteTask({ id: '2' })])).rejects.toBeInstanceOf(
      AbortRequestedError,
    );
    expect(store.all().map((t) => t.todoistId)).toEqual(['1']);
  });

  it('requires a prompter in interactive mode', () => {
    const source = new MockRemoteSource();
    expect(() => new Reconciler(new MockLocalStore(), new FieldMapper(source), { interactive: true })).toThrow(
      'Interactive mode requires a prompter',
    );
  });

  it('emits progress events in order', async () => {
    const { events, reconciler } = setup({ local: [localTask({ id: 'L1', todoistId: '2', description: 'Task 2' })] });

    await reconciler.run([remoteTask({ id: '1' }), remoteTask({ id: '2' })]);

    expect(events.map((e) => (e.kind === 'task' ? `${e.kind}:${e.outcome}:${e.index}/${e.total}` : e.kind))).toEqual([
      'start',
      'task:created:1/2',
      'task:matched:2/2',
      'summary',
    ]);
  });
});
