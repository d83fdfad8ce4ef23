import { describe, expect, it } from 'vitest';
import { DuplicateMappingError } from '../src/errors.js';
import { TaskwarriorStore, type TaskRunner } from '../src/providers/taskwarrior.js';

const BASE = [
  'rc:/tmp/test.taskrc',
  'rc.confirmation=off',
  'rc.verbose=nothing',
  'rc.json.array=on',
  'rc.uda.todoist_id.type=string',
  'rc.uda.todoist_id.label=Todoist ID',
];

function fakeRunner(exportOutput = '') {
  const calls: { args: string[]; input?: string }[] = [];
  const runner: TaskRunner = async (args, input) => {
    calls.push({ args, input });
    return args.includes('export') ? exportOutput : '';
  };
  return { runner, calls };
}

function storeWith(exportOutput?: string) {
  const fake = fakeRunner(exportOutput);
  return { ...fake, store: new TaskwarriorStore({ taskrc: '/tmp/test.taskrc', runner: fake.runner }) };
}

describe('TaskwarriorStore', () => {
  it('finds a task by exact todoist_id', async () => {
    const { store, calls } = storeWith(
      JSON.stringify([
        {
          uuid: 'u1',
          status: 'recurring',
          description: 'Water plants',
          entry: '20260105T083000Z',
          priority: 'H',
          tags: ['home'],
          recur: 'weekly',
          todoist_id: '12',
        },
        { uuid: 'u2', status: 'pending', description: 'Other', entry: '20260105T083000Z', todoist_id: '123' },
      ]),
    );

    expect(await store.findByForeignKey('12')).toEqual({
      id: 'u1',
      todoistId: '12',
      status: 'pending',
      description: 'Water plants',
      tags: ['home'],
      priority: 'H',
      entry: '20260105T083000Z',
      recur: 'weekly',
    });
    expect(calls).toEqual([
      { args: [...BASE, 'todoist_id:12', 'status.not:deleted', '-CHILD', 'export'], input: undefined },
    ]);
  });

  it('returns null when nothing matches', async () => {
    expect(await storeWith('').store.findByForeignKey('1')).toBeNull();
    expect(await storeWith('[]\n').store.findByForeignKey('1')).toBeNull();
  });

  it('rejects duplicate mappings', async () => {
    const { store } = storeWith(
      JSON.stringify([
        { uuid: 'u1', status: 'pending', description: 'A', entry: '20260105T083000Z', todoist_id: '7' },
        { uuid: 'u2', status: 'completed', description: 'B', entry: '20260105T083000Z', todoist_id: 7 },
      ]),
    );

    const err = await store.findByForeignKey('7').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DuplicateMappingError);
    expect(err instanceof DuplicateMappingError && err.localIds).toEqual(['u1', 'u2']);
  });

  it('imports new tasks with the foreign key', async () => {
    const { store, calls } = storeWith();

    const created = await store.create({
      todoistId: '5',
      description: 'Pay rent',
      project: 'Home',
      tags: [],
      priority: 'M',
      entry: '20260105T083000Z',
      due: '20260201T000000Z',
      recur: 'monthly',
    });

    expect(created.status).toBe('pending');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.args).toEqual([...BASE, 'import', '-']);
    const imported: unknown = JSON.parse(calls[0]?.input ?? 'null');
    expect(imported).toEqual([
      {
        uuid: created.id,
        status: 'recurring',
        description: 'Pay rent',
        entry: '20260105T083000Z',
        project: 'Home',
        priority: 'M',
        due: '20260201T000000Z',
        recur: 'monthly',
        todoist_id: '5',
      },
    ]);
  });

  it('imports plain tasks as pending with their tags', async () => {
    const { store, calls } = storeWith();

    await store.create({ todoistId: '6', description: 'Call mom', tags: ['family'], entry: '20260105T083000Z' });

    expect(JSON.parse(calls[0]?.input ?? 'null')).toEqual([
      {
        uuid: expect.any(String),
        status: 'pending',
        description: 'Call mom',
        entry: '20260105T083000Z',
        tags: ['family'],
        todoist_id: '6',
      },
    ]);
  });

  it('updates by re-importing the exported task', async () => {
    const exported = {
      uuid: 'u1',
      status: 'pending',
      description: 'Old',
      entry: '20260105T083000Z',
      project: 'Work',
      due: '20260101T000000Z',
      annotations: [{ entry: '20260106T000000Z', description: 'note' }],
      urgency: 3.2,
      todoist_id: '5',
    };
    const { store, calls } = storeWith(JSON.stringify([exported]));
    const existing = {
      id: 'u1',
      todoistId: '5',
      status: 'pending' as const,
      description: 'Old',
      project: 'Work',
      due: '20260101T000000Z',
      tags: [],
      entry: '20260105T083000Z',
    };

    const updated = await store.update(existing, { description: 'New', due: undefined, project: 'Home' });

    expect(calls.map((c) => c.args)).toEqual([
      [...BASE, 'u1', 'export'],
      [...BASE, 'import', '-'],
    ]);
    expect(JSON.parse(calls[1]?.input ?? 'null')).toEqual([
      {
        uuid: 'u1',
        status: 'pending',
        description: 'New',
        entry: '20260105T083000Z',
        project: 'Home',
        annotations: [{ entry: '20260106T000000Z', description: 'note' }],
        urgency: 3.2,
        todoist_id: '5',
      },
    ]);
    expect(updated).toMatchObject({ description: 'New', project: 'Home', due: undefined });
  });

  it('marks pending tasks done', async () => {
    const { store, calls } = storeWith(
      JSON.stringify([{ uuid: 'u1', status: 'pending', description: 'A', entry: '20260105T083000Z', todoist_id: '5' }]),
    );

    await store.close('u1');

    expect(calls.map((c) => c.args)).toEqual([
      [...BASE, 'u1', 'export'],
      [...BASE, 'u1', 'done'],
    ]);
  });

  it('completes a recurring template by re-importing it', async () => {
    const template = {
      uuid: 'u1',
      status: 'recurring',
      description: 'Water plants',
      entry: '20260105T083000Z',
      due: '20260110T080000Z',
      recur: 'weekly',
      todoist_id: '5',
    };
    const { store, calls } = storeWith(JSON.stringify([template]));

    await store.close('u1');

    expect(calls.map((c) => c.args)).toEqual([
      [...BASE, 'u1', 'export'],
      [...BASE, 'import', '-'],
    ]);
    expect(JSON.parse(calls[1]?.input ?? 'null')).toEqual([
      { ...template, status: 'completed', end: expect.stringMatching(/^\d{8}T\d{6}Z$/) },
    ]);
  });

  it('keeps the due date of a recurring template', async () => {
    const template = {
      uuid: 'u1',
      status: 'recurring',
      description: 'Water plants',
      entry: '20260105T083000Z',
      due: '20260110T080000Z',
      recur: 'weekly',
      todoist_id: '5',
    };
    const { store, calls } = storeWith(JSON.stringify([template]));
    const existing = {
      id: 'u1',
      todoistId: '5',
      status: 'pending' as const,
      description: 'Water plants',
      tags: [],
      entry: '20260105T083000Z',
      due: '20260110T080000Z',
      recur: 'weekly',
    };

    const updated = await store.update(existing, { description: 'Water all plants', due: undefined, project: undefined });

    expect(JSON.parse(calls[1]?.input ?? 'null')).toEqual([{ ...template, description: 'Water all plants' }]);
    expect(updated.due).toBe('20260110T080000Z');
  });
});
