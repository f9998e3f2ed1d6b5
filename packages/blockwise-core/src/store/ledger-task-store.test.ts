import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { LedgerTaskStore } from './ledger-task-store.js';
import { createTestDb } from '../db/test-utils.js';
import { EventStore } from '../events/store.js';
import { EventType, TaskPriority, TaskStatus } from '../events/types.js';
import { ProjectionEngine } from '../projections/engine.js';
import { TasksCurrentProjector } from '../projections/tasks-current.js';
import { BlockersProjector } from '../projections/blockers.js';
import { rebuildAllProjections } from '../projections/rebuild.js';
import { AmbiguousPrefixError, TaskNotFoundError } from '../errors.js';

describe('LedgerTaskStore', () => {
  let db: Database.Database;
  let engine: ProjectionEngine;
  let store: LedgerTaskStore;

  beforeEach(() => {
    db = createTestDb();
    engine = new ProjectionEngine(db);
    engine.register(new TasksCurrentProjector());
    engine.register(new BlockersProjector());
    store = new LedgerTaskStore(db, new EventStore(db), engine, { author: 'tester' });
  });

  afterEach(() => {
    db.close();
  });

  describe('create', () => {
    it('creates a task with defaults', () => {
      const task = store.create({ title: 'Write docs' });

      expect(task.id).toHaveLength(26);
      expect(task.title).toBe('Write docs');
      expect(task.status).toBe(TaskStatus.Active);
      expect(task.priority).toBe(TaskPriority.Normal);
      expect(task.description).toBeNull();
      expect(task.blockers).toEqual([]);
      expect(task.tags).toEqual([]);
    });

    it('stores blockers and an initial status', () => {
      const a = store.create({ title: 'A' });
      const b = store.create({ title: 'B', blockers: [a.id], status: TaskStatus.Blocked });

      expect(store.get(b.id)?.blockers).toEqual([a.id]);
      expect(store.get(b.id)?.status).toBe(TaskStatus.Blocked);
    });
  });

  it('returns null for unknown ids', () => {
    expect(store.get('missing')).toBeNull();
  });

  describe('save', () => {
    it('turns blocker and status changes into events', () => {
      const a = store.create({ title: 'A' });
      const b = store.create({ title: 'B' });
      const c = store.create({ title: 'C', blockers: [a.id] });

      const task = store.get(c.id);
      if (!task) throw new Error('task missing');
      task.blockers = [b.id];
      task.status = TaskStatus.Blocked;
      store.save(task);

      const saved = store.get(c.id);
      expect(saved?.blockers).toEqual([b.id]);
      expect(saved?.status).toBe(TaskStatus.Blocked);
      expect(store.history(c.id).map((e) => e.type)).toEqual([
        EventType.TaskCreated,
        EventType.BlockerRemoved,
        EventType.BlockerAdded,
        EventType.StatusChanged,
      ]);
      expect(store.history(c.id)[3].data).toEqual({ from: 'active', to: 'blocked' });
      expect(store.history(c.id)[3].author).toBe('tester');
    });

    it('records field updates', () => {
      const a = store.create({ title: 'Old', tags: ['x'] });
      const task = store.get(a.id);
      if (!task) throw new Error('task missing');

      task.title = 'New';
      task.tags = ['x', 'y'];
      task.project = 'alpha';
      store.save(task);

      const saved = store.get(a.id);
      expect(saved?.title).toBe('New');
      expect(saved?.tags).toEqual(['x', 'y']);
      expect(saved?.project).toBe('alpha');
    });

    it('appends nothing when the task is unchanged', () => {
      const a = store.create({ title: 'A' });
      const task = store.get(a.id);
      if (!task) throw new Error('task missing');

      store.save(task);

      expect(store.history(a.id)).toHaveLength(1);
    });

    it('throws for unknown tasks', () => {
      const a = store.create({ title: 'A' });
      const task = store.get(a.id);
      if (!task) throw new Error('task missing');

      expect(() => store.save({ ...task, id: 'ghost' })).toThrow(TaskNotFoundError);
    });

    it('writes all events of one save or none', () => {
      const a = store.create({ title: 'A' });
      const task = store.get(a.id);
      if (!task) throw new Error('task missing');

      task.blockers = ['other'];
      task.title = '';
      expect(() => store.save(task)).toThrow();

      expect(store.get(a.id)?.blockers).toEqual([]);
      expect(store.history(a.id)).toHaveLength(1);
    });
  });

  describe('listing', () => {
    it('lists active ids in creation order', () => {
      const a = store.create({ title: 'A' });
      const b = store.create({ title: 'B' });
      const c = store.create({ title: 'C' });

      const done = store.get(b.id);
      if (!done) throw new Error('task missing');
      done.status = TaskStatus.Completed;
      store.save(done);

      expect(store.listActiveIds()).toEqual([a.id, c.id]);
      expect(store.list().map((t) => t.id)).toEqual([a.id, c.id]);
      expect(store.list({ includeTerminal: true }).map((t) => t.id)).toEqual([a.id, b.id, c.id]);
      expect(store.list({ status: TaskStatus.Completed }).map((t) => t.id)).toEqual([b.id]);
    });

    it('filters by project', () => {
      store.create({ title: 'A', project: 'alpha' });
      const b = store.create({ title: 'B', project: 'beta' });

      expect(store.list({ project: 'beta' }).map((t) => t.id)).toEqual([b.id]);
    });
  });

  describe('resolveId', () => {
    function seedTask(taskId: string): void {
      engine.applyEvent(
        new EventStore(db).append({ task_id: taskId, type: EventType.TaskCreated, data: { title: taskId } })
      );
    }

    it('resolves full ids and unique prefixes', () => {
      const a = store.create({ title: 'A' });
      seedTask('ALPHA-1');

      expect(store.resolveId(a.id)).toBe(a.id);
      expect(store.resolveId('ALP')).toBe('ALPHA-1');
      expect(store.resolveId('nothing-like-this')).toBeNull();
    });

    it('rejects ambiguous prefixes', () => {
      seedTask('SHARED-1');
      seedTask('SHARED-2');

      let caught: unknown;
      try {
        store.resolveId('SHARED');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(AmbiguousPrefixError);
      if (caught instanceof AmbiguousPrefixError) {
        expect(caught.matches).toEqual(['SHARED-1', 'SHARED-2']);
      }
    });
  });

  it('survives a projection rebuild', () => {
    const a = store.create({ title: 'A' });
    const b = store.create({ title: 'B', blockers: [a.id], status: TaskStatus.Blocked });
    const before = store.get(b.id);

    rebuildAllProjections(db, engine);

    expect(store.get(b.id)).toEqual(before);
  });
});
