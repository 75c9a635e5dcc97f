import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createTestDb, RecordingOperationLog } from '../../../test/helpers.js';
import type { Db } from '../../../infra/db/database.js';
import { TodoRepo } from '../../../infra/db/todoRepo.js';
import { UserRepo } from '../../../infra/db/userRepo.js';
import { FileOperationLog } from '../../../infra/log/fileOperationLog.js';
import { EmptyUpdateError, InvalidTitleError } from '../../../domain/todos/errors.js';
import { NotFoundError } from '../../errors.js';
import { ClearCompletedTodosUseCase } from '../clearCompleted.js';
import { CreateTodoUseCase } from '../createTodo.js';
import { DeleteTodoUseCase } from '../deleteTodo.js';
import { TodoQueries } from '../queries.js';
import { ToggleTodoUseCase } from '../toggleTodo.js';
import { UpdateTodoUseCase } from '../updateTodo.js';

describe('Todo use cases', () => {
  let db: Db;
  let todoRepo: TodoRepo;
  let operationLog: RecordingOperationLog;
  let createTodo: CreateTodoUseCase;
  let updateTodo: UpdateTodoUseCase;
  let toggleTodo: ToggleTodoUseCase;
  let deleteTodo: DeleteTodoUseCase;
  let clearCompleted: ClearCompletedTodosUseCase;
  let queries: TodoQueries;
  let alice: number;
  let bob: number;

  beforeEach(() => {
    db = createTestDb();
    todoRepo = new TodoRepo(db);
    operationLog = new RecordingOperationLog();
    createTodo = new CreateTodoUseCase(todoRepo, operationLog);
    updateTodo = new UpdateTodoUseCase(todoRepo, operationLog);
    toggleTodo = new ToggleTodoUseCase(todoRepo, operationLog);
    deleteTodo = new DeleteTodoUseCase(todoRepo, operationLog);
    clearCompleted = new ClearCompletedTodosUseCase(todoRepo, operationLog);
    queries = new TodoQueries(todoRepo);

    const users = new UserRepo(db);
    alice = users.create('alice', 'hash').id;
    bob = users.create('bob', 'hash').id;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  describe('CreateTodoUseCase', () => {
    it('should create a normalized todo and log it', async () => {
      const todo = await createTodo.execute({ userId: alice, title: '  buy milk ' });

      expect(todo).toMatchObject({
        id: 1,
        userId: alice,
        title: 'buy milk',
        description: '',
        completed: false,
      });
      expect(operationLog.entries).toEqual([
        { action: 'CREATE', userId: alice, todoId: 1, detail: 'title="buy milk"' },
      ]);
    });

    it('should list a created todo with identical fields', async () => {
      const todo = await createTodo.execute({
        userId: alice,
        title: 'buy milk',
        description: 'semi-skimmed',
      });

      expect(queries.list(alice)).toEqual([todo]);
      expect(queries.get(alice, todo.id)).toEqual(todo);
    });

    it('should reject a blank title without logging', async () => {
      await expect(createTodo.execute({ userId: alice, title: '   ' })).rejects.toThrow(
        InvalidTitleError
      );
      expect(operationLog.entries).toEqual([]);
    });

    it('should still succeed when the log cannot be written', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const dir = mkdtempSync(join(tmpdir(), 'todo-broken-log-'));
      try {
        const brokenLog = new FileOperationLog(dir);
        const useCase = new CreateTodoUseCase(todoRepo, brokenLog);

        const todo = await useCase.execute({ userId: alice, title: 'still saved' });

        expect(queries.get(alice, todo.id).title).toBe('still saved');
        expect(warn).toHaveBeenCalledTimes(1);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('UpdateTodoUseCase', () => {
    it('should apply a partial update and log the changed fields', async () => {
      const todo = await createTodo.execute({
        userId: alice,
        title: 'draft',
        description: 'keep',
      });

      const updated = await updateTodo.execute({
        userId: alice,
        todoId: todo.id,
        changes: { title: 'final', completed: true },
      });

      expect(updated).toMatchObject({ title: 'final', description: 'keep', completed: true });
      expect(operationLog.entries[1]).toEqual({
        action: 'UPDATE',
        userId: alice,
        todoId: todo.id,
        detail: 'fields=title,completed',
      });
    });

    it('should report another user todo as not found', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'mine' });

      await expect(
        updateTodo.execute({ userId: bob, todoId: todo.id, changes: { title: 'stolen' } })
      ).rejects.toThrow(new NotFoundError('Todo not found'));
      expect(queries.get(alice, todo.id).title).toBe('mine');
      expect(operationLog.entries).toHaveLength(1);
    });

    it('should fail with not found after the todo was deleted', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'short-lived' });
      await deleteTodo.execute({ userId: alice, todoId: todo.id });

      await expect(
        updateTodo.execute({ userId: alice, todoId: todo.id, changes: { completed: true } })
      ).rejects.toThrow(NotFoundError);
    });

    it('should reject an empty update', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'unchanged' });

      await expect(
        updateTodo.execute({ userId: alice, todoId: todo.id, changes: {} })
      ).rejects.toThrow(EmptyUpdateError);
    });
  });

  describe('ToggleTodoUseCase', () => {
    it('should flip completion and log the new state', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'flip' });

      const toggled = await toggleTodo.execute({ userId: alice, todoId: todo.id });

      expect(toggled.completed).toBe(true);
      expect(operationLog.entries[1]).toEqual({
        action: 'TOGGLE',
        userId: alice,
        todoId: todo.id,
        detail: 'completed=true',
      });
    });

    it('should not toggle another user todo', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'flip' });

      await expect(toggleTodo.execute({ userId: bob, todoId: todo.id })).rejects.toThrow(
        NotFoundError
      );
    });
  });

  describe('DeleteTodoUseCase', () => {
    it('should delete the todo and log it', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'bye' });

      await deleteTodo.execute({ userId: alice, todoId: todo.id });

      expect(queries.list(alice)).toEqual([]);
      expect(operationLog.entries[1]).toEqual({
        action: 'DELETE',
        userId: alice,
        todoId: todo.id,
      });
    });

    it('should not delete another user todo', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'mine' });

      await expect(deleteTodo.execute({ userId: bob, todoId: todo.id })).rejects.toThrow(
        NotFoundError
      );
      expect(queries.list(alice)).toHaveLength(1);
    });
  });

  describe('ClearCompletedTodosUseCase', () => {
    it('should delete completed todos and report the count', async () => {
      const done = await createTodo.execute({ userId: alice, title: 'done' });
      await createTodo.execute({ userId: alice, title: 'open' });
      await toggleTodo.execute({ userId: alice, todoId: done.id });

      const result = await clearCompleted.execute({ userId: alice });

      expect(result).toEqual({ deleted: 1 });
      expect(queries.list(alice).map((t) => t.title)).toEqual(['open']);
      expect(operationLog.entries.at(-1)).toEqual({
        action: 'CLEAR_COMPLETED',
        userId: alice,
        detail: 'deleted=1',
      });
    });
  });

  describe('TodoQueries', () => {
    it('should hide other users todos', async () => {
      const todo = await createTodo.execute({ userId: alice, title: 'private' });

      expect(queries.list(bob)).toEqual([]);
      expect(() => queries.get(bob, todo.id)).toThrow(new NotFoundError('Todo not found'));
    });

    it('should filter and count', async () => {
      const done = await createTodo.execute({ userId: alice, title: 'done' });
      await createTodo.execute({ userId: alice, title: 'open' });
      await toggleTodo.execute({ userId: alice, todoId: done.id });

      expect(queries.list(alice, 'completed').map((t) => t.title)).toEqual(['done']);
      expect(queries.list(alice, 'pending').map((t) => t.title)).toEqual(['open']);
      expect(queries.stats(alice)).toEqual({ total: 2, completed: 1, pending: 1 });
      expect(queries.stats(bob)).toEqual({ total: 0, completed: 0, pending: 0 });
    });
  });
});
