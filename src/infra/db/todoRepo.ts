import type { Db } from './database.js';
import { statsFromCounts, Todo, TodoChanges, TodoFilter, TodoStats } from '../../domain/todos/todo.js';

interface TodoRow {
  id: number;
  user_id: number;
  title: string;
  description: string;
  completed: number;
  created_at: string;
  updated_at: string;
}

export interface NewTodo {
  userId: number;
  title: string;
  description: string;
}

const TODO_COLUMNS = 'id, user_id, title, description, completed, created_at, updated_at';

function toTodo(row: TodoRow): Todo {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    description: row.description,
    completed: row.completed === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Todo persistence. Every statement is scoped by user_id, so a row owned by
 * someone else behaves exactly like a missing row.
 */
export class TodoRepo {
  constructor(private db: Db) {}

  listByUser(userId: number, filter: TodoFilter = 'all'): Todo[] {
    let query = `SELECT ${TODO_COLUMNS} FROM todos WHERE user_id = ?`;

    if (filter === 'pending') {
      query += ' AND completed = 0';
    } else if (filter === 'completed') {
      query += ' AND completed = 1';
    }

    query += ' ORDER BY id';

    return this.db.prepare<[number], TodoRow>(query).all(userId).map(toTodo);
  }

  findById(id: number, userId: number): Todo | null {
    const row = this.db
      .prepare<[number, number], TodoRow>(
        `SELECT ${TODO_COLUMNS} FROM todos WHERE id = ? AND user_id = ?`
      )
      .get(id, userId);

    return row ? toTodo(row) : null;
  }

  create(todo: NewTodo): Todo {
    const now = new Date().toISOString();
    const row = this.db
      .prepare<[number, string, string, string, string], TodoRow>(
        `INSERT INTO todos (user_id, title, description, completed, created_at, updated_at)
         VALUES (?, ?, ?, 0, ?, ?)
         RETURNING ${TODO_COLUMNS}`
      )
      .get(todo.userId, todo.title, todo.description, now, now);

    if (!row) {
      throw new Error('Insert into todos returned no row');
    }
    return toTodo(row);
  }

  /**
   * Apply a partial update. Returns null when no row with this id belongs
   * to the user.
   */
  update(id: number, userId: number, changes: TodoChanges): Todo | null {
    const assignments: string[] = ['updated_at = ?'];
    const values: (string | number)[] = [new Date().toISOString()];

    if (changes.title !== undefined) {
      assignments.push('title = ?');
      values.push(changes.title);
    }
    if (changes.description !== undefined) {
      assignments.push('description = ?');
      values.push(changes.description);
    }
    if (changes.completed !== undefined) {
      assignments.push('completed = ?');
      values.push(changes.completed ? 1 : 0);
    }

    values.push(id, userId);

    const row = this.db
      .prepare<(string | number)[], TodoRow>(
        `UPDATE todos
         SET ${assignments.join(', ')}
         WHERE id = ? AND user_id = ?
         RETURNING ${TODO_COLUMNS}`
      )
      .get(...values);

    return row ? toTodo(row) : null;
  }

  toggle(id: number, userId: number): Todo | null {
    const row = this.db
      .prepare<[string, number, number], TodoRow>(
        `UPDATE todos
         SET completed = 1 - completed, updated_at = ?
         WHERE id = ? AND user_id = ?
         RETURNING ${TODO_COLUMNS}`
      )
      .get(new Date().toISOString(), id, userId);

    return row ? toTodo(row) : null;
  }

  delete(id: number, userId: number): boolean {
    const result = this.db
      .prepare<[number, number]>('DELETE FROM todos WHERE id = ? AND user_id = ?')
      .run(id, userId);

    return result.changes > 0;
  }

  deleteCompleted(userId: number): number {
    const result = this.db
      .prepare<[number]>('DELETE FROM todos WHERE user_id = ? AND completed = 1')
      .run(userId);

    return result.changes;
  }

  countByUser(userId: number): TodoStats {
    const row = this.db
      .prepare<[number], { total: number; completed: number }>(
        `SELECT COUNT(*) AS total, COALESCE(SUM(completed), 0) AS completed
         FROM todos
         WHERE user_id = ?`
      )
      .get(userId);

    return statsFromCounts(row?.total ?? 0, row?.completed ?? 0);
  }
}
