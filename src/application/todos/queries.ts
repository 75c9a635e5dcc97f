import { Todo, TodoFilter, TodoStats } from '../../domain/todos/todo.js';
import { TodoRepo } from '../../infra/db/todoRepo.js';
import { NotFoundError } from '../errors.js';

export class TodoQueries {
  constructor(private todoRepo: TodoRepo) {}

  list(userId: number, filter: TodoFilter = 'all'): Todo[] {
    return this.todoRepo.listByUser(userId, filter);
  }

  get(userId: number, todoId: number): Todo {
    const todo = this.todoRepo.findById(todoId, userId);
    if (!todo) {
      throw new NotFoundError('Todo not found');
    }
    return todo;
  }

  stats(userId: number): TodoStats {
    return this.todoRepo.countByUser(userId);
  }
}
