import { normalizeChanges, Todo, TodoChanges } from '../../domain/todos/todo.js';
import { TodoRepo } from '../../infra/db/todoRepo.js';
import { NotFoundError } from '../errors.js';
import { OperationLog } from '../operationLog.js';

export interface UpdateTodoCommand {
  userId: number;
  todoId: number;
  changes: TodoChanges;
}

export class UpdateTodoUseCase {
  constructor(
    private todoRepo: TodoRepo,
    private operationLog: OperationLog
  ) {}

  async execute(command: UpdateTodoCommand): Promise<Todo> {
    const changes = normalizeChanges(command.changes);

    const todo = this.todoRepo.update(command.todoId, command.userId, changes);
    if (!todo) {
      throw new NotFoundError('Todo not found');
    }

    await this.operationLog.record({
      action: 'UPDATE',
      userId: command.userId,
      todoId: todo.id,
      detail: `fields=${Object.keys(changes).join(',')}`,
    });

    return todo;
  }
}
