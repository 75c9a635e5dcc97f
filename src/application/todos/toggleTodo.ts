import { Todo } from '../../domain/todos/todo.js';
import { TodoRepo } from '../../infra/db/todoRepo.js';
import { NotFoundError } from '../errors.js';
import { OperationLog } from '../operationLog.js';

export interface ToggleTodoCommand {
  userId: number;
  todoId: number;
}

export class ToggleTodoUseCase {
  constructor(
    private todoRepo: TodoRepo,
    private operationLog: OperationLog
  ) {}

  async execute(command: ToggleTodoCommand): Promise<Todo> {
    const todo = this.todoRepo.toggle(command.todoId, command.userId);
    if (!todo) {
      throw new NotFoundError('Todo not found');
    }

    await this.operationLog.record({
      action: 'TOGGLE',
      userId: command.userId,
      todoId: todo.id,
      detail: `completed=${todo.completed}`,
    });

    return todo;
  }
}
