import { normalizeDescription, normalizeTitle, Todo } from '../../domain/todos/todo.js';
import { TodoRepo } from '../../infra/db/todoRepo.js';
import { OperationLog } from '../operationLog.js';

export interface CreateTodoCommand {
  userId: number;
  title: string;
  description?: string;
}

export class CreateTodoUseCase {
  constructor(
    private todoRepo: TodoRepo,
    private operationLog: OperationLog
  ) {}

  async execute(command: CreateTodoCommand): Promise<Todo> {
    const todo = this.todoRepo.create({
      userId: command.userId,
      title: normalizeTitle(command.title),
      description: normalizeDescription(command.description),
    });

    await this.operationLog.record({
      action: 'CREATE',
      userId: command.userId,
      todoId: todo.id,
      detail: `title=${JSON.stringify(todo.title)}`,
    });

    return todo;
  }
}
