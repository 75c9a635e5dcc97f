import { TodoRepo } from '../../infra/db/todoRepo.js';
import { NotFoundError } from '../errors.js';
import { OperationLog } from '../operationLog.js';

export interface DeleteTodoCommand {
  userId: number;
  todoId: number;
}

export class DeleteTodoUseCase {
  constructor(
    private todoRepo: TodoRepo,
    private operationLog: OperationLog
  ) {}

  async execute(command: DeleteTodoCommand): Promise<void> {
    const deleted = this.todoRepo.delete(command.todoId, command.userId);
    if (!deleted) {
      throw new NotFoundError('Todo not found');
    }

    await this.operationLog.record({
      action: 'DELETE',
      userId: command.userId,
      todoId: command.todoId,
    });
  }
}
