import { TodoRepo } from '../../infra/db/todoRepo.js';
import { OperationLog } from '../operationLog.js';

export interface ClearCompletedCommand {
  userId: number;
}

export interface ClearCompletedResult {
  deleted: number;
}

export class ClearCompletedTodosUseCase {
  constructor(
    private todoRepo: TodoRepo,
    private operationLog: OperationLog
  ) {}

  async execute(command: ClearCompletedCommand): Promise<ClearCompletedResult> {
    const deleted = this.todoRepo.deleteCompleted(command.userId);

    await this.operationLog.record({
      action: 'CLEAR_COMPLETED',
      userId: command.userId,
      detail: `deleted=${deleted}`,
    });

    return { deleted };
  }
}
