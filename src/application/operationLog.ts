export type OperationAction = 'CREATE' | 'UPDATE' | 'TOGGLE' | 'DELETE' | 'CLEAR_COMPLETED';

export interface OperationEntry {
  action: OperationAction;
  userId: number;
  todoId?: number;
  detail?: string;
}

/**
 * Sink for successful mutations. Implementations must never reject:
 * a failed write cannot fail the originating request.
 */
export interface OperationLog {
  record(entry: OperationEntry): Promise<void>;
}
