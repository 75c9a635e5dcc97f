import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { OperationEntry, OperationLog } from '../../application/operationLog.js';

/**
 * Render one log line, e.g.
 * `2024-01-01T10:00:00.000Z CREATE user=1 todo=7 title="buy milk"`.
 */
export function formatOperation(entry: OperationEntry, at: Date): string {
  const parts = [at.toISOString(), entry.action, `user=${entry.userId}`];
  if (entry.todoId !== undefined) {
    parts.push(`todo=${entry.todoId}`);
  }
  if (entry.detail) {
    parts.push(entry.detail);
  }
  return parts.join(' ');
}

/**
 * Append-only plain-text operation log.
 * Write failures are reported on the console and never rethrown.
 */
export class FileOperationLog implements OperationLog {
  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async record(entry: OperationEntry): Promise<void> {
    const line = formatOperation(entry, this.now()) + '\n';
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, 'utf-8');
    } catch (error) {
      console.warn(`Failed to write operation log ${this.filePath}:`, error);
    }
  }
}
