import { EmptyUpdateError, InvalidDescriptionError, InvalidTitleError } from './errors.js';

export const MAX_TITLE_LENGTH = 200;
export const MAX_DESCRIPTION_LENGTH = 2000;

export const TODO_FILTERS = ['all', 'pending', 'completed'] as const;

export type TodoFilter = (typeof TODO_FILTERS)[number];

/**
 * A single task owned by one user.
 * Timestamps are ISO-8601 strings as persisted.
 */
export interface Todo {
  readonly id: number;
  readonly userId: number;
  readonly title: string;
  readonly description: string;
  readonly completed: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Partial update of a todo. Absent fields are left untouched.
 */
export interface TodoChanges {
  title?: string;
  description?: string;
  completed?: boolean;
}

export interface TodoStats {
  total: number;
  completed: number;
  pending: number;
}

export function normalizeTitle(raw: string): string {
  const title = raw.trim();
  if (title.length === 0) {
    throw new InvalidTitleError();
  }
  if (title.length > MAX_TITLE_LENGTH) {
    throw new InvalidTitleError(`Title must be at most ${MAX_TITLE_LENGTH} characters`);
  }
  return title;
}

export function normalizeDescription(raw: string | undefined): string {
  const description = (raw ?? '').trim();
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    throw new InvalidDescriptionError(
      `Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`
    );
  }
  return description;
}

/**
 * Normalize a partial update, dropping undefined fields.
 * Throws EmptyUpdateError when nothing is left to change.
 */
export function normalizeChanges(changes: TodoChanges): TodoChanges {
  const normalized: TodoChanges = {};

  if (changes.title !== undefined) {
    normalized.title = normalizeTitle(changes.title);
  }
  if (changes.description !== undefined) {
    normalized.description = normalizeDescription(changes.description);
  }
  if (changes.completed !== undefined) {
    normalized.completed = changes.completed;
  }

  if (Object.keys(normalized).length === 0) {
    throw new EmptyUpdateError();
  }

  return normalized;
}

export function statsFromCounts(total: number, completed: number): TodoStats {
  return {
    total,
    completed,
    pending: total - completed,
  };
}
