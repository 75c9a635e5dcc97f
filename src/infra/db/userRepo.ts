import Database from 'better-sqlite3';
import type { Db } from './database.js';
import { User } from '../../domain/auth/user.js';
import { ConflictError } from '../../application/errors.js';

interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  created_at: string;
}

const USER_COLUMNS = 'id, username, password_hash, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class UserRepo {
  constructor(private db: Db) {}

  findByUsername(username: string): User | null {
    const row = this.db
      .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = ?`)
      .get(username);

    return row ? toUser(row) : null;
  }

  findById(id: number): User | null {
    const row = this.db
      .prepare<[number], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ?`)
      .get(id);

    return row ? toUser(row) : null;
  }

  create(username: string, passwordHash: string): User {
    let row: UserRow | undefined;
    try {
      row = this.db
        .prepare<[string, string, string], UserRow>(
          `INSERT INTO users (username, password_hash, created_at)
           VALUES (?, ?, ?)
           RETURNING ${USER_COLUMNS}`
        )
        .get(username, passwordHash, new Date().toISOString());
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new ConflictError('Username already exists');
      }
      throw error;
    }

    if (!row) {
      throw new Error('Insert into users returned no row');
    }
    return toUser(row);
  }
}
