import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConflictError } from '../../../application/errors.js';
import { createTestDb } from '../../../test/helpers.js';
import type { Db } from '../database.js';
import { UserRepo } from '../userRepo.js';

describe('UserRepo', () => {
  let db: Db;
  let repo: UserRepo;

  beforeEach(() => {
    db = createTestDb();
    repo = new UserRepo(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should create and find a user', () => {
    const user = repo.create('alice', 'hash-1');

    expect(user.id).toBe(1);
    expect(user.username).toBe('alice');
    expect(user.passwordHash).toBe('hash-1');
    expect(new Date(user.createdAt).toISOString()).toBe(user.createdAt);

    expect(repo.findByUsername('alice')).toEqual(user);
    expect(repo.findById(1)).toEqual(user);
  });

  it('should return null for unknown users', () => {
    expect(repo.findByUsername('nobody')).toBeNull();
    expect(repo.findById(42)).toBeNull();
  });

  it('should map a duplicate username to ConflictError', () => {
    repo.create('alice', 'hash-1');

    expect(() => repo.create('alice', 'hash-2')).toThrow(ConflictError);
    expect(() => repo.create('alice', 'hash-2')).toThrow('Username already exists');
  });

  it('should treat usernames as case-sensitive', () => {
    repo.create('alice', 'hash-1');
    const other = repo.create('Alice', 'hash-2');

    expect(other.id).toBe(2);
  });
});
