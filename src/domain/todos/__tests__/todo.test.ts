import { describe, it, expect } from 'vitest';
import {
  normalizeChanges,
  normalizeDescription,
  normalizeTitle,
  statsFromCounts,
} from '../todo.js';
import { EmptyUpdateError, InvalidDescriptionError, InvalidTitleError } from '../errors.js';

describe('Todo', () => {
  describe('normalizeTitle', () => {
    it('should trim surrounding whitespace', () => {
      expect(normalizeTitle('  buy milk \n')).toBe('buy milk');
    });

    it('should reject a blank title', () => {
      expect(() => normalizeTitle('   ')).toThrow(InvalidTitleError);
      expect(() => normalizeTitle('')).toThrow('Title cannot be empty');
    });

    it('should reject a title over 200 characters', () => {
      expect(normalizeTitle('a'.repeat(200))).toHaveLength(200);
      expect(() => normalizeTitle('a'.repeat(201))).toThrow(
        'Title must be at most 200 characters'
      );
    });
  });

  describe('normalizeDescription', () => {
    it('should default to an empty string', () => {
      expect(normalizeDescription(undefined)).toBe('');
    });

    it('should trim the description', () => {
      expect(normalizeDescription('  two litres ')).toBe('two litres');
    });

    it('should reject a description over 2000 characters', () => {
      expect(() => normalizeDescription('x'.repeat(2001))).toThrow(InvalidDescriptionError);
    });
  });

  describe('normalizeChanges', () => {
    it('should keep only provided fields', () => {
      expect(normalizeChanges({ title: ' new title ', completed: false })).toEqual({
        title: 'new title',
        completed: false,
      });
    });

    it('should keep an explicit empty description', () => {
      expect(normalizeChanges({ description: '' })).toEqual({ description: '' });
    });

    it('should reject an update without fields', () => {
      expect(() => normalizeChanges({})).toThrow(EmptyUpdateError);
      expect(() => normalizeChanges({ title: undefined })).toThrow(EmptyUpdateError);
    });

    it('should reject a blank title in an update', () => {
      expect(() => normalizeChanges({ title: ' ' })).toThrow(InvalidTitleError);
    });
  });

  describe('statsFromCounts', () => {
    it('should derive pending from total and completed', () => {
      expect(statsFromCounts(5, 2)).toEqual({ total: 5, completed: 2, pending: 3 });
    });
  });
});
