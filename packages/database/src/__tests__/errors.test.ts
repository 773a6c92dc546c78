import { describe, it, expect } from 'vitest';

import {
  DatabaseError,
  DatabaseNotFoundError,
  QueryError,
  ConnectionError,
  StatsFormatError,
} from '../errors.js';

describe('Error Classes', () => {
  describe('DatabaseError', () => {
    it('should create error with message', () => {
      const error = new DatabaseError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('DatabaseError');
    });

    it('should create error with dbPath', () => {
      const error = new DatabaseError('Test error', '/path/to/db');
      expect(error.dbPath).toBe('/path/to/db');
    });

    it('should be instanceof Error', () => {
      const error = new DatabaseError('Test');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(DatabaseError);
    });
  });

  describe('DatabaseNotFoundError', () => {
    it('should include path in message', () => {
      const error = new DatabaseNotFoundError('/path/to/stats.db');
      expect(error.message).toContain('/path/to/stats.db');
      expect(error.dbPath).toBe('/path/to/stats.db');
      expect(error.name).toBe('DatabaseNotFoundError');
    });

    it('should be instanceof DatabaseError', () => {
      const error = new DatabaseNotFoundError('/path/to/db');
      expect(error).toBeInstanceOf(DatabaseError);
    });
  });

  describe('QueryError', () => {
    it('should create with message', () => {
      const error = new QueryError('Query failed');
      expect(error.message).toBe('Query failed');
      expect(error.name).toBe('QueryError');
    });

    it('should include query if provided', () => {
      const error = new QueryError('Query failed', 'SELECT * FROM endgames');
      expect(error.query).toBe('SELECT * FROM endgames');
    });

    it('should be instanceof DatabaseError', () => {
      const error = new QueryError('test');
      expect(error).toBeInstanceOf(DatabaseError);
    });
  });

  describe('ConnectionError', () => {
    it('should include path in message', () => {
      const error = new ConnectionError('/path/to/stats.db');
      expect(error.message).toContain('/path/to/stats.db');
      expect(error.name).toBe('ConnectionError');
    });

    it('should include cause message', () => {
      const cause = new Error('SQLITE_CANTOPEN');
      const error = new ConnectionError('/path/to/stats.db', cause);
      expect(error.message).toContain('SQLITE_CANTOPEN');
    });

    it('should be instanceof DatabaseError', () => {
      const error = new ConnectionError('/path/to/db');
      expect(error).toBeInstanceOf(DatabaseError);
    });
  });

  describe('StatsFormatError', () => {
    it('should append issues to the message', () => {
      const error = new StatsFormatError('Invalid statistics dump', 'KQvK', [
        'KQvK.longest: Required',
        'KQvK.total: Expected number, received string',
      ]);
      expect(error.message).toBe(
        'Invalid statistics dump: KQvK.longest: Required; KQvK.total: Expected number, received string',
      );
      expect(error.material).toBe('KQvK');
      expect(error.issues).toHaveLength(2);
      expect(error.name).toBe('StatsFormatError');
    });

    it('should keep the message without issues', () => {
      const error = new StatsFormatError('Bad row');
      expect(error.message).toBe('Bad row');
      expect(error.issues).toEqual([]);
    });

    it('should be instanceof DatabaseError', () => {
      expect(new StatsFormatError('test')).toBeInstanceOf(DatabaseError);
    });
  });
});
