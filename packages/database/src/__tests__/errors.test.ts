import { describe, it, expect } from 'vitest';

import {
  BookLoadError,
  CacheCorruptEntryError,
  CacheIOError,
  ConnectionError,
  DatabaseError,
  DatabaseNotFoundError,
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
      const error = new DatabaseNotFoundError('/path/to/cache.db');
      expect(error.message).toBe('Database file not found: /path/to/cache.db');
      expect(error.dbPath).toBe('/path/to/cache.db');
      expect(error.name).toBe('DatabaseNotFoundError');
      expect(error).toBeInstanceOf(DatabaseError);
    });
  });

  describe('ConnectionError', () => {
    it('should include the cause when given', () => {
      expect(new ConnectionError('/path/to/cache.db').message).toBe(
        'Failed to connect to database at /path/to/cache.db',
      );
      expect(new ConnectionError('/path/to/cache.db', new Error('locked')).message).toBe(
        'Failed to connect to database at /path/to/cache.db: locked',
      );
    });
  });

  describe('BookLoadError', () => {
    it('should name the source', () => {
      const error = new BookLoadError('book.json.gz', 'unexpected end of file');
      expect(error.message).toBe(
        'Failed to load opening book from book.json.gz: unexpected end of file',
      );
      expect(error.source).toBe('book.json.gz');
      expect(error.name).toBe('BookLoadError');
    });
  });

  describe('CacheCorruptEntryError', () => {
    it('should mention the row when known', () => {
      const error = new CacheCorruptEntryError('9:7.5:', 4, 'bad JSON');
      expect(error.message).toBe('Corrupt cache entry for 9:7.5: (row 4): bad JSON');
      expect(error.lookupKey).toBe('9:7.5:');
      expect(error.rowId).toBe(4);
      expect(new CacheCorruptEntryError('k', undefined, 'x').message).toBe(
        'Corrupt cache entry for k: x',
      );
    });
  });

  describe('CacheIOError', () => {
    it('should carry the operation and cause', () => {
      const error = new CacheIOError('put', '/tmp/cache.db', new Error('disk full'));
      expect(error.message).toBe('Cache put failed for /tmp/cache.db: disk full');
      expect(error.operation).toBe('put');
      expect(error.dbPath).toBe('/tmp/cache.db');
      expect(error).toBeInstanceOf(DatabaseError);
    });
  });
});
