/**
 * Ledger Tests
 *
 * Verifies completion markers are durable, monotonic and append-only.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { LedgerWriteError } from '../../../core/errors.js';
import { activityUniqueId } from '../../../core/types.js';
import { SqliteLedger, initializeLedgerSchema } from '../../../persistence/ledger.js';

describe('SqliteLedger', () => {
  let db: Database.Database;
  let ledger: SqliteLedger;

  beforeEach(() => {
    db = new Database(':memory:');
    initializeLedgerSchema(db);
    ledger = new SqliteLedger(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('markCompleted / has', () => {
    it('should report an unmarked id as not completed', async () => {
      expect(await ledger.has('n79021164-2024-01-02-2024-01-03')).toBe(false);
    });

    it('should report a marked id as completed', async () => {
      await ledger.markCompleted('n79021164-2024-01-02-2024-01-03', new Date('2024-01-03T10:00:00.000Z'));

      expect(await ledger.has('n79021164-2024-01-02-2024-01-03')).toBe(true);
    });

    it('should keep the first completion time when an id is marked twice', async () => {
      await ledger.markCompleted('a-1-2', new Date('2024-01-03T10:00:00.000Z'));
      await ledger.markCompleted('a-1-2', new Date('2024-02-01T00:00:00.000Z'));

      expect(await ledger.get('a-1-2')).toEqual({
        uniqueId: 'a-1-2',
        completedAt: '2024-01-03T10:00:00.000Z',
      });
      expect((await ledger.stats()).total).toBe(1);
    });

    it('should keep markers when the schema is applied again', async () => {
      await ledger.markCompleted('a-1-2', new Date('2024-01-03T10:00:00.000Z'));

      initializeLedgerSchema(db);
      const reopened = new SqliteLedger(db);

      expect(await reopened.has('a-1-2')).toBe(true);
    });

    it('should distinguish tuples that differ only in published date', async () => {
      await ledger.markCompleted(activityUniqueId('n1', '2024-01-02', '2024-01-03'), new Date());

      expect(await ledger.has(activityUniqueId('n1', '2024-01-02', '2024-01-03'))).toBe(true);
      expect(await ledger.has(activityUniqueId('n1', '2024-01-02', '2024-01-04'))).toBe(false);
    });
  });

  describe('countCompleted', () => {
    it('should count distinct completed ids', async () => {
      await ledger.markCompleted('a', new Date());
      await ledger.markCompleted('b', new Date());

      expect(await ledger.countCompleted(['a', 'a', 'b', 'c'])).toBe(2);
    });

    it('should return 0 for no ids', async () => {
      expect(await ledger.countCompleted([])).toBe(0);
    });

    it('should count across more ids than fit in one query', async () => {
      const ids = Array.from({ length: 1200 }, (_, i) => `id-${i}`);
      const insert = db.transaction(() => {
        for (const id of ids.slice(0, 700)) {
          db.prepare('INSERT INTO ledger_entries (unique_id, completed_at) VALUES (?, ?)').run(
            id,
            '2024-01-01T00:00:00.000Z'
          );
        }
      });
      insert();

      expect(await ledger.countCompleted(ids)).toBe(700);
    });
  });

  describe('append-only', () => {
    it('should reject deleting a marker', async () => {
      await ledger.markCompleted('a', new Date());

      expect(() => db.prepare("DELETE FROM ledger_entries WHERE unique_id = 'a'").run()).toThrow(
        'ledger_entries is append-only'
      );
      expect(await ledger.has('a')).toBe(true);
    });

    it('should reject rewriting a marker', async () => {
      await ledger.markCompleted('a', new Date('2024-01-01T00:00:00.000Z'));

      expect(() =>
        db.prepare("UPDATE ledger_entries SET completed_at = '2025-01-01' WHERE unique_id = 'a'").run()
      ).toThrow('ledger_entries is append-only');
    });
  });

  describe('write failures', () => {
    it('should raise LedgerWriteError when the database cannot be written', async () => {
      db.close();

      await expect(ledger.markCompleted('a', new Date())).rejects.toBeInstanceOf(LedgerWriteError);

      // Reopen so afterEach can close it
      db = new Database(':memory:');
    });
  });

  describe('stats', () => {
    it('should report an empty ledger', async () => {
      expect(await ledger.stats()).toEqual({ total: 0, lastCompletedAt: null });
    });

    it('should report count and most recent completion', async () => {
      await ledger.markCompleted('a', new Date('2024-01-03T10:00:00.000Z'));
      await ledger.markCompleted('b', new Date('2024-01-05T08:30:00.000Z'));
      await ledger.markCompleted('c', new Date('2024-01-04T00:00:00.000Z'));

      expect(await ledger.stats()).toEqual({
        total: 3,
        lastCompletedAt: '2024-01-05T08:30:00.000Z',
      });
    });
  });
});
