/**
 * In-Memory Ledger Store Tests
 */

import Decimal from 'decimal.js';
import { MemoryLedgerStore } from '../src/db/memory';
import { ConflictError, NotFoundError } from '../src/lib/errors';

const d = (value: string) => new Decimal(value);

describe('MemoryLedgerStore', () => {
  let store: MemoryLedgerStore;

  beforeEach(async () => {
    store = new MemoryLedgerStore();
    await store.createAccount({ username: 'alice', destination: '100', monthlyLimit: d('210.00') });
  });

  afterEach(() => {
    store.clear();
  });

  describe('accounts', () => {
    it('should create an account once and keep the first row', async () => {
      const again = await store.createAccount({ username: 'alice', destination: '999', monthlyLimit: d('5') });

      expect(again).toBe(false);
      const account = await store.findAccount('alice');
      expect(account?.destination).toBe('100');
      expect(account?.monthlyLimit.toFixed(2)).toBe('210.00');
    });

    it('should return null for an unknown account', async () => {
      expect(await store.findAccount('bob')).toBeNull();
    });

    it('should update the limit of an existing account only', async () => {
      expect(await store.updateLimit('alice', d('300'))).toBe(true);
      expect(await store.updateLimit('bob', d('300'))).toBe(false);
      expect((await store.findAccount('alice'))?.monthlyLimit.toFixed(2)).toBe('300.00');
    });

    it('should list distinct destinations in order', async () => {
      await store.createAccount({ username: 'bob', destination: '050', monthlyLimit: d('10') });
      await store.createAccount({ username: 'carol', destination: '100', monthlyLimit: d('10') });

      expect(await store.notificationDestinations()).toEqual(['050', '100']);
    });

    it('should not leak internal state through returned objects', async () => {
      const account = await store.findAccount('alice');
      if (account) account.destination = 'changed';

      expect((await store.findAccount('alice'))?.destination).toBe('100');
    });
  });

  describe('records', () => {
    it('should assign increasing ids', async () => {
      const first = await store.createRecord('alice', '2026-03-01', d('10'));
      const second = await store.createRecord('alice', '2026-03-02', d('20'));

      expect(first).toBe(1);
      expect(second).toBe(2);
    });

    it('should refuse a second record for the same owner and date', async () => {
      await store.createRecord('alice', '2026-03-01', d('10'));

      await expect(store.createRecord('alice', '2026-03-01', d('5'))).rejects.toThrow(ConflictError);
    });

    it('should allow the same date for different owners', async () => {
      await store.createRecord('alice', '2026-03-01', d('10'));

      await expect(store.createRecord('bob', '2026-03-01', d('5'))).resolves.toBe(2);
    });

    it('should find the record of a date', async () => {
      const id = await store.createRecord('alice', '2026-03-01', d('10'));

      const record = await store.recordForDate('alice', '2026-03-01');
      expect(record?.id).toBe(id);
      expect(record?.amount.toFixed(2)).toBe('10.00');
      expect(await store.recordForDate('alice', '2026-03-02')).toBeNull();
    });

    it('should update an amount and fail on an unknown id', async () => {
      const id = await store.createRecord('alice', '2026-03-01', d('10'));

      await store.updateAmount(id, d('12.50'));
      expect((await store.recordForDate('alice', '2026-03-01'))?.amount.toFixed(2)).toBe('12.50');
      await expect(store.updateAmount(42, d('1'))).rejects.toThrow(NotFoundError);
    });
  });

  describe('month queries', () => {
    beforeEach(async () => {
      await store.createRecord('alice', '2026-02-28', d('99.99'));
      await store.createRecord('alice', '2026-03-10', d('20.00'));
      await store.createRecord('alice', '2026-03-01', d('10.25'));
      await store.createRecord('alice', '2026-03-31', d('5.00'));
      await store.createRecord('alice', '2026-04-01', d('77.00'));
      await store.createRecord('bob', '2026-03-15', d('1000.00'));
    });

    it('should total only the owner and the month', async () => {
      expect((await store.monthlyTotal('alice', 2026, 3)).toFixed(2)).toBe('35.25');
      expect((await store.monthlyTotal('alice', 2026, 5)).toFixed(2)).toBe('0.00');
    });

    it('should list month records by date ascending', async () => {
      const records = await store.monthRecords('alice', 2026, 3);

      expect(records.map((r) => r.txDate)).toEqual(['2026-03-01', '2026-03-10', '2026-03-31']);
    });

    it('should delete only the month records', async () => {
      expect(await store.deleteMonthRecords('alice', 2026, 3)).toBe(3);
      expect(await store.monthRecords('alice', 2026, 3)).toEqual([]);
      expect((await store.monthlyTotal('alice', 2026, 2)).toFixed(2)).toBe('99.99');
      expect((await store.monthlyTotal('bob', 2026, 3)).toFixed(2)).toBe('1000.00');
    });

    it('should delete the latest record of the month', async () => {
      const removed = await store.deleteLatestMonthRecord('alice', 2026, 3);

      expect(removed?.txDate).toBe('2026-03-31');
      expect(removed?.amount.toFixed(2)).toBe('5.00');
      expect((await store.monthRecords('alice', 2026, 3)).map((r) => r.txDate)).toEqual(['2026-03-01', '2026-03-10']);
    });

    it('should return null when the month is empty', async () => {
      expect(await store.deleteLatestMonthRecord('alice', 2026, 6)).toBeNull();
      expect(await store.deleteMonthRecords('alice', 2026, 6)).toBe(0);
    });

    it('should total the year by month, omitting empty months', async () => {
      const totals = await store.yearTotals('alice', 2026);

      expect(totals.map((t) => [t.month, t.total.toFixed(2)])).toEqual([
        [2, '99.99'],
        [3, '35.25'],
        [4, '77.00'],
      ]);
      expect(await store.yearTotals('alice', 2025)).toEqual([]);
    });
  });

  describe('transaction', () => {
    it('should keep writes when the unit of work resolves', async () => {
      await store.transaction(async (ops) => {
        await ops.createRecord('alice', '2026-03-01', d('10'));
      });

      expect((await store.monthlyTotal('alice', 2026, 3)).toFixed(2)).toBe('10.00');
    });

    it('should roll back writes when the unit of work throws', async () => {
      await expect(
        store.transaction(async (ops) => {
          await ops.createRecord('alice', '2026-03-01', d('10'));
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await store.recordForDate('alice', '2026-03-01')).toBeNull();
      expect(await store.createRecord('alice', '2026-03-02', d('1'))).toBe(1);
    });

    it('should run units of work one at a time', async () => {
      const order: string[] = [];
      let releaseFirst: () => void = () => undefined;
      const firstBlocked = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      const first = store.transaction(async () => {
        order.push('first:start');
        await firstBlocked;
        order.push('first:end');
      });
      const second = store.transaction(async () => {
        order.push('second:start');
      });

      await new Promise((resolve) => setImmediate(resolve));
      expect(order).toEqual(['first:start']);

      releaseFirst();
      await Promise.all([first, second]);
      expect(order).toEqual(['first:start', 'first:end', 'second:start']);
    });
  });
});
