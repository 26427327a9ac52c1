/**
 * In-Memory Ledger Store
 *
 * Record arena plus an account map. Transactions are serialized by a single
 * mutex and roll back by restoring a snapshot of the arena.
 */

import Decimal from 'decimal.js';
import { ConflictError, NotFoundError } from '../lib/errors';
import { monthBounds } from '../lib/date';
import { Mutex } from '../lib/mutex';
import { ZERO } from '../lib/money';
import type {
  ExpenseOperations,
  ExpenseRecord,
  LedgerStore,
  MonthTotal,
  UserAccount,
} from './store';

function copyAccount(account: UserAccount): UserAccount {
  return { ...account, monthlyLimit: new Decimal(account.monthlyLimit) };
}

function copyRecord(record: ExpenseRecord): ExpenseRecord {
  return { ...record, amount: new Decimal(record.amount) };
}

export class MemoryLedgerStore implements LedgerStore {
  private accounts = new Map<string, UserAccount>();
  private records: ExpenseRecord[] = [];
  private nextId = 1;
  private readonly lock = new Mutex();

  // ============================================
  // ACCOUNTS
  // ============================================

  async createAccount(account: UserAccount): Promise<boolean> {
    if (this.accounts.has(account.username)) {
      return false;
    }
    this.accounts.set(account.username, copyAccount(account));
    return true;
  }

  async findAccount(username: string): Promise<UserAccount | null> {
    const account = this.accounts.get(username);
    return account ? copyAccount(account) : null;
  }

  async updateLimit(username: string, limit: Decimal): Promise<boolean> {
    const account = this.accounts.get(username);
    if (!account) {
      return false;
    }
    account.monthlyLimit = new Decimal(limit);
    return true;
  }

  async notificationDestinations(): Promise<string[]> {
    const destinations = new Set<string>();
    for (const account of this.accounts.values()) {
      destinations.add(account.destination);
    }
    return Array.from(destinations).sort();
  }

  // ============================================
  // EXPENSES
  // ============================================

  async recordForDate(owner: string, txDate: string): Promise<ExpenseRecord | null> {
    const record = this.records.find((r) => r.owner === owner && r.txDate === txDate);
    return record ? copyRecord(record) : null;
  }

  async createRecord(owner: string, txDate: string, amount: Decimal): Promise<number> {
    if (this.records.some((r) => r.owner === owner && r.txDate === txDate)) {
      throw new ConflictError(`Expense already recorded for ${owner} on ${txDate}`, { owner, txDate });
    }

    const id = this.nextId++;
    this.records.push({ id, owner, txDate, amount: new Decimal(amount) });
    return id;
  }

  async updateAmount(id: number, amount: Decimal): Promise<void> {
    const record = this.records.find((r) => r.id === id);
    if (!record) {
      throw new NotFoundError(`Expense with id ${id} not found`, { id });
    }
    record.amount = new Decimal(amount);
  }

  async monthlyTotal(owner: string, year: number, month: number): Promise<Decimal> {
    return this.inMonth(owner, year, month).reduce((acc, r) => acc.plus(r.amount), ZERO);
  }

  async monthRecords(owner: string, year: number, month: number): Promise<ExpenseRecord[]> {
    return this.inMonth(owner, year, month)
      .sort((a, b) => a.txDate.localeCompare(b.txDate) || b.id - a.id)
      .map(copyRecord);
  }

  async deleteMonthRecords(owner: string, year: number, month: number): Promise<number> {
    const doomed = new Set(this.inMonth(owner, year, month).map((r) => r.id));
    this.records = this.records.filter((r) => !doomed.has(r.id));
    return doomed.size;
  }

  async deleteLatestMonthRecord(owner: string, year: number, month: number): Promise<ExpenseRecord | null> {
    const [latest] = this.inMonth(owner, year, month)
      .sort((a, b) => b.txDate.localeCompare(a.txDate) || b.id - a.id);

    if (!latest) {
      return null;
    }

    this.records = this.records.filter((r) => r.id !== latest.id);
    return copyRecord(latest);
  }

  async yearTotals(owner: string, year: number): Promise<MonthTotal[]> {
    const totals = new Map<number, Decimal>();

    for (let month = 1; month <= 12; month++) {
      for (const record of this.inMonth(owner, year, month)) {
        totals.set(month, (totals.get(month) ?? ZERO).plus(record.amount));
      }
    }

    return Array.from(totals.entries())
      .sort(([a], [b]) => a - b)
      .map(([month, total]) => ({ month, total }));
  }

  // ============================================
  // UNIT OF WORK
  // ============================================

  async transaction<T>(fn: (ops: ExpenseOperations) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      const snapshot = this.records.map(copyRecord);
      const snapshotNextId = this.nextId;

      try {
        return await fn(this);
      } catch (error) {
        this.records = snapshot;
        this.nextId = snapshotNextId;
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    this.accounts.clear();
    this.records = [];
  }

  /**
   * Clear all entries (for testing)
   */
  clear(): void {
    this.accounts.clear();
    this.records = [];
    this.nextId = 1;
  }

  private inMonth(owner: string, year: number, month: number): ExpenseRecord[] {
    const { first, last } = monthBounds(year, month);
    return this.records.filter((r) => r.owner === owner && r.txDate >= first && r.txDate <= last);
  }
}
