/**
 * Expense Ledger
 *
 * Per-user monthly ledger with a spend limit. At most one record exists per
 * user and day; a second expense on the same day is merged into it. All
 * totals are recomputed from the store on every call, so a new month starts
 * as soon as the clock crosses into it.
 */

import Decimal from 'decimal.js';
import type pino from 'pino';
import type { LedgerStore } from '../db/store';
import { AccountNotFoundError } from './errors';
import { Clock, monthName, yearMonthOf } from './date';
import { decide } from './policy';
import { assertAmount, sum } from './money';
import { logger as rootLogger } from '../middleware/logging';

export type RegistrationResult = 'created' | 'already_exists';

export type AddExpenseResult =
  | { status: 'accepted'; newTotal: Decimal; remaining: Decimal }
  | { status: 'rejected'; current: Decimal; attempted: Decimal; limit: Decimal };

export interface MonthlySummary {
  totalSpent: Decimal;
  limit: Decimal;
  remaining: Decimal;
}

export interface ExpenseEntry {
  date: string;
  amount: Decimal;
}

export interface MonthSummaryLine {
  month: number;
  monthName: string;
  total: Decimal;
}

export interface YearSummary {
  year: number;
  months: MonthSummaryLine[];
  grandTotal: Decimal;
}

export interface LedgerOptions {
  store: LedgerStore;
  clock: Clock;
  /** Limit given to newly registered accounts */
  defaultLimit: Decimal;
  logger?: pino.Logger;
}

export class LedgerEngine {
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly defaultLimit: Decimal;
  private readonly log: pino.Logger;

  constructor(options: LedgerOptions) {
    assertAmount(options.defaultLimit, 'defaultLimit');
    this.store = options.store;
    this.clock = options.clock;
    this.defaultLimit = options.defaultLimit;
    this.log = (options.logger ?? rootLogger).child({ component: 'ledger' });
  }

  /**
   * Register a user. Repeat calls are a no-op and do not touch the destination.
   */
  async register(username: string, destination: string): Promise<RegistrationResult> {
    const created = await this.store.createAccount({
      username,
      destination,
      monthlyLimit: this.defaultLimit,
    });

    const result: RegistrationResult = created ? 'created' : 'already_exists';
    this.log.info({ event: 'account_registered', username, result });
    return result;
  }

  /**
   * Record an expense for today, provided the month stays within the limit
   *
   * Account lookup, both reads and the write run in one transaction.
   * A rejected expense leaves the store untouched.
   */
  async addExpense(username: string, amount: Decimal): Promise<AddExpenseResult> {
    assertAmount(amount, 'amount');

    const date = this.clock.today();
    const { year, month } = yearMonthOf(date);

    const result = await this.store.transaction(async (ops): Promise<AddExpenseResult> => {
      const account = await ops.findAccount(username);
      if (!account) {
        throw new AccountNotFoundError(username);
      }

      const currentTotal = await ops.monthlyTotal(username, year, month);
      const existing = await ops.recordForDate(username, date);

      const decision = decide({
        currentTotal,
        existingAmount: existing?.amount ?? null,
        proposed: amount,
        limit: account.monthlyLimit,
      });

      if (decision.kind === 'reject') {
        return {
          status: 'rejected',
          current: decision.current,
          attempted: decision.attempted,
          limit: decision.limit,
        };
      }

      if (existing) {
        await ops.updateAmount(existing.id, decision.recordAmount);
      } else {
        await ops.createRecord(username, date, decision.recordAmount);
      }

      return {
        status: 'accepted',
        newTotal: decision.newTotal,
        remaining: account.monthlyLimit.minus(decision.newTotal),
      };
    });

    if (result.status === 'accepted') {
      this.log.info({
        event: 'expense_accepted',
        username,
        date,
        amount: amount.toString(),
        newTotal: result.newTotal.toString(),
      });
    } else {
      this.log.info({
        event: 'expense_rejected',
        username,
        date,
        attempted: amount.toString(),
        current: result.current.toString(),
        limit: result.limit.toString(),
      });
    }

    return result;
  }

  /**
   * Spent, limit and remaining for the current month
   */
  async monthlySummary(username: string): Promise<MonthlySummary> {
    const account = await this.store.findAccount(username);
    if (!account) {
      throw new AccountNotFoundError(username);
    }

    const { year, month } = yearMonthOf(this.clock.today());
    const totalSpent = await this.store.monthlyTotal(username, year, month);

    return {
      totalSpent,
      limit: account.monthlyLimit,
      remaining: account.monthlyLimit.minus(totalSpent),
    };
  }

  async updateLimit(username: string, limit: Decimal): Promise<void> {
    assertAmount(limit, 'limit');

    const updated = await this.store.updateLimit(username, limit);
    if (!updated) {
      throw new AccountNotFoundError(username);
    }

    this.log.info({ event: 'limit_updated', username, limit: limit.toString() });
  }

  /**
   * Current month's records, oldest date first
   */
  async listMonth(username: string): Promise<ExpenseEntry[]> {
    const { year, month } = yearMonthOf(this.clock.today());
    const records = await this.store.monthRecords(username, year, month);
    return records.map((r) => ({ date: r.txDate, amount: r.amount }));
  }

  /**
   * Delete every record of the current month
   *
   * Runs in a transaction behind the account lock, so it never interleaves
   * with an expense being applied for the same owner.
   */
  async clearMonth(username: string): Promise<number> {
    const { year, month } = yearMonthOf(this.clock.today());

    const deleted = await this.store.transaction(async (ops) => {
      await ops.findAccount(username);
      return ops.deleteMonthRecords(username, year, month);
    });

    this.log.info({ event: 'month_cleared', username, year, month, deleted });
    return deleted;
  }

  /**
   * Delete the most recent record of the current month
   */
  async removeLast(username: string): Promise<ExpenseEntry | null> {
    const { year, month } = yearMonthOf(this.clock.today());

    const removed = await this.store.transaction(async (ops) => {
      await ops.findAccount(username);
      return ops.deleteLatestMonthRecord(username, year, month);
    });

    if (!removed) {
      return null;
    }

    this.log.info({ event: 'expense_removed', username, date: removed.txDate, amount: removed.amount.toString() });
    return { date: removed.txDate, amount: removed.amount };
  }

  /**
   * Totals per month of the current year (empty months omitted)
   */
  async yearSummary(username: string): Promise<YearSummary> {
    const { year } = yearMonthOf(this.clock.today());
    const totals = await this.store.yearTotals(username, year);

    return {
      year,
      months: totals.map(({ month, total }) => ({ month, monthName: monthName(month), total })),
      grandTotal: sum(totals.map((t) => t.total)),
    };
  }

  async notificationDestinations(): Promise<string[]> {
    return this.store.notificationDestinations();
  }
}
