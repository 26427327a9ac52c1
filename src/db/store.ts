/**
 * Ledger Store Contracts
 *
 * Persistence seam for the ledger. Two implementations exist:
 * - PostgresLedgerStore (./postgres) for production
 * - MemoryLedgerStore (./memory) for tests and local runs
 *
 * All expense operations are scoped by owner (username). Dates are ISO
 * calendar dates ("YYYY-MM-DD"), amounts are Decimals.
 */

import type Decimal from 'decimal.js';

export interface UserAccount {
  username: string;
  /** Opaque notification address, never read by the ledger */
  destination: string;
  monthlyLimit: Decimal;
}

export interface ExpenseRecord {
  id: number;
  owner: string;
  txDate: string;
  amount: Decimal;
}

export interface MonthTotal {
  month: number;
  total: Decimal;
}

/**
 * Per-user configuration (registration identity and limit)
 */
export interface AccountRegistry {
  /** Returns false when the username already exists; the existing row is left untouched */
  createAccount(account: UserAccount): Promise<boolean>;

  findAccount(username: string): Promise<UserAccount | null>;

  /** Returns false when the username does not exist */
  updateLimit(username: string, limit: Decimal): Promise<boolean>;

  /** Distinct destinations of every registered account, sorted */
  notificationDestinations(): Promise<string[]>;
}

/**
 * Operations that change an owner's records, available inside a transaction
 *
 * Inside a transaction, `findAccount` also locks the account so concurrent
 * expense writes for the same owner run one after the other.
 */
export interface ExpenseOperations {
  findAccount(username: string): Promise<UserAccount | null>;

  recordForDate(owner: string, txDate: string): Promise<ExpenseRecord | null>;

  /** @throws ConflictError if a record already exists for (owner, txDate) */
  createRecord(owner: string, txDate: string, amount: Decimal): Promise<number>;

  /** @throws NotFoundError if the id is absent */
  updateAmount(id: number, amount: Decimal): Promise<void>;

  /** Sum over the inclusive month range; zero when empty */
  monthlyTotal(owner: string, year: number, month: number): Promise<Decimal>;

  deleteMonthRecords(owner: string, year: number, month: number): Promise<number>;

  /** Removes and returns the record with the latest date, then highest id */
  deleteLatestMonthRecord(owner: string, year: number, month: number): Promise<ExpenseRecord | null>;
}

export interface LedgerStore extends AccountRegistry, ExpenseOperations {
  /** Ordered by date ascending, then id descending */
  monthRecords(owner: string, year: number, month: number): Promise<ExpenseRecord[]>;

  /** Per-month totals, months without records omitted, ascending */
  yearTotals(owner: string, year: number): Promise<MonthTotal[]>;

  /**
   * Run `fn` as one unit of work
   *
   * Commits when `fn` resolves, rolls back when it throws.
   */
  transaction<T>(fn: (ops: ExpenseOperations) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
