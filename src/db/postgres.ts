/**
 * PostgreSQL Ledger Store
 *
 * Durable store over node-postgres. Queries use positional placeholders
 * ($1, $2, ...) only.
 *
 * Table layout:
 *   accounts: one row per username (limit, notification destination)
 *   expenses: one row per (username, tx_date), enforced by a UNIQUE constraint
 */

import Decimal from 'decimal.js';
import type pino from 'pino';
import { z } from 'zod';
import { ConflictError, HttpError, NotFoundError, StorageError } from '../lib/errors';
import { monthBounds } from '../lib/date';
import { formatAmount } from '../lib/money';
import { logger as rootLogger } from '../middleware/logging';
import type {
  ExpenseOperations,
  ExpenseRecord,
  LedgerStore,
  MonthTotal,
  UserAccount,
} from './store';

/**
 * Query surface shared by pg's Pool and PoolClient
 */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface PgClientLike extends PgQueryable {
  release(err?: Error | boolean): void;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

// Row shapes are checked on the way in; numerics arrive as text, BIGINT ids as strings
const AccountRow = z.object({
  username: z.string(),
  destination: z.string(),
  monthly_limit: z.string(),
});

const ExpenseRow = z.object({
  id: z.coerce.number().int(),
  username: z.string(),
  tx_date: z.string(),
  amount: z.string(),
});

const IdRow = z.object({ id: z.coerce.number().int() });
const TotalRow = z.object({ total: z.string() });
const MonthTotalRow = z.object({ month: z.coerce.number().int(), total: z.string() });
const DestinationRow = z.object({ destination: z.string() });

type AccountRow = z.infer<typeof AccountRow>;
type ExpenseRow = z.infer<typeof ExpenseRow>;

const UNIQUE_VIOLATION = '23505';

const EXPENSE_COLUMNS = `id, username, to_char(tx_date, 'YYYY-MM-DD') AS tx_date, amount::text AS amount`;

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS accounts (
    username VARCHAR(32) PRIMARY KEY,
    destination VARCHAR(64) NOT NULL,
    monthly_limit NUMERIC(10, 2) NOT NULL DEFAULT 210.00
  )`,
  `CREATE TABLE IF NOT EXISTS expenses (
    id BIGSERIAL PRIMARY KEY,
    username VARCHAR(32) NOT NULL REFERENCES accounts (username),
    tx_date DATE NOT NULL,
    amount NUMERIC(10, 2) NOT NULL,
    CONSTRAINT expenses_username_tx_date_key UNIQUE (username, tx_date)
  )`,
];

function toAccount(row: AccountRow): UserAccount {
  return {
    username: row.username,
    destination: row.destination,
    monthlyLimit: new Decimal(row.monthly_limit),
  };
}

function toRecord(row: ExpenseRow): ExpenseRecord {
  return {
    id: row.id,
    owner: row.username,
    txDate: row.tx_date,
    amount: new Decimal(row.amount),
  };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Expense operations bound to a pool or to one transaction's client
 */
class PostgresExpenseOperations implements ExpenseOperations {
  constructor(
    protected readonly db: PgQueryable,
    protected readonly log: pino.Logger,
    private readonly lockAccounts: boolean,
  ) {}

  /**
   * Run a query, wrapping driver failures in StorageError
   */
  private async query(
    op: string,
    text: string,
    values: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }> {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      if (error instanceof HttpError) throw error;

      if (op === 'createRecord' && errorCode(error) === UNIQUE_VIOLATION) {
        throw new ConflictError('Expense already recorded for this date', { op });
      }

      this.log.error({ event: 'storage_error', op, code: errorCode(error), err: error });
      throw new StorageError(undefined, error);
    }
  }

  /**
   * Run a query returning rows of a known shape
   */
  protected async select<T>(
    op: string,
    text: string,
    values: unknown[],
    row: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const result = await this.query(op, text, values);
    const parsed = z.array(row).safeParse(result.rows);

    if (!parsed.success) {
      this.log.error({ event: 'storage_error', op, issues: parsed.error.issues });
      throw new StorageError(undefined, parsed.error);
    }

    return parsed.data;
  }

  /**
   * Run a statement and return the affected row count
   */
  protected async execute(op: string, text: string, values: unknown[] = []): Promise<number> {
    const result = await this.query(op, text, values);
    return result.rowCount ?? 0;
  }

  /**
   * Issue a transaction control statement
   */
  async control(statement: 'BEGIN' | 'COMMIT' | 'ROLLBACK'): Promise<void> {
    await this.execute(statement.toLowerCase(), statement);
  }

  async findAccount(username: string): Promise<UserAccount | null> {
    const [row] = await this.select(
      'findAccount',
      `SELECT username, destination, monthly_limit::text AS monthly_limit
       FROM accounts
       WHERE username = $1${this.lockAccounts ? ' FOR UPDATE' : ''}`,
      [username],
      AccountRow,
    );
    return row ? toAccount(row) : null;
  }

  async recordForDate(owner: string, txDate: string): Promise<ExpenseRecord | null> {
    const [row] = await this.select(
      'recordForDate',
      `SELECT ${EXPENSE_COLUMNS}
       FROM expenses
       WHERE username = $1 AND tx_date = $2::date`,
      [owner, txDate],
      ExpenseRow,
    );
    return row ? toRecord(row) : null;
  }

  async createRecord(owner: string, txDate: string, amount: Decimal): Promise<number> {
    const [row] = await this.select(
      'createRecord',
      `INSERT INTO expenses (username, tx_date, amount)
       VALUES ($1, $2::date, $3::numeric)
       RETURNING id`,
      [owner, txDate, formatAmount(amount)],
      IdRow,
    );
    if (!row) {
      throw new StorageError('Insert returned no id');
    }
    return row.id;
  }

  async updateAmount(id: number, amount: Decimal): Promise<void> {
    const updated = await this.execute(
      'updateAmount',
      `UPDATE expenses SET amount = $2::numeric WHERE id = $1`,
      [id, formatAmount(amount)],
    );
    if (updated === 0) {
      throw new NotFoundError(`Expense with id ${id} not found`, { id });
    }
  }

  async monthlyTotal(owner: string, year: number, month: number): Promise<Decimal> {
    const { first, last } = monthBounds(year, month);
    const [row] = await this.select(
      'monthlyTotal',
      `SELECT COALESCE(SUM(amount), 0)::text AS total
       FROM expenses
       WHERE username = $1 AND tx_date >= $2::date AND tx_date <= $3::date`,
      [owner, first, last],
      TotalRow,
    );
    return new Decimal(row?.total ?? 0);
  }

  async deleteMonthRecords(owner: string, year: number, month: number): Promise<number> {
    const { first, last } = monthBounds(year, month);
    return this.execute(
      'deleteMonthRecords',
      `DELETE FROM expenses
       WHERE username = $1 AND tx_date >= $2::date AND tx_date <= $3::date`,
      [owner, first, last],
    );
  }

  async deleteLatestMonthRecord(owner: string, year: number, month: number): Promise<ExpenseRecord | null> {
    const { first, last } = monthBounds(year, month);
    const [row] = await this.select(
      'deleteLatestMonthRecord',
      `DELETE FROM expenses
       WHERE id = (
         SELECT id FROM expenses
         WHERE username = $1 AND tx_date >= $2::date AND tx_date <= $3::date
         ORDER BY tx_date DESC, id DESC
         LIMIT 1
       )
       RETURNING ${EXPENSE_COLUMNS}`,
      [owner, first, last],
      ExpenseRow,
    );
    return row ? toRecord(row) : null;
  }
}

export interface PostgresStoreOptions {
  pool: PgPoolLike;
  logger?: pino.Logger;
}

/**
 * Postgres-backed implementation of LedgerStore
 */
export class PostgresLedgerStore extends PostgresExpenseOperations implements LedgerStore {
  private readonly pool: PgPoolLike;

  constructor(options: PostgresStoreOptions) {
    super(options.pool, (options.logger ?? rootLogger).child({ component: 'postgres-store' }), false);
    this.pool = options.pool;
  }

  /**
   * Create tables if they do not exist
   */
  async migrate(): Promise<void> {
    for (const statement of SCHEMA_STATEMENTS) {
      await this.execute('migrate', statement);
    }
  }

  // ============================================
  // ACCOUNTS
  // ============================================

  async createAccount(account: UserAccount): Promise<boolean> {
    const inserted = await this.execute(
      'createAccount',
      `INSERT INTO accounts (username, destination, monthly_limit)
       VALUES ($1, $2, $3::numeric)
       ON CONFLICT (username) DO NOTHING`,
      [account.username, account.destination, formatAmount(account.monthlyLimit)],
    );
    return inserted === 1;
  }

  async updateLimit(username: string, limit: Decimal): Promise<boolean> {
    const updated = await this.execute(
      'updateLimit',
      `UPDATE accounts SET monthly_limit = $2::numeric WHERE username = $1`,
      [username, formatAmount(limit)],
    );
    return updated > 0;
  }

  async notificationDestinations(): Promise<string[]> {
    const rows = await this.select(
      'notificationDestinations',
      `SELECT DISTINCT destination FROM accounts ORDER BY destination ASC`,
      [],
      DestinationRow,
    );
    return rows.map((r) => r.destination);
  }

  // ============================================
  // EXPENSES
  // ============================================

  async monthRecords(owner: string, year: number, month: number): Promise<ExpenseRecord[]> {
    const { first, last } = monthBounds(year, month);
    const rows = await this.select(
      'monthRecords',
      `SELECT ${EXPENSE_COLUMNS}
       FROM expenses
       WHERE username = $1 AND tx_date >= $2::date AND tx_date <= $3::date
       ORDER BY tx_date ASC, id DESC`,
      [owner, first, last],
      ExpenseRow,
    );
    return rows.map(toRecord);
  }

  async yearTotals(owner: string, year: number): Promise<MonthTotal[]> {
    const rows = await this.select(
      'yearTotals',
      `SELECT EXTRACT(MONTH FROM tx_date)::int AS month, SUM(amount)::text AS total
       FROM expenses
       WHERE username = $1 AND tx_date >= $2::date AND tx_date <= $3::date
       GROUP BY 1
       ORDER BY 1 ASC`,
      [owner, monthBounds(year, 1).first, monthBounds(year, 12).last],
      MonthTotalRow,
    );
    return rows.map((r) => ({ month: r.month, total: new Decimal(r.total) }));
  }

  // ============================================
  // UNIT OF WORK
  // ============================================

  /**
   * Run `fn` inside BEGIN/COMMIT on a dedicated client
   *
   * Account lookups inside the transaction take a row lock (FOR UPDATE),
   * so two expense writes for the same owner never read a stale total.
   */
  async transaction<T>(fn: (ops: ExpenseOperations) => Promise<T>): Promise<T> {
    let client: PgClientLike;
    try {
      client = await this.pool.connect();
    } catch (error) {
      this.log.error({ event: 'storage_error', op: 'connect', err: error });
      throw new StorageError(undefined, error);
    }

    const ops = new PostgresExpenseOperations(client, this.log, true);
    let broken: Error | undefined;

    try {
      await ops.control('BEGIN');
      const result = await fn(ops);
      await ops.control('COMMIT');
      return result;
    } catch (error) {
      try {
        await ops.control('ROLLBACK');
      } catch (rollbackError) {
        // Hand the client back as broken so the pool discards it
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }

  async close(): Promise<void> {
    try {
      await this.pool.end();
    } catch (error) {
      this.log.error({ event: 'storage_error', op: 'close', err: error });
      throw new StorageError(undefined, error);
    }
  }
}
