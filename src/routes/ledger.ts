import { Router, Request, Response } from 'express';
import { ExpenseSchema, LimitSchema, RegisterSchema, UserParamsSchema } from '../lib/schemas';
import { asyncHandler } from '../lib/errors';
import { formatAmount } from '../lib/money';
import type { ExpenseEntry, LedgerEngine } from '../lib/ledger';
import { incExpenseDecision, incRegistration } from '../metrics';

function serializeEntry(entry: ExpenseEntry) {
  return { date: entry.date, amount: formatAmount(entry.amount) };
}

/**
 * Ledger routes
 *
 * Money fields in responses are two-decimal strings.
 */
export function createLedgerRouter(ledger: LedgerEngine): Router {
  const router = Router();

  /**
   * POST /users
   * Register a user
   *
   * Body: { username, destination }
   * Returns: 201 { status: "created" } | 200 { status: "already_exists" }
   */
  router.post('/users', asyncHandler(async (req: Request, res: Response) => {
    const input = RegisterSchema.parse(req.body);

    const result = await ledger.register(input.username, input.destination);
    incRegistration(result);

    res.status(result === 'created' ? 201 : 200).json({ status: result });
  }));

  /**
   * POST /users/:username/expenses
   * Record an expense for today
   *
   * Body: { amount }
   * Returns: 201 { status: "accepted", new_total, remaining }
   *        | 200 { status: "rejected", current, attempted, limit }
   */
  router.post('/users/:username/expenses', asyncHandler(async (req: Request, res: Response) => {
    const { username } = UserParamsSchema.parse(req.params);
    const input = ExpenseSchema.parse(req.body);

    const result = await ledger.addExpense(username, input.amount);
    incExpenseDecision(result.status);

    if (result.status === 'accepted') {
      res.status(201).json({
        status: result.status,
        new_total: formatAmount(result.newTotal),
        remaining: formatAmount(result.remaining),
      });
      return;
    }

    res.json({
      status: result.status,
      current: formatAmount(result.current),
      attempted: formatAmount(result.attempted),
      limit: formatAmount(result.limit),
    });
  }));

  /**
   * GET /users/:username/expenses
   * Current month's expenses, oldest first
   */
  router.get('/users/:username/expenses', asyncHandler(async (req: Request, res: Response) => {
    const { username } = UserParamsSchema.parse(req.params);

    const entries = await ledger.listMonth(username);

    res.json(entries.map(serializeEntry));
  }));

  /**
   * DELETE /users/:username/expenses
   * Clear the current month
   */
  router.delete('/users/:username/expenses', asyncHandler(async (req: Request, res: Response) => {
    const { username } = UserParamsSchema.parse(req.params);

    const deleted = await ledger.clearMonth(username);

    res.json({ deleted });
  }));

  /**
   * DELETE /users/:username/expenses/last
   * Remove the most recent expense of the current month
   */
  router.delete('/users/:username/expenses/last', asyncHandler(async (req: Request, res: Response) => {
    const { username } = UserParamsSchema.parse(req.params);

    const removed = await ledger.removeLast(username);

    res.json({ removed: removed ? serializeEntry(removed) : null });
  }));

  /**
   * GET /users/:username/summary
   * Spent, limit and remaining for the current month
   */
  router.get('/users/:username/summary', asyncHandler(async (req: Request, res: Response) => {
    const { username } = UserParamsSchema.parse(req.params);

    const summary = await ledger.monthlySummary(username);

    res.json({
      total_spent: formatAmount(summary.totalSpent),
      limit: formatAmount(summary.limit),
      remaining: formatAmount(summary.remaining),
    });
  }));

  /**
   * PUT /users/:username/limit
   * Change the monthly limit
   *
   * Body: { limit }
   */
  router.put('/users/:username/limit', asyncHandler(async (req: Request, res: Response) => {
    const { username } = UserParamsSchema.parse(req.params);
    const input = LimitSchema.parse(req.body);

    await ledger.updateLimit(username, input.limit);

    res.json({ status: 'ok', limit: formatAmount(input.limit) });
  }));

  /**
   * GET /users/:username/year
   * Per-month totals of the current year
   */
  router.get('/users/:username/year', asyncHandler(async (req: Request, res: Response) => {
    const { username } = UserParamsSchema.parse(req.params);

    const summary = await ledger.yearSummary(username);

    res.json({
      year: summary.year,
      months: summary.months.map((m) => ({
        month: m.month,
        month_name: m.monthName,
        total: formatAmount(m.total),
      })),
      grand_total: formatAmount(summary.grandTotal),
    });
  }));

  /**
   * GET /destinations
   * Notification destinations of every registered user
   */
  router.get('/destinations', asyncHandler(async (_req: Request, res: Response) => {
    const destinations = await ledger.notificationDestinations();

    res.json({ destinations });
  }));

  return router;
}
