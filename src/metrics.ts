/**
 * Prometheus Metrics
 *
 * Provides application metrics for monitoring:
 * - HTTP request counters and duration histograms
 * - Expense decisions (accepted / rejected)
 * - Registrations (created / already_exists)
 */

import { Registry, Counter, Histogram } from 'prom-client';

/**
 * Prometheus registry
 */
export const register = new Registry();

/**
 * HTTP request counter
 * Labels: route, method, status
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['route', 'method', 'status'],
  registers: [register],
});

/**
 * HTTP request duration histogram
 * Labels: route, method
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['route', 'method'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

/**
 * Expense decision counter
 * Labels: outcome (accepted/rejected)
 */
export const expenseDecisionsTotal = new Counter({
  name: 'ledger_expense_decisions_total',
  help: 'Total number of expense submissions by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

/**
 * Registration counter
 * Labels: result (created/already_exists)
 */
export const registrationsTotal = new Counter({
  name: 'ledger_registrations_total',
  help: 'Total number of registration calls by result',
  labelNames: ['result'],
  registers: [register],
});

/**
 * Helper: Increment HTTP request counter
 */
export function incHttpRequest(route: string, method: string, status: number): void {
  httpRequestsTotal.inc({
    route: normalizeRoute(route),
    method,
    status: String(status),
  });
}

/**
 * Helper: Observe HTTP request duration
 */
export function observeHttpDuration(route: string, method: string, durationSeconds: number): void {
  httpRequestDuration.observe({
    route: normalizeRoute(route),
    method,
  }, durationSeconds);
}

/**
 * Helper: Increment expense decision counter
 */
export function incExpenseDecision(outcome: 'accepted' | 'rejected'): void {
  expenseDecisionsTotal.inc({ outcome });
}

/**
 * Helper: Increment registration counter
 */
export function incRegistration(result: 'created' | 'already_exists'): void {
  registrationsTotal.inc({ result });
}

/**
 * Normalize route path to remove dynamic segments
 * Example: /users/alice/expenses -> /users/:username/expenses
 */
export function normalizeRoute(route: string): string {
  return route.replace(/^\/users\/[^/]+/, '/users/:username');
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Reset all metric values (for testing)
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
