import { z } from 'zod';
import Decimal from 'decimal.js';
import { parseAmount } from './money';
import { HttpError } from './errors';

/**
 * Username validation
 * Same key width as the accounts table
 */
export const UsernameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required')
  .max(32, 'Username must not exceed 32 characters')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, "_", "." and "-"');

/**
 * Notification destination (opaque token)
 */
const destinationSchema = z
  .string()
  .trim()
  .min(1, 'Destination is required')
  .max(64, 'Destination must not exceed 64 characters');

/**
 * Money field: decimal string or JSON number, positive, two decimal places
 */
function moneySchema(field: string) {
  return z.union([z.string(), z.number()]).transform((value, ctx): Decimal => {
    try {
      return parseAmount(value, field);
    } catch (error) {
      if (!(error instanceof HttpError)) throw error;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
      return z.NEVER;
    }
  });
}

/**
 * Register request schema
 */
export const RegisterSchema = z.object({
  username: UsernameSchema,
  destination: destinationSchema,
});

export type RegisterInput = z.infer<typeof RegisterSchema>;

/**
 * Add expense request schema
 */
export const ExpenseSchema = z.object({
  amount: moneySchema('amount'),
});

export type ExpenseInput = z.infer<typeof ExpenseSchema>;

/**
 * Update limit request schema
 */
export const LimitSchema = z.object({
  limit: moneySchema('limit'),
});

export type LimitInput = z.infer<typeof LimitSchema>;

/**
 * Route params carrying a username
 */
export const UserParamsSchema = z.object({
  username: UsernameSchema,
});
