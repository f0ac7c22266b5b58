import * as z from 'zod/v4';
import { decimalSchema, isCalendarDate } from './common.js';

const idSchema = z.union([z.number().int(), z.string().trim().min(1)]);

export const userSchema = z.object({
  id: z.number().int(),
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  email: z.string().nullish()
});

export const currentUserResponseSchema = z.object({ user: userSchema });

export const groupSchema = z.object({
  id: z.number().int(),
  name: z.string()
});

export const groupsResponseSchema = z.object({ groups: z.array(groupSchema) });

// Expenses are kept opaque here and validated one at a time, so a bad entry only drops itself.
export const expensesResponseSchema = z.object({ expenses: z.array(z.unknown()) });

export const expenseRefSchema = z.object({ id: idSchema });

export const participantRefSchema = z.object({ user_id: idSchema });

export const expenseShareSchema = z.object({
  user_id: idSchema,
  owed_share: decimalSchema,
  paid_share: decimalSchema
});

export const expenseSchema = z.object({
  id: idSchema,
  description: z.string(),
  date: z.string().refine(isCalendarDate, { message: 'Date must start with a valid YYYY-MM-DD' }),
  category: z.object({
    id: z.number().int().nullish(),
    name: z.string().nullish()
  }).nullish(),
  // Entries are read one at a time; only the reported user's shares are validated.
  users: z.array(z.unknown())
});

export const apiErrorBodySchema = z.object({
  error: z.string().optional(),
  errors: z.union([
    z.record(z.string(), z.union([z.string(), z.array(z.string())])),
    z.array(z.string())
  ]).optional()
});

export type SplitwiseUser = z.infer<typeof userSchema>;
export type SplitwiseGroup = z.infer<typeof groupSchema>;
