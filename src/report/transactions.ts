import { MalformedRecordError } from '../errors.js';
import { expenseRefSchema, expenseSchema, expenseShareSchema, participantRefSchema } from '../schemas/splitwise.js';
import { type Participant, type RawTransaction } from './types.js';

/** Amounts are held in hundredths, so only two-decimal currencies are reported. */
export const MINOR_UNIT_DIGITS = 2;
const MINOR_UNITS = 10 ** MINOR_UNIT_DIGITS;

/**
 * Converts a decimal amount ("12.5", "12.50", 12.5) to integer minor units,
 * rounding half away from zero at the minor unit.
 */
export const parseAmount = (value: string | number): number => {
  const numeric = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(numeric)) {
    throw new RangeError(`Not a finite amount: ${String(value)}`);
  }
  const scaled = Math.round(Math.abs(numeric) * MINOR_UNITS);
  return numeric < 0 ? -scaled : scaled;
};

export const toMajorUnits = (minor: number): number => minor / MINOR_UNITS;

interface Issue {
  path: readonly PropertyKey[]
  message: string
}

const malformed = (
  expenseId: string | undefined,
  issues: readonly Issue[],
  prefix: readonly PropertyKey[] = []
): MalformedRecordError => {
  const lines = issues.map(issue => {
    const path = [...prefix, ...issue.path].map(String).join('.');
    return path === '' ? issue.message : `${path}: ${issue.message}`;
  });
  return new MalformedRecordError(
    `Malformed expense${expenseId !== undefined ? ` ${expenseId}` : ''}: ${lines.join('; ')}`,
    expenseId,
    lines
  );
};

/**
 * Validates the envelope of one upstream expense (id, date, description,
 * category). Participant entries are kept as received.
 */
export const parseRawTransaction = (payload: unknown): RawTransaction => {
  const parsed = expenseSchema.safeParse(payload);
  if (!parsed.success) {
    const ref = expenseRefSchema.safeParse(payload);
    throw malformed(ref.success ? String(ref.data.id) : undefined, parsed.error.issues);
  }

  const expense = parsed.data;
  const categoryName = expense.category?.name;
  return {
    id: String(expense.id),
    category: categoryName !== undefined && categoryName !== null && categoryName.trim() !== '' ? categoryName : null,
    date: expense.date.slice(0, 10),
    description: expense.description,
    participants: expense.users
  };
};

/**
 * Finds one user's entry by id and reads their shares. Other participants'
 * entries are never validated; a bad share on the matched entry throws.
 */
export const findParticipant = (transaction: RawTransaction, targetUserId: string | number): Participant | null => {
  const userId = String(targetUserId);
  const index = transaction.participants.findIndex(entry => {
    const ref = participantRefSchema.safeParse(entry);
    return ref.success && String(ref.data.user_id) === userId;
  });
  if (index === -1) return null;

  const parsed = expenseShareSchema.safeParse(transaction.participants[index]);
  if (!parsed.success) {
    throw malformed(transaction.id, parsed.error.issues, ['users', index]);
  }
  return {
    userId,
    owedShare: parseAmount(parsed.data.owed_share),
    paidShare: parseAmount(parsed.data.paid_share)
  };
};
