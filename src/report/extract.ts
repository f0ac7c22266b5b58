import { MalformedRecordError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { findParticipant, parseRawTransaction } from './transactions.js';
import {
  type AttributionBasis,
  type ExpenseRecord,
  type Participant,
  type RawTransaction,
  type SkippedTransaction
} from './types.js';

export const UNCATEGORIZED = 'Uncategorized';
export const EXCLUDED_CATEGORY = 'general';

interface AttributionRule {
  basis: AttributionBasis
  applies: (share: Participant) => boolean
  amount: (share: Participant) => number
}

/**
 * Which of a participant's shares counts as their expense. Rows are tried in
 * order and the first match wins; no match means the transaction is not theirs.
 */
export const ATTRIBUTION_RULES: readonly AttributionRule[] = [
  // What this user owes for the expense, whoever fronted the money.
  { basis: 'owed', applies: share => share.owedShare > 0, amount: share => share.owedShare },
  // Paid on someone else's behalf while owing nothing.
  { basis: 'paid', applies: share => share.owedShare === 0 && share.paidShare > 0, amount: share => share.paidShare }
];

export const attributeShare = (share: Participant): { basis: AttributionBasis, amount: number } | null => {
  const rule = ATTRIBUTION_RULES.find(candidate => candidate.applies(share));
  return rule === undefined ? null : { basis: rule.basis, amount: rule.amount(share) };
};

export const resolveCategory = (category: string | null): string | null => {
  const name = category ?? UNCATEGORIZED;
  return name.toLowerCase() === EXCLUDED_CATEGORY ? null : name;
};

/**
 * The target user's record for one transaction, or null when none is owed.
 * The category rule runs before any participant entry is read.
 */
export const attributeTransaction = (transaction: RawTransaction, targetUserId: string | number): ExpenseRecord | null => {
  const category = resolveCategory(transaction.category);
  if (category === null) return null;

  const share = findParticipant(transaction, targetUserId);
  if (share === null) return null;

  const attribution = attributeShare(share);
  if (attribution === null) return null;

  return Object.freeze({
    category,
    amount: attribution.amount,
    date: transaction.date,
    description: transaction.description,
    basis: attribution.basis
  });
};

export interface ExtractionResult {
  records: ExpenseRecord[]
  skipped: SkippedTransaction[]
}

export const extractExpenses = (
  payloads: readonly unknown[],
  targetUserId: string | number,
  options: { logger?: Logger } = {}
): ExtractionResult => {
  const log = options.logger ?? rootLogger;
  const records: ExpenseRecord[] = [];
  const skipped: SkippedTransaction[] = [];

  for (const payload of payloads) {
    try {
      const record = attributeTransaction(parseRawTransaction(payload), targetUserId);
      if (record !== null) records.push(record);
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) throw error;
      log.warn('Skipping malformed expense', { expenseId: error.expenseId, issues: error.issues });
      skipped.push({ expenseId: error.expenseId, reason: error.message });
    }
  }

  return { records, skipped };
};
