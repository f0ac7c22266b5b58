import { type CategoryTotal, type DailyTotal, type ExpenseRecord } from './types.js';

const sumBy = (records: readonly ExpenseRecord[], key: (record: ExpenseRecord) => string): Map<string, number> => {
  const totals = new Map<string, number>();
  for (const record of records) {
    const k = key(record);
    totals.set(k, (totals.get(k) ?? 0) + record.amount);
  }
  return totals;
};

/** One row per category, in order of first appearance. */
export const summarizeByCategory = (records: readonly ExpenseRecord[]): CategoryTotal[] =>
  [...sumBy(records, r => r.category).entries()].map(([category, total]) => ({ category, total }));

export const summarizeByDay = (records: readonly ExpenseRecord[]): DailyTotal[] =>
  [...sumBy(records, r => r.date).entries()]
    .map(([date, total]) => ({ date, total }))
    .sort((a, b) => a.date.localeCompare(b.date));

export const totalAmount = (records: readonly ExpenseRecord[]): number =>
  records.reduce((sum, record) => sum + record.amount, 0);
