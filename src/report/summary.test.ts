import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { summarizeByCategory, summarizeByDay, totalAmount } from './summary.js';
import { type ExpenseRecord } from './types.js';

const record = (category: string, amount: number, date: string): ExpenseRecord => ({
  category,
  amount,
  date,
  description: `${category} on ${date}`,
  basis: 'owed'
});

const records: ExpenseRecord[] = [
  record('Food', 1250, '2024-03-10'),
  record('Rent', 50000, '2024-03-01'),
  record('Food', 833, '2024-03-01'),
  record('Transport', 1999, '2024-03-22'),
  record('Food', 417, '2024-03-10')
];

describe('summarizeByCategory', () => {
  it('sums amounts per category in order of first appearance', () => {
    assert.deepEqual(summarizeByCategory(records), [
      { category: 'Food', total: 2500 },
      { category: 'Rent', total: 50000 },
      { category: 'Transport', total: 1999 }
    ]);
  });

  it('returns no rows for no records', () => {
    assert.deepEqual(summarizeByCategory([]), []);
  });
});

describe('summarizeByDay', () => {
  it('sums amounts per date, oldest first', () => {
    assert.deepEqual(summarizeByDay(records), [
      { date: '2024-03-01', total: 50833 },
      { date: '2024-03-10', total: 1667 },
      { date: '2024-03-22', total: 1999 }
    ]);
  });
});

describe('totalAmount', () => {
  it('agrees with both summaries', () => {
    const total = totalAmount(records);
    assert.equal(total, 54499);
    assert.equal(summarizeByCategory(records).reduce((sum, row) => sum + row.total, 0), total);
    assert.equal(summarizeByDay(records).reduce((sum, row) => sum + row.total, 0), total);
  });
});
