import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildExpenseTable, currencyFractionDigits, currencySymbol, formatCurrency } from './table.js';
import { type ExpenseRecord } from './types.js';

const record = (description: string, date: string, amount: number): ExpenseRecord => ({
  category: 'Food',
  amount,
  date,
  description,
  basis: 'owed'
});

describe('formatCurrency', () => {
  it('formats minor units as dollars by default', () => {
    assert.equal(formatCurrency(1250), '$12.50');
    assert.equal(formatCurrency(123456), '$1,234.56');
    assert.equal(formatCurrency(5), '$0.05');
  });

  it('uses the requested currency', () => {
    assert.equal(formatCurrency(1250, { currency: 'EUR', locale: 'en-US' }), '€12.50');
  });
});

describe('currencySymbol', () => {
  it('returns the symbol for the currency', () => {
    assert.equal(currencySymbol(), '$');
    assert.equal(currencySymbol({ currency: 'GBP', locale: 'en-US' }), '£');
  });
});

describe('buildExpenseTable', () => {
  it('lists the newest expenses first with formatted amounts', () => {
    const rows = buildExpenseTable([
      record('Bakery', '2024-03-02', 450),
      record('Market', '2024-03-20', 1999),
      record('Cafe', '2024-03-11', 300)
    ]);
    assert.deepEqual(rows, [
      { date: '2024-03-20', category: 'Food', description: 'Market', amount: '$19.99' },
      { date: '2024-03-11', category: 'Food', description: 'Cafe', amount: '$3.00' },
      { date: '2024-03-02', category: 'Food', description: 'Bakery', amount: '$4.50' }
    ]);
  });

  it('keeps input order for expenses on the same day', () => {
    const rows = buildExpenseTable([
      record('First', '2024-03-05', 100),
      record('Second', '2024-03-05', 200)
    ]);
    assert.deepEqual(rows.map(r => r.description), ['First', 'Second']);
  });

  it('does not reorder the records it was given', () => {
    const input = [record('Old', '2024-03-01', 100), record('New', '2024-03-09', 100)];
    buildExpenseTable(input);
    assert.deepEqual(input.map(r => r.description), ['Old', 'New']);
  });
});

describe('currencyFractionDigits', () => {
  it('reads the decimal places a currency is written with', () => {
    assert.equal(currencyFractionDigits('USD'), 2);
    assert.equal(currencyFractionDigits('eur'), 2);
    assert.equal(currencyFractionDigits('JPY'), 0);
    assert.equal(currencyFractionDigits('KWD'), 3);
  });

  it('returns undefined for codes that are not well formed', () => {
    assert.equal(currencyFractionDigits('E1'), undefined);
  });
});
