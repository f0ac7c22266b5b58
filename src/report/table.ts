import { MINOR_UNIT_DIGITS, toMajorUnits } from './transactions.js';
import { type ExpenseRecord, type MoneyFormat } from './types.js';

export const DEFAULT_MONEY_FORMAT: MoneyFormat = { currency: 'USD', locale: 'en-US' };

export interface ExpenseTableRow {
  date: string
  category: string
  description: string
  amount: string
}

export const formatCurrency = (minor: number, format: MoneyFormat = DEFAULT_MONEY_FORMAT): string =>
  new Intl.NumberFormat(format.locale, {
    style: 'currency',
    currency: format.currency,
    minimumFractionDigits: MINOR_UNIT_DIGITS,
    maximumFractionDigits: MINOR_UNIT_DIGITS
  }).format(toMajorUnits(minor));

/** Decimal places the currency is written with, or undefined for a code Intl rejects. */
export const currencyFractionDigits = (currency: string): number | undefined => {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency }).resolvedOptions().maximumFractionDigits;
  } catch (error) {
    if (error instanceof RangeError) return undefined;
    throw error;
  }
};

export const currencySymbol = (format: MoneyFormat = DEFAULT_MONEY_FORMAT): string => {
  const part = new Intl.NumberFormat(format.locale, { style: 'currency', currency: format.currency })
    .formatToParts(0)
    .find(p => p.type === 'currency');
  return part?.value ?? format.currency;
};

/** Newest first; records sharing a date keep their input order. */
export const buildExpenseTable = (records: readonly ExpenseRecord[], format: MoneyFormat = DEFAULT_MONEY_FORMAT): ExpenseTableRow[] =>
  [...records]
    .sort((a, b) => b.date.localeCompare(a.date))
    .map(record => ({
      date: record.date,
      category: record.category,
      description: record.description,
      amount: formatCurrency(record.amount, format)
    }));
