import * as z from 'zod/v4';

export const nonEmptyString = z.string().trim().min(1);
export const monthSchema = z.number().int().min(1).max(12);
export const yearSchema = z.number().int().min(2000).max(2100);
export const groupIdSchema = z.number().int().min(0);

export const reportModeSchema = z.enum(['calendar', 'discover']);

/** Decimal amount as the upstream sends it: a string such as "12.50", or a plain number. */
export const decimalSchema = z.union([
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, { message: 'Amount must be a decimal number' }),
  z.number()
]);

export const isCalendarDate = (value: string): boolean => {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (match === null) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

/** Report selection shared by the report tools. */
export const reportSelectionShape = {
  groupId: groupIdSchema.nullish().describe('Splitwise group ID; 0 is the non-group expenses bucket'),
  groupName: nonEmptyString.nullish().describe('Group name (case-insensitive), used when groupId is not given'),
  year: yearSchema.nullish().describe('Year, defaults to the current year'),
  month: monthSchema.nullish().describe('Month 1-12, defaults to the current month'),
  mode: reportModeSchema.nullish().describe('calendar (default) or discover (26th of prior month to 26th)')
};
