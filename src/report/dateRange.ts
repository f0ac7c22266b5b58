import { ValidationError } from '../errors.js';
import { type DateRange, type ReportMode } from './types.js';

export const DISCOVER_CUTOFF_DAY = 26;

export const toIsoDate = (d: Date): string =>
  `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}-${String(d.getUTCDate()).padStart(2, '0')}`;

export const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

export interface DateRangeRequest {
  mode?: ReportMode
  year?: number
  month?: number
  /**
   * Calendar mode only. When on, a 30- or 31-day month ends on the 1st of the
   * following month instead of its own last day. February is never widened.
   */
  widenLongMonths?: boolean
  now?: Date
}

export const resolveDateRange = (request: DateRangeRequest = {}): DateRange => {
  const now = request.now ?? new Date();
  const mode = request.mode ?? 'calendar';
  const year = request.year ?? now.getFullYear();
  const month = request.month ?? now.getMonth() + 1;

  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError(`Month must be between 1 and 12, got ${month}`);
  }
  if (!Number.isInteger(year)) {
    throw new ValidationError(`Year must be an integer, got ${year}`);
  }

  if (mode === 'discover') {
    // Date.UTC rolls month 0 back to December of the prior year.
    const start = new Date(Date.UTC(year, month - 2, DISCOVER_CUTOFF_DAY));
    const end = new Date(Date.UTC(year, month - 1, DISCOVER_CUTOFF_DAY));
    return { startDate: toIsoDate(start), endDate: toIsoDate(end), mode };
  }

  const lastDay = daysInMonth(year, month);
  const start = new Date(Date.UTC(year, month - 1, 1));
  const widen = (request.widenLongMonths ?? true) && (lastDay === 30 || lastDay === 31);
  const end = widen
    ? new Date(Date.UTC(year, month, 1))
    : new Date(Date.UTC(year, month - 1, lastDay));
  return { startDate: toIsoDate(start), endDate: toIsoDate(end), mode };
};
