import { ConfigurationError, formatError, ReportError, ValidationError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { type ExpenseSource, NON_GROUP_EXPENSES_ID } from '../splitwise/types.js';
import {
  buildCategoryComparisonChart,
  buildCategoryShareChart,
  buildDailyTrendChart,
  type CategoryComparisonChart,
  type CategoryShareChart,
  type DailyTrendChart
} from './charts.js';
import { resolveDateRange } from './dateRange.js';
import { extractExpenses } from './extract.js';
import { summarizeByCategory, summarizeByDay, totalAmount } from './summary.js';
import { buildExpenseTable, DEFAULT_MONEY_FORMAT, type ExpenseTableRow, formatCurrency } from './table.js';
import {
  type CategoryTotal,
  type DailyTotal,
  type DateRange,
  type ExpenseRecord,
  type MoneyFormat,
  type ReportMode,
  type SkippedTransaction
} from './types.js';

export const EMPTY_REPORT_MESSAGE = 'No expenses found for this period and group.';
export const NON_GROUP_EXPENSES_NAME = 'Non-group expenses';

export interface ReportGroup {
  id: number
  name?: string
}

/**
 * Amounts in `records`, `total`, `categoryTotals` and `dailyTotals` are integers
 * in the smallest currency unit ($1.23 -> 123). Chart values are major units.
 */
export const AMOUNT_UNIT = 'minor';

export interface CompletedReport {
  status: 'ok'
  group?: ReportGroup
  range: DateRange
  amountUnit: typeof AMOUNT_UNIT
  records: ExpenseRecord[]
  table: ExpenseTableRow[]
  /** Minor currency units. */
  total: number
  totalFormatted: string
  categoryTotals: CategoryTotal[]
  dailyTotals: DailyTotal[]
  charts: {
    categoryShare: CategoryShareChart
    categoryComparison: CategoryComparisonChart
    dailyTrend: DailyTrendChart
  }
  skipped: SkippedTransaction[]
}

export interface EmptyReport {
  status: 'empty'
  group?: ReportGroup
  range: DateRange
  message: string
  skipped: SkippedTransaction[]
}

export type ReportFailureKind = 'initialization' | 'source-fetch' | 'invalid-request';

export interface FailedReport {
  status: 'error'
  kind: ReportFailureKind
  message: string
  code?: string
}

export type ReportResult = CompletedReport | EmptyReport | FailedReport;

export interface BuildReportInput {
  expenses: readonly unknown[]
  userId: string | number
  range: DateRange
  group?: ReportGroup
  format?: MoneyFormat
  logger?: Logger
}

/** Turns already-fetched expenses into a report. Performs no I/O. */
export const buildReport = (input: BuildReportInput): CompletedReport | EmptyReport => {
  const format = input.format ?? DEFAULT_MONEY_FORMAT;
  const { records, skipped } = extractExpenses(input.expenses, input.userId, { logger: input.logger });

  if (records.length === 0) {
    return { status: 'empty', group: input.group, range: input.range, message: EMPTY_REPORT_MESSAGE, skipped };
  }

  const categoryTotals = summarizeByCategory(records);
  const dailyTotals = summarizeByDay(records);
  const total = totalAmount(records);

  return {
    status: 'ok',
    group: input.group,
    range: input.range,
    amountUnit: AMOUNT_UNIT,
    records,
    table: buildExpenseTable(records, format),
    total,
    totalFormatted: formatCurrency(total, format),
    categoryTotals,
    dailyTotals,
    charts: {
      categoryShare: buildCategoryShareChart(categoryTotals),
      categoryComparison: buildCategoryComparisonChart(categoryTotals, format),
      dailyTrend: buildDailyTrendChart(dailyTotals, format)
    },
    skipped
  };
};

export interface ReportParams {
  groupId?: number | null
  groupName?: string | null
  year?: number | null
  month?: number | null
  mode?: ReportMode | null
}

export interface ReportOptions {
  format?: MoneyFormat
  widenLongMonths?: boolean
  expenseLimit?: number
  logger?: Logger
  now?: Date
}

const toFailure = (action: string, error: unknown): FailedReport => {
  const code = error instanceof ReportError ? error.code : undefined;
  if (error instanceof ConfigurationError) {
    return { status: 'error', kind: 'initialization', message: `Failed to initialize Splitwise: ${formatError(error)}`, code };
  }
  return { status: 'error', kind: 'source-fetch', message: `Failed to ${action}: ${formatError(error)}`, code };
};

/**
 * Fetches one group's expenses for the selected period and builds the report.
 * Bad selections and upstream failures come back as a `FailedReport`.
 */
export const generateReport = async (
  source: ExpenseSource,
  params: ReportParams = {},
  options: ReportOptions = {}
): Promise<ReportResult> => {
  const log = options.logger ?? rootLogger;

  let range: DateRange;
  try {
    range = resolveDateRange({
      mode: params.mode ?? undefined,
      year: params.year ?? undefined,
      month: params.month ?? undefined,
      widenLongMonths: options.widenLongMonths,
      now: options.now
    });
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    return { status: 'error', kind: 'invalid-request', message: error.message, code: error.code };
  }

  let group: ReportGroup;
  if (params.groupId !== undefined && params.groupId !== null) {
    group = params.groupId === NON_GROUP_EXPENSES_ID ? { id: NON_GROUP_EXPENSES_ID, name: NON_GROUP_EXPENSES_NAME } : { id: params.groupId };
  } else if (params.groupName !== undefined && params.groupName !== null && params.groupName.trim() !== '') {
    try {
      const found = await source.getGroupByName(params.groupName);
      group = { id: found.id, name: found.name };
    } catch (error) {
      log.error('Group lookup failed', { groupName: params.groupName, error: formatError(error) });
      return toFailure('fetch groups', error);
    }
  } else {
    group = { id: NON_GROUP_EXPENSES_ID, name: NON_GROUP_EXPENSES_NAME };
  }

  let userId: number;
  try {
    userId = (await source.getCurrentUser()).id;
  } catch (error) {
    log.error('Current user lookup failed', { error: formatError(error) });
    return toFailure('fetch current user', error);
  }

  let expenses: unknown[];
  try {
    expenses = await source.listExpenses({
      groupId: group.id,
      datedAfter: range.startDate,
      datedBefore: range.endDate,
      visibleOnly: true,
      limit: options.expenseLimit ?? 1000
    });
  } catch (error) {
    log.error('Expense listing failed', { groupId: group.id, error: formatError(error) });
    return toFailure('fetch expenses', error);
  }

  const report = buildReport({ expenses, userId, range, group, format: options.format, logger: log });
  log.info('Expense report generated', {
    groupId: group.id,
    startDate: range.startDate,
    endDate: range.endDate,
    status: report.status,
    records: report.status === 'ok' ? report.records.length : 0,
    skipped: report.skipped.length
  });
  return report;
};
