import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createErrorResult } from '../errors.js';
import { logger } from '../logger.js';
import { resolveDateRange } from '../report/dateRange.js';
import {
  type CompletedReport,
  type FailedReport,
  generateReport,
  type ReportOptions,
  type ReportParams
} from '../report/report.js';
import { monthSchema, reportModeSchema, reportSelectionShape, yearSchema } from '../schemas/common.js';
import { type ExpenseSource } from '../splitwise/types.js';

const AMOUNT_NOTE = 'Totals and record amounts are integers in the smallest currency unit (e.g., $1.23 -> 123); chart values are in major units (1.23).';

export type ReportSettings = Pick<ReportOptions, 'format' | 'widenLongMonths' | 'expenseLimit'>;

const jsonResult = (value: unknown): CallToolResult => ({
  content: [{ type: 'text', text: JSON.stringify(value, null, 2) }]
});

const failureResult = (failure: FailedReport): CallToolResult => ({
  content: [{ type: 'text', text: `Error: ${failure.message}` }],
  isError: true,
  _meta: { errorKind: failure.kind, errorCode: failure.code ?? null }
});

/**
 * Runs one report and shapes the tool result: `view` picks what a completed
 * report returns, an empty period is an informational message rather than an error.
 */
const runReport = async (
  source: ExpenseSource,
  params: ReportParams,
  settings: ReportSettings,
  view: (report: CompletedReport) => unknown
): Promise<CallToolResult> => {
  try {
    const report = await generateReport(source, params, { ...settings, logger });
    switch (report.status) {
      case 'ok':
        return jsonResult(view(report));
      case 'empty':
        return {
          content: [{ type: 'text', text: `${report.message} (${report.range.startDate} to ${report.range.endDate})` }],
          isError: false
        };
      case 'error':
        return failureResult(report);
    }
  } catch (error) {
    logger.error('Report tool failed', { error: String(error) });
    return createErrorResult(error);
  }
};

export const registerTools = (server: McpServer, source: ExpenseSource, settings: ReportSettings = {}): void => {
  // List Groups
  server.registerTool(
    'list-groups',
    {
      title: 'List Groups',
      description: 'List the Splitwise groups available for reports (id 0 is the non-group expenses bucket)'
    },
    async (): Promise<CallToolResult> => {
      try {
        const groups = await source.listGroups();
        return jsonResult(groups);
      } catch (error) {
        logger.error('List groups failed', { error: String(error) });
        return createErrorResult(error);
      }
    }
  );

  // Preview Date Range
  server.registerTool(
    'preview-date-range',
    {
      title: 'Preview Date Range',
      description: 'Show the date range a report would query for a month and mode',
      inputSchema: {
        year: yearSchema.nullish(),
        month: monthSchema.nullish(),
        mode: reportModeSchema.nullish()
      }
    },
    async args => {
      try {
        const range = resolveDateRange({
          year: args.year ?? undefined,
          month: args.month ?? undefined,
          mode: args.mode ?? undefined,
          widenLongMonths: settings.widenLongMonths
        });
        return { content: [{ type: 'text', text: `Fetching expenses from \`${range.startDate}\` to \`${range.endDate}\`` }] };
      } catch (error) {
        return createErrorResult(error);
      }
    }
  );

  // Get Expense Report
  server.registerTool(
    'get-expense-report',
    {
      title: 'Get Expense Report',
      description: `Your share of a group's expenses for a month: itemised table, total, category and daily charts. ${AMOUNT_NOTE}`,
      inputSchema: reportSelectionShape
    },
    async args => await runReport(source, args, settings, report => report)
  );

  // Get Category Summary
  server.registerTool(
    'get-category-summary',
    {
      title: 'Category Summary',
      description: `Your expense totals per category with share (donut) and comparison (bar) charts. ${AMOUNT_NOTE}`,
      inputSchema: reportSelectionShape
    },
    async args => await runReport(source, args, settings, report => ({
      group: report.group,
      range: report.range,
      amountUnit: report.amountUnit,
      total: report.total,
      totalFormatted: report.totalFormatted,
      categoryTotals: report.categoryTotals,
      charts: {
        categoryShare: report.charts.categoryShare,
        categoryComparison: report.charts.categoryComparison
      }
    }))
  );

  // Get Daily Trend
  server.registerTool(
    'get-daily-trend',
    {
      title: 'Daily Trend',
      description: `Your expense totals per day, oldest first, with a line chart. ${AMOUNT_NOTE}`,
      inputSchema: reportSelectionShape
    },
    async args => await runReport(source, args, settings, report => ({
      group: report.group,
      range: report.range,
      amountUnit: report.amountUnit,
      total: report.total,
      totalFormatted: report.totalFormatted,
      dailyTotals: report.dailyTotals,
      chart: report.charts.dailyTrend
    }))
  );
};

