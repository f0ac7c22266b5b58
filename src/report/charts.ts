import { currencySymbol, DEFAULT_MONEY_FORMAT } from './table.js';
import { toMajorUnits } from './transactions.js';
import { type CategoryTotal, type DailyTotal, type MoneyFormat } from './types.js';

// Plain chart descriptors; whichever client renders the report picks the plotting library.

export const CHART_COLOR = 'rgb(58,137,232)';

export interface CategoryShareChart {
  kind: 'donut'
  title: string
  hole: number
  textInfo: 'percent+label'
  textPosition: 'inside'
  showLegend: boolean
  height: number
  slices: Array<{ label: string, value: number, percent: number }>
}

export interface CategoryComparisonChart {
  kind: 'bar'
  title: string
  xAxisTitle: string
  yAxisTitle: string
  xTickAngle: number
  color: string
  height: number
  bars: Array<{ label: string, value: number, text: string }>
}

export interface DailyTrendChart {
  kind: 'line'
  title: string
  xAxisTitle: string
  yAxisTitle: string
  mode: 'lines+markers'
  color: string
  lineWidth: number
  markerSize: number
  height: number
  points: Array<{ date: string, value: number }>
}

const amountAxisTitle = (format: MoneyFormat): string => `Amount (${currencySymbol(format)})`;

export const buildCategoryShareChart = (totals: readonly CategoryTotal[]): CategoryShareChart => {
  const sum = totals.reduce((acc, t) => acc + t.total, 0);
  return {
    kind: 'donut',
    title: 'Expense Distribution by Category',
    hole: 0.3,
    textInfo: 'percent+label',
    textPosition: 'inside',
    showLegend: true,
    height: 500,
    slices: totals.map(t => ({
      label: t.category,
      value: toMajorUnits(t.total),
      // one decimal place
      percent: sum > 0 ? Math.round((t.total * 1000) / sum) / 10 : 0
    }))
  };
};

export const buildCategoryComparisonChart = (
  totals: readonly CategoryTotal[],
  format: MoneyFormat = DEFAULT_MONEY_FORMAT
): CategoryComparisonChart => ({
  kind: 'bar',
  title: 'Expenses by Category',
  xAxisTitle: 'Category',
  yAxisTitle: amountAxisTitle(format),
  xTickAngle: -45,
  color: CHART_COLOR,
  height: 500,
  bars: totals.map(t => ({
    label: t.category,
    value: toMajorUnits(t.total),
    text: toMajorUnits(t.total).toFixed(2)
  }))
});

export const buildDailyTrendChart = (
  totals: readonly DailyTotal[],
  format: MoneyFormat = DEFAULT_MONEY_FORMAT
): DailyTrendChart => ({
  kind: 'line',
  title: 'Daily Expense Trend',
  xAxisTitle: 'Date',
  yAxisTitle: amountAxisTitle(format),
  mode: 'lines+markers',
  color: CHART_COLOR,
  lineWidth: 2,
  markerSize: 8,
  height: 400,
  points: totals.map(t => ({ date: t.date, value: toMajorUnits(t.total) }))
});
