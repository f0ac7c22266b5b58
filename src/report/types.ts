export type ReportMode = 'calendar' | 'discover';

export interface Participant {
  userId: string
  /** Minor currency units. */
  owedShare: number
  /** Minor currency units. */
  paidShare: number
}

export interface RawTransaction {
  id: string
  category: string | null
  date: string
  description: string
  /** Entries as received; only the reported user's entry is ever validated. */
  participants: readonly unknown[]
}

export type AttributionBasis = 'owed' | 'paid';

export interface ExpenseRecord {
  readonly category: string
  /** Minor currency units, always > 0. */
  readonly amount: number
  readonly date: string
  readonly description: string
  readonly basis: AttributionBasis
}

export interface SkippedTransaction {
  expenseId?: string
  reason: string
}

export interface CategoryTotal {
  category: string
  total: number
}

export interface DailyTotal {
  date: string
  total: number
}

export interface DateRange {
  startDate: string
  endDate: string
  mode: ReportMode
}

export interface MoneyFormat {
  currency: string
  locale: string
}
