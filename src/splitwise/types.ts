import { type SplitwiseGroup, type SplitwiseUser } from '../schemas/splitwise.js';

export type { SplitwiseGroup, SplitwiseUser } from '../schemas/splitwise.js';

/** Splitwise files expenses outside any group under this id. */
export const NON_GROUP_EXPENSES_ID = 0;

export interface ExpenseQuery {
  groupId: number
  datedAfter: string
  datedBefore: string
  visibleOnly?: boolean
  limit?: number
}

/**
 * Read-only view of the expense-splitting service. `listExpenses` returns the
 * expenses unvalidated; each one is parsed separately by the report pipeline.
 */
export interface ExpenseSource {
  listGroups: () => Promise<SplitwiseGroup[]>
  getGroupByName: (name: string) => Promise<SplitwiseGroup>
  getCurrentUser: () => Promise<SplitwiseUser>
  listExpenses: (query: ExpenseQuery) => Promise<unknown[]>
}
