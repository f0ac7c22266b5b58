import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import { type ExpenseSource } from './splitwise/types.js';

/**
 * Registers read-only MCP resources and the report prompt.
 */
export const registerResourcesAndPrompts = (server: McpServer, source: ExpenseSource): void => {
  // Groups snapshot
  server.registerResource(
    'groups',
    'splitwise://groups',
    { mimeType: 'application/json', description: 'Splitwise groups (id and name) the current user belongs to' },
    async () => {
      const groups = await source.listGroups();
      return {
        contents: [
          {
            uri: 'splitwise://groups',
            mimeType: 'application/json',
            text: JSON.stringify(groups, null, 2)
          }
        ]
      };
    }
  );

  // Current user
  server.registerResource(
    'current-user',
    'splitwise://current-user',
    { mimeType: 'application/json', description: 'The Splitwise user whose share the reports show' },
    async () => {
      const user = await source.getCurrentUser();
      return {
        contents: [
          {
            uri: 'splitwise://current-user',
            mimeType: 'application/json',
            text: JSON.stringify(user, null, 2)
          }
        ]
      };
    }
  );

  // Prompt: Spending review
  server.registerPrompt(
    'spending-review',
    {
      description: 'Walk through one month of your shared expenses by category and by day.',
      argsSchema: {
        year: z.string().regex(/^\d{4}$/).optional().describe('Year (e.g., 2025)'),
        month: z.string().regex(/^(1[0-2]|[1-9])$/).optional().describe('Month (1-12)'),
        groupName: z.string().optional().describe('Group name; omit for non-group expenses')
      }
    },
    async ({ year, month, groupName }) => {
      let period = 'Use the current month.';
      if (month !== undefined) {
        period = year !== undefined
          ? `Focus on ${year}-${month.padStart(2, '0')}.`
          : `Focus on month ${month} of the current year.`;
      }
      const group = groupName !== undefined && groupName !== ''
        ? `Use the group "${groupName}".`
        : 'Use the non-group expenses bucket (groupId 0).';
      return {
        messages: [
          {
            role: 'user' as const,
            content: {
              type: 'text' as const,
              text: [
                'Review my share of shared expenses with the Splitwise report tools.',
                period,
                group,
                '- Tool get-category-summary for where the money went.',
                '- Tool get-daily-trend for spikes during the period.',
                '- Tool get-expense-report for the itemised table when a category needs a closer look.',
                'Amounts in totals are in the currency\'s smallest unit (e.g., cents for USD); totalFormatted and table amounts are display strings.',
                'Keep the summary short and call out the top categories.'
              ].join('\n')
            }
          }
        ]
      } satisfies { messages: Array<{ role: 'user', content: { type: 'text', text: string } }> };
    }
  );
};
