import * as z from 'zod/v4';
import { DEFAULT_SPLITWISE_BASE_URL } from '../config.js';
import { ConfigurationError, GroupNotFoundError, SplitwiseApiError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import {
  apiErrorBodySchema,
  currentUserResponseSchema,
  expensesResponseSchema,
  groupsResponseSchema
} from '../schemas/splitwise.js';
import {
  type ExpenseQuery,
  type ExpenseSource,
  type SplitwiseGroup,
  type SplitwiseUser
} from './types.js';

type QueryParams = Record<string, string | number | boolean>;

const describeErrorBody = (text: string): string => {
  if (text.trim() === '') return '';
  try {
    const parsed = apiErrorBodySchema.safeParse(JSON.parse(text));
    if (!parsed.success) return '';
    const messages: string[] = [];
    if (parsed.data.error !== undefined) messages.push(parsed.data.error);
    const errors = parsed.data.errors;
    if (Array.isArray(errors)) {
      messages.push(...errors);
    } else if (errors !== undefined) {
      for (const value of Object.values(errors)) {
        messages.push(...(Array.isArray(value) ? value : [value]));
      }
    }
    return messages.join('; ');
  } catch {
    return '';
  }
};

export class SplitwiseClient implements ExpenseSource {
  private readonly apiKey: string;
  private readonly baseURL: string;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor (config?: { apiKey?: string, baseURL?: string, fetch?: typeof fetch, logger?: Logger }) {
    this.apiKey = (config?.apiKey ?? process.env.SPLITWISE_API_KEY ?? '').trim();
    this.baseURL = (config?.baseURL ?? process.env.SPLITWISE_BASE_URL ?? DEFAULT_SPLITWISE_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = config?.fetch ?? fetch;
    this.log = (config?.logger ?? rootLogger).child({ component: 'splitwise' });
  }

  private ensureReady (): void {
    if (this.apiKey === '') {
      throw new ConfigurationError('Splitwise client init failed: SPLITWISE_API_KEY is required');
    }
  }

  private async request<T> (endpoint: string, schema: z.ZodType<T>, params: QueryParams = {}): Promise<T> {
    this.ensureReady();
    const url = new URL(`${this.baseURL}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    this.log.debug('Splitwise request', { endpoint, params });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          Accept: 'application/json'
        }
      });
    } catch (error) {
      throw new SplitwiseApiError(`Splitwise ${endpoint} request failed: ${String(error)}`, undefined, endpoint, error);
    }

    if (!response.ok) {
      const detail = describeErrorBody(await response.text().catch(() => ''));
      this.log.warn('Splitwise HTTP error', { endpoint, status: response.status, detail });
      const suffix = detail !== '' ? `: ${detail}` : '';
      throw new SplitwiseApiError(`Splitwise ${endpoint} returned HTTP ${response.status}${suffix}`, response.status, endpoint);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SplitwiseApiError(`Splitwise ${endpoint} returned a body that is not JSON`, response.status, endpoint, error);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SplitwiseApiError(
        `Unexpected Splitwise ${endpoint} response: ${z.prettifyError(parsed.error)}`,
        response.status,
        endpoint
      );
    }
    return parsed.data;
  }

  async getCurrentUser (): Promise<SplitwiseUser> {
    const { user } = await this.request('get_current_user', currentUserResponseSchema);
    return user;
  }

  async listGroups (): Promise<SplitwiseGroup[]> {
    const { groups } = await this.request('get_groups', groupsResponseSchema);
    return groups;
  }

  async getGroupByName (name: string): Promise<SplitwiseGroup> {
    const wanted = name.trim().toLowerCase();
    const group = (await this.listGroups()).find(g => g.name.trim().toLowerCase() === wanted);
    if (group === undefined) {
      throw new GroupNotFoundError(name);
    }
    return group;
  }

  async listExpenses (query: ExpenseQuery): Promise<unknown[]> {
    const { expenses } = await this.request('get_expenses', expensesResponseSchema, {
      group_id: query.groupId,
      dated_after: query.datedAfter,
      dated_before: query.datedBefore,
      visible: query.visibleOnly ?? true,
      limit: query.limit ?? 1000
    });
    this.log.debug('Splitwise expenses fetched', { groupId: query.groupId, count: expenses.length });
    return expenses;
  }
}

export const createSplitwiseClient = (config?: { apiKey?: string, baseURL?: string }): SplitwiseClient => {
  return new SplitwiseClient(config);
};
