import * as z from 'zod/v4';
import { parseLogLevel, type LogLevel } from './logger.js';
import { ConfigurationError } from './errors.js';
import { currencyFractionDigits } from './report/table.js';
import { MINOR_UNIT_DIGITS } from './report/transactions.js';

export type AuthMode = 'none' | 'bearer';

export const DEFAULT_SPLITWISE_BASE_URL = 'https://secure.splitwise.com/api/v3.0';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  SPLITWISE_API_KEY: z.string().trim().optional(),
  SPLITWISE_BASE_URL: z.url().default(DEFAULT_SPLITWISE_BASE_URL),
  REPORT_CURRENCY: z.string().trim()
    .regex(/^[A-Za-z]{3}$/, { message: 'REPORT_CURRENCY must be an ISO 4217 code' })
    .refine(code => currencyFractionDigits(code) === MINOR_UNIT_DIGITS, {
      message: 'REPORT_CURRENCY must be a currency written with two decimal places'
    })
    .default('USD'),
  REPORT_LOCALE: z.string().trim().min(1).default('en-US'),
  REPORT_WIDEN_MONTH_END: booleanFlag.default(true),
  REPORT_EXPENSE_LIMIT: z.coerce.number().int().positive().default(1000),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  MCP_PUBLIC_URL: z.url().optional(),
  MCP_AUTH_MODE: z.string().trim().toLowerCase().pipe(z.enum(['none', 'bearer'])).default('none'),
  MCP_BEARER_TOKEN: z.string().optional(),
  LOG_LEVEL: z.string().optional()
});

export interface AppConfig {
  splitwise: {
    apiKey: string
    baseURL: string
  }
  report: {
    currency: string
    locale: string
    widenLongMonths: boolean
    expenseLimit: number
  }
  mcp: {
    port: number
    publicUrl: string
    authMode: AuthMode
    bearerToken?: string
  }
  logLevel: LogLevel
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  // Empty values count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const values = parsed.data;
  return {
    splitwise: {
      apiKey: values.SPLITWISE_API_KEY ?? '',
      baseURL: values.SPLITWISE_BASE_URL.replace(/\/+$/, '')
    },
    report: {
      currency: values.REPORT_CURRENCY.toUpperCase(),
      locale: values.REPORT_LOCALE,
      widenLongMonths: values.REPORT_WIDEN_MONTH_END,
      expenseLimit: values.REPORT_EXPENSE_LIMIT
    },
    mcp: {
      port: values.MCP_PORT,
      publicUrl: values.MCP_PUBLIC_URL ?? `http://localhost:${values.MCP_PORT}/mcp`,
      authMode: values.MCP_AUTH_MODE,
      bearerToken: values.MCP_BEARER_TOKEN
    },
    logLevel: parseLogLevel(values.LOG_LEVEL)
  };
};
