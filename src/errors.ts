import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'SPLITWISE_API_ERROR'
  | 'GROUP_NOT_FOUND'
  | 'MALFORMED_RECORD'
  | 'VALIDATION_ERROR';

export class ReportError extends Error {
  constructor (message: string, public readonly code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReportError';
  }
}

/** Missing or unusable credentials; nothing can be fetched until it is fixed. */
export class ConfigurationError extends ReportError {
  constructor (message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SplitwiseApiError extends ReportError {
  constructor (
    message: string,
    public readonly status?: number,
    public readonly endpoint?: string,
    cause?: unknown
  ) {
    super(message, 'SPLITWISE_API_ERROR', { cause });
    this.name = 'SplitwiseApiError';
  }
}

export class GroupNotFoundError extends ReportError {
  constructor (public readonly groupName: string) {
    super(`Group "${groupName}" not found`, 'GROUP_NOT_FOUND');
    this.name = 'GroupNotFoundError';
  }
}

/** One upstream expense that could not be read; the batch carries on without it. */
export class MalformedRecordError extends ReportError {
  constructor (
    message: string,
    public readonly expenseId: string | undefined,
    public readonly issues: string[] = []
  ) {
    super(message, 'MALFORMED_RECORD');
    this.name = 'MalformedRecordError';
  }
}

export class ValidationError extends ReportError {
  constructor (message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export const createErrorResult = (error: unknown): CallToolResult => {
  const result: CallToolResult = {
    content: [{ type: 'text', text: `Error: ${formatError(error)}` }],
    isError: true
  };
  if (error instanceof ReportError) {
    result._meta = { errorType: error.name, errorCode: error.code };
  }
  return result;
};
