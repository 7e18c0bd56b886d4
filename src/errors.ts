export type ErrorCode =
  | 'INVALID_ARGUMENTS'
  | 'NOT_FOUND'
  | 'HTTP_ERROR'
  | 'TIMEOUT'
  | 'NETWORK'
  | 'INVALID_RESPONSE'
  | 'INTERNAL';

export interface SuggestedToolCall {
  name: string;
  args?: Record<string, unknown>;
}

export interface ActionableErrorFields {
  retryable: boolean;
  fixHint: string;
  suggestedNextToolCalls: SuggestedToolCall[];
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ErrorCode, ActionableErrorFields> = {
  INVALID_ARGUMENTS: {
    retryable: false,
    fixHint: 'Fix tool arguments to match the input schema and required fields.',
    suggestedNextToolCalls: [{ name: 'get_events' }]
  },
  NOT_FOUND: {
    retryable: false,
    fixHint: 'Look the device up again and retry with a valid ref.',
    suggestedNextToolCalls: [{ name: 'list_all_devices', args: { free_text_search: 'device name' } }]
  },
  HTTP_ERROR: {
    retryable: false,
    fixHint: 'Check the HomeSeer URL and credentials; the hub rejected the request.',
    suggestedNextToolCalls: []
  },
  TIMEOUT: {
    retryable: true,
    fixHint: 'Retry the operation and increase HOMESEER_TIMEOUT if network latency is high.',
    suggestedNextToolCalls: []
  },
  NETWORK: {
    retryable: true,
    fixHint: 'Check HomeSeer host reachability and TLS settings, then retry.',
    suggestedNextToolCalls: []
  },
  INVALID_RESPONSE: {
    retryable: false,
    fixHint: 'Verify HOMESEER_URL points at the hub JSON endpoint.',
    suggestedNextToolCalls: []
  },
  INTERNAL: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the server logs.',
    suggestedNextToolCalls: []
  }
};

export function actionableErrorFields(code: ErrorCode): ActionableErrorFields {
  const defaults = ACTIONABLE_ERROR_DEFAULTS[code];
  return {
    retryable: defaults.retryable,
    fixHint: defaults.fixHint,
    suggestedNextToolCalls: defaults.suggestedNextToolCalls.map((item) => ({
      name: item.name,
      ...(item.args ? { args: { ...item.args } } : {})
    }))
  };
}

export class HomeSeerMcpError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'HomeSeerMcpError';
    this.code = code;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asHomeSeerMcpError(value: unknown): HomeSeerMcpError {
  if (value instanceof HomeSeerMcpError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError') {
    return new HomeSeerMcpError('TIMEOUT', err.message, { cause: err });
  }

  return new HomeSeerMcpError('INTERNAL', err.message, { cause: err });
}
