import { APICallError, LoadAPIKeyError, NoSuchModelError, UnsupportedFunctionalityError } from '@ai-sdk/provider';

export type LlmErrorKind =
  | 'authentication'
  | 'network'
  | 'invalid_request'
  | 'api_error'
  | 'unsupported';

export const LLM_ERROR_KIND_MEANINGS: Record<LlmErrorKind, { summary: string }> = {
  authentication: { summary: 'Credential missing, invalid or not authorized.' },
  network: { summary: 'The request never produced an HTTP response.' },
  invalid_request: { summary: 'The provider rejected the request as malformed.' },
  api_error: { summary: 'The provider answered with an error status.' },
  unsupported: { summary: 'The model or a requested feature is not available.' },
};

export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status?: number;
  readonly provider?: string;

  constructor(kind: LlmErrorKind, message: string, opts?: { status?: number; provider?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'LlmError';
    this.kind = kind;
    if (opts?.status !== undefined) this.status = opts.status;
    if (opts?.provider !== undefined) this.provider = opts.provider;
  }
}

export const isLlmError = (value: unknown): value is LlmError => value instanceof LlmError;

const STATUS_KIND_MAP = new Map<number, LlmErrorKind>([
  [401, 'authentication'],
  [403, 'authentication'],
  [400, 'invalid_request'],
  [404, 'invalid_request'],
  [413, 'invalid_request'],
  [422, 'invalid_request'],
]);

const NETWORK_CODES = new Set([
  'econnreset',
  'enotfound',
  'enetunreach',
  'ehostunreach',
  'econnrefused',
  'eai_again',
  'epipe',
  'etimedout',
  'und_err_connect_timeout',
  'und_err_socket',
]);

const NETWORK_MESSAGE_PATTERNS = [
  'fetch failed',
  'network',
  'socket hang up',
  'connection',
  'getaddrinfo',
];

const normalize = (value: unknown): string | undefined =>
  typeof value === 'string' ? value.trim().toLowerCase() : undefined;

const codeOf = (error: unknown): string | undefined => {
  if (!(error instanceof Error)) return undefined;
  const own = 'code' in error ? normalize(error.code) : undefined;
  if (own !== undefined) return own;
  return error.cause !== undefined ? codeOf(error.cause) : undefined;
};

export const classifyStatus = (status: number): LlmErrorKind => STATUS_KIND_MAP.get(status) ?? 'api_error';

/** Maps anything a provider SDK throws onto an {@link LlmError}. */
export function toLlmError(error: unknown, provider?: string): LlmError {
  if (isLlmError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);

  if (APICallError.isInstance(error)) {
    if (error.statusCode !== undefined) {
      return new LlmError(classifyStatus(error.statusCode), message, { status: error.statusCode, provider, cause: error });
    }
    return new LlmError('network', message, { provider, cause: error });
  }
  if (LoadAPIKeyError.isInstance(error)) {
    return new LlmError('authentication', message, { provider, cause: error });
  }
  if (NoSuchModelError.isInstance(error) || UnsupportedFunctionalityError.isInstance(error)) {
    return new LlmError('unsupported', message, { provider, cause: error });
  }

  const code = codeOf(error);
  const lowered = message.toLowerCase();
  if ((code !== undefined && NETWORK_CODES.has(code)) || NETWORK_MESSAGE_PATTERNS.some((pattern) => lowered.includes(pattern))) {
    return new LlmError('network', message, { provider, cause: error });
  }
  return new LlmError('invalid_request', message, { provider, cause: error });
}
