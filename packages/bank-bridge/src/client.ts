/**
 * HTTP client for the banking provider's personal API.
 *
 * Every response is classified here: callers only ever see parsed payloads or one
 * of the error kinds from @jarsync/types.
 */

import axios, { type AxiosInstance, type AxiosResponse, type CreateAxiosDefaults } from 'axios';
import type { z } from 'zod';
import {
  ClientInfoSchema,
  CredentialError,
  DEFAULT_BANK_API_URL,
  ProviderError,
  ProviderTransientError,
  RateLimitError,
  STATEMENT_MAX_WINDOW_SECONDS,
  StatementSchema,
  type ProviderAccount,
  type ProviderStatementItem,
} from '@jarsync/types';

/**
 * What the sync path needs from a provider. The HTTP client implements it; tests
 * substitute fakes.
 */
export interface BankingClient {
  /** Cards and jars visible to the credential. */
  listAccounts(credential: string): Promise<ProviderAccount[]>;
  /**
   * Statement items of one account with `from <= time <= to`, newest first.
   * At most one page (500 items) is returned per call.
   */
  listStatementItems(credential: string, accountId: string, from: number, to: number): Promise<ProviderStatementItem[]>;
}

export interface BankClientConfig {
  baseUrl: string;
  timeoutMs: number;
  /** Extra axios settings, merged last (adapter, proxy, ...). */
  axiosConfig?: CreateAxiosDefaults;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class MonobankClient implements BankingClient {
  private readonly http: AxiosInstance;

  constructor(config: Partial<BankClientConfig> = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl ?? DEFAULT_BANK_API_URL,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: { Accept: 'application/json' },
      validateStatus: () => true,
      ...config.axiosConfig,
    });
  }

  async listAccounts(credential: string): Promise<ProviderAccount[]> {
    const body = await this.get('/personal/client-info', credential);
    const info = parsePayload(ClientInfoSchema, body, 'client-info');
    return [
      ...info.accounts.map((card) => ({ kind: 'card' as const, ...card })),
      ...info.jars.map((jar) => ({ kind: 'jar' as const, ...jar })),
    ];
  }

  async listStatementItems(
    credential: string,
    accountId: string,
    from: number,
    to: number
  ): Promise<ProviderStatementItem[]> {
    if (to < from) {
      throw new ProviderError(`Statement window is inverted: from=${from} to=${to}`);
    }
    if (to - from > STATEMENT_MAX_WINDOW_SECONDS) {
      throw new ProviderError(`Statement window of ${to - from}s exceeds ${STATEMENT_MAX_WINDOW_SECONDS}s`);
    }
    const body = await this.get(`/personal/statement/${encodeURIComponent(accountId)}/${from}/${to}`, credential);
    return parsePayload(StatementSchema, body, 'statement');
  }

  private async get(path: string, credential: string): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path, { headers: { 'X-Token': credential } });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const reason = error.code ?? error.message;
        throw new ProviderTransientError(`Bank API request to ${describePath(path)} failed: ${reason}`, null, error);
      }
      throw error;
    }
    return classifyResponse(path, response.status, response.data, response.headers['retry-after']);
  }
}

/**
 * Map an HTTP status to a payload or a classified error.
 */
export function classifyResponse(path: string, status: number, body: unknown, retryAfter?: unknown): unknown {
  if (status >= 200 && status < 300) {
    return body;
  }

  const target = describePath(path);
  const detail = extractErrorDescription(body);
  const message = `Bank API ${target} returned ${status}${detail !== null ? `: ${detail}` : ''}`;

  if (status === 429) {
    throw new RateLimitError(message, parseRetryAfter(retryAfter));
  }
  if (status === 401 || status === 403) {
    throw new CredentialError(message);
  }
  if (status >= 500) {
    throw new ProviderTransientError(message, status);
  }
  throw new ProviderError(message, status);
}

function parsePayload<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ProviderError(`Malformed ${what} payload${where}: ${issue?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

function extractErrorDescription(body: unknown): string | null {
  if (typeof body === 'string' && body.trim() !== '') {
    return body.trim();
  }
  if (body !== null && typeof body === 'object' && 'errorDescription' in body) {
    const { errorDescription } = body;
    return typeof errorDescription === 'string' ? errorDescription : null;
  }
  return null;
}

function parseRetryAfter(value: unknown): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

/** Strip ids from a path so log lines and errors never carry account ids. */
function describePath(path: string): string {
  return path.startsWith('/personal/statement/') ? '/personal/statement' : path;
}
