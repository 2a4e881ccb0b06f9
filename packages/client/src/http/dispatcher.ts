import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { ServerError, toApiError } from '@scholia/core';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface DispatchRequest {
  method: HttpMethod;
  /** Path below the base URL, e.g. `/api/v1/progress/me`. */
  path: string;
  headers?: Record<string, string>;
  body?: unknown;
  query?: QueryParams;
  timeoutSeconds?: number;
}

export interface RawResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
}

export interface DispatcherOptions {
  baseUrl?: string;
  timeoutSeconds?: number;
  /** Replaces the axios instance; tests pass one with an in-process adapter. */
  httpClient?: AxiosInstance;
}

export const DEFAULT_BASE_URL = 'http://localhost:8000';
export const DEFAULT_TIMEOUT_SECONDS = 30;

export const STANDARD_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
};

/**
 * Sends one HTTP request and hands back the raw status and body.
 *
 * Every status is returned as-is; classification happens upstream. Only a
 * timeout or a connection failure throws, as a `ServerError`.
 */
export class RequestDispatcher {
  readonly baseUrl: string;
  private readonly timeoutSeconds: number;
  private readonly http: AxiosInstance;

  constructor(options: DispatcherOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.http = options.httpClient ?? axios.create();
  }

  async send(request: DispatchRequest): Promise<RawResponse> {
    const timeoutSeconds = request.timeoutSeconds ?? this.timeoutSeconds;

    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        baseURL: this.baseUrl,
        url: request.path,
        headers: { ...STANDARD_HEADERS, ...request.headers },
        params: compactQuery(request.query),
        data: request.body,
        timeout: timeoutSeconds * 1000,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });

      return {
        status: response.status,
        body: toBodyText(response.data),
        headers: toHeaderRecord(response.headers),
      };
    } catch (error) {
      throw toTransportError(error, timeoutSeconds);
    }
  }
}

function compactQuery(query: QueryParams | undefined): Record<string, string> | undefined {
  if (!query) {
    return undefined;
  }
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== null && value !== undefined) {
      params[key] = String(value);
    }
  }
  return params;
}

function toBodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data === null || data === undefined) {
    return '';
  }
  return JSON.stringify(data);
}

function toHeaderRecord(headers: object): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === null || value === undefined) {
      continue;
    }
    record[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return record;
}

function toTransportError(error: unknown, timeoutSeconds: number): Error {
  if (!axios.isAxiosError(error)) {
    return toApiError(error);
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new ServerError(`Request timed out after ${timeoutSeconds}s`, null, null, 'timeout', {
      cause: error,
    });
  }
  return new ServerError(`Network error: ${error.message}`, null, null, 'network', {
    cause: error,
  });
}
