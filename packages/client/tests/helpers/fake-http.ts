import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, string>;
  headers: Record<string, unknown>;
  body: unknown;
  timeout: number;
}

export type FakeReply = { status: number; body?: unknown } | { error: 'timeout' | 'network' };

export interface FakeHttp {
  client: AxiosInstance;
  requests: RecordedRequest[];
}

/**
 * Axios instance backed by an in-process adapter. Replies are served in order
 * and the last one repeats, so a single failing reply fails every attempt.
 */
export function createFakeHttp(...replies: FakeReply[]): FakeHttp {
  const queue = [...replies];
  const requests: RecordedRequest[] = [];

  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push({
        method: (config.method ?? 'get').toUpperCase(),
        url: `${config.baseURL ?? ''}${config.url ?? ''}`,
        params: config.params ?? {},
        headers: config.headers.toJSON(),
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
        timeout: config.timeout ?? 0,
      });

      const reply = queue.length > 1 ? queue.shift() : queue[0];
      if (!reply) {
        throw new Error('No fake reply queued');
      }

      if ('error' in reply) {
        if (reply.error === 'timeout') {
          throw new AxiosError(
            `timeout of ${config.timeout ?? 0}ms exceeded`,
            AxiosError.ECONNABORTED,
            config
          );
        }
        throw new AxiosError('connect ECONNREFUSED 127.0.0.1:8000', 'ECONNREFUSED', config);
      }

      return {
        data: typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body ?? null),
        status: reply.status,
        statusText: '',
        headers: { 'content-type': 'application/json' },
        config,
      };
    },
  });

  return { client, requests };
}
