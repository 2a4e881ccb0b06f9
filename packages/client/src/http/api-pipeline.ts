import { RetryPolicy, classify, parseJsonBody, toApiError } from '@scholia/core';
import type { RetryAttempt, RetryConfig } from '@scholia/core';
import type { AuthGate } from '../auth/auth-gate';
import { createChildLogger, logError } from '../utils/logger';
import type { Logger } from '../utils/logger';
import type { HttpMethod, QueryParams, RequestDispatcher } from './dispatcher';

export interface ApiRequest<T> {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
  /** When set, the call is gated on a credential and 401s name this feature. */
  feature?: string;
  fallbackMessage: string;
  reconcile: (raw: unknown) => T;
  logger?: Logger;
}

export interface ApiPipelineOptions {
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Runs a request through the auth gate, the retry policy and the dispatcher,
 * then turns the response into a domain value or a classified error.
 */
export class ApiPipeline {
  private readonly log: Logger;
  private readonly retryConfig: Partial<RetryConfig>;

  constructor(
    private readonly dispatcher: RequestDispatcher,
    public readonly authGate: AuthGate,
    options: ApiPipelineOptions = {}
  ) {
    this.log = options.logger ?? createChildLogger({ component: 'api-pipeline' });
    this.retryConfig = options.retry ?? {};
  }

  async request<T>(request: ApiRequest<T>): Promise<T> {
    if (request.feature !== undefined) {
      this.authGate.requireAuth(request.feature);
    }

    const log = request.logger ?? this.log;
    const policy = new RetryPolicy({
      ...this.retryConfig,
      onRetry: (attempt) => {
        this.logRetry(log, request, attempt);
        this.retryConfig.onRetry?.(attempt);
      },
    });

    try {
      return await policy.execute(() => this.attempt(request));
    } catch (error) {
      const failure = toApiError(error, { fallbackMessage: request.fallbackMessage });
      logError(
        failure,
        {
          method: request.method,
          path: request.path,
          kind: failure.kind,
          status: failure.status,
        },
        log
      );
      throw failure;
    }
  }

  private async attempt<T>(request: ApiRequest<T>): Promise<T> {
    const response = await this.dispatcher.send({
      method: request.method,
      path: request.path,
      query: request.query,
      body: request.body,
      headers: this.authGate.authorizationHeader(),
    });

    if (!isSuccessStatus(response.status)) {
      throw classify(response.status, response.body, null, {
        fallbackMessage: request.fallbackMessage,
        feature: request.feature,
      });
    }

    return request.reconcile(parseJsonBody(response.body));
  }

  private logRetry<T>(log: Logger, request: ApiRequest<T>, attempt: RetryAttempt): void {
    log.warn(
      {
        method: request.method,
        path: request.path,
        attempt: attempt.attempt + 1,
        delayMs: attempt.delayMs,
        reason: attempt.error.message,
      },
      `Retrying ${request.method} ${request.path} in ${attempt.delayMs}ms`
    );
  }
}
