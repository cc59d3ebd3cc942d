import type { Logger } from 'winston';
import type { ClientHandle, ClientResolver } from './KubernetesClient.js';
import {
  ConfigError,
  RemoteError,
  TimeoutError,
  convertApiError,
} from './ErrorHandling.js';
import type { QueryErrorResult, QueryResult, SuccessEnvelope } from './types.js';

/**
 * Largest delay a Node timer accepts; anything above fires after 1ms
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Per-call options accepted by every query
 */
export interface QueryOptions {
  /**
   * Reject the remote phase after this many milliseconds. The same limit is
   * set on the HTTP requests so an abandoned call does not keep running.
   */
  timeoutMs?: number;
}

/**
 * Base class for resource queries.
 *
 * Owns the resolve → call → wrap → classify sequence so each resource class
 * only issues its API call and maps the response. Queries never throw: every
 * failure comes back as a `QueryErrorResult`.
 */
export abstract class BaseResourceOperations {
  constructor(
    protected readonly resolver: ClientResolver,
    protected readonly resourceType: string,
    protected readonly defaults: QueryOptions = {},
    protected readonly logger?: Logger,
  ) {}

  /**
   * Run one query. `action` completes the generic error message
   * (`Error <action>: ...`), e.g. "listing pods".
   */
  protected async execute<T extends SuccessEnvelope>(
    action: string,
    options: QueryOptions | undefined,
    query: (client: ClientHandle, envelope: SuccessEnvelope) => Promise<QueryResult<T>>,
  ): Promise<QueryResult<T>> {
    let client: ClientHandle;
    try {
      client = this.resolver.resolve();
    } catch (error) {
      return this.toErrorResult(action, error);
    }

    this.logger?.debug(`${this.resourceType}: ${action} (${client.configInfo})`);
    const envelope: SuccessEnvelope = { status: 'success', config_info: client.configInfo };
    const timeoutMs = options?.timeoutMs ?? this.defaults.timeoutMs;
    if (timeoutMs) {
      client.setRequestTimeout(Math.min(timeoutMs, MAX_TIMEOUT_MS));
    }

    try {
      return await this.withTimeout(query(client, envelope), timeoutMs);
    } catch (error) {
      return this.toErrorResult(action, error);
    }
  }

  /**
   * Classify a failure into an error record
   */
  protected toErrorResult(action: string, error: unknown): QueryErrorResult {
    const typedError = convertApiError(error);
    this.logger?.error(`${this.resourceType}: error ${action}: ${typedError.message}`, {
      code: typedError.code,
      statusCode: typedError.statusCode,
    });

    if (typedError instanceof ConfigError) {
      return { status: 'error', error_message: typedError.message };
    }

    if (typedError instanceof RemoteError) {
      return {
        status: 'error',
        error_message: `Kubernetes API error: ${typedError.reason}`,
        error_code: typedError.statusCode,
      };
    }

    return { status: 'error', error_message: `Error ${action}: ${typedError.message}` };
  }

  /**
   * Race a pending call against the timeout, clearing the timer either way
   */
  protected async withTimeout<R>(pending: Promise<R>, timeoutMs?: number): Promise<R> {
    if (!timeoutMs) {
      return pending;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => {
          reject(new TimeoutError(`request timed out after ${timeoutMs}ms`, { timeoutMs }));
        },
        Math.min(timeoutMs, MAX_TIMEOUT_MS),
      );
    });

    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
