/**
 * Span Server Client
 *
 * Thin fetch wrapper over the span API. Ids are raw span ids on this side
 * and base64url on the wire.
 */

import { REQUEST_TIMEOUT_MS, SERVER_READY_POLL_INTERVAL_MS, getServerReadyTimeoutMs } from '../../../shared/config/timeouts.js';
import { RemoteRequestError, ServerNotReadyError, ServerUnavailableError } from '../../../shared/errors/index.js';
import { spanIdFromString, spanIdToString, type SpanId } from '../../../shared/tracing/index.js';
import { parseJsonObject, type JsonObject } from '../../../shared/utils/json.js';
import { withRetry } from '../../../shared/utils/retry.js';
import { ValidationError, isRecord, type ValidationResult } from '../../../shared/validation/index.js';
import {
  READINESS_PATH,
  ROOT_IDS_PATH,
  childrenPath,
  spanPath,
  validateIdList,
  validateSpanPayload,
  type SpanDataPayload,
  type SpanPayload,
} from './protocol.js';

/**
 * Span as returned by `getSpan`
 */
export interface RemoteSpanRecord {
  id: SpanId;
  name: string;
  data: JsonObject;
  parentId: SpanId | null;
}

export interface WaitForReadyOptions {
  /** Default: 30000, or TREETRACE_READY_TIMEOUT_MS */
  timeoutMs?: number;
  /** Default: 500 */
  pollIntervalMs?: number;
}

type Method = 'GET' | 'PUT' | 'PATCH';

export class RemoteSpanClient {
  readonly url: string;

  constructor(url: string) {
    this.url = url.replace(/\/+$/, '');
  }

  private async request(method: Method, path: string, body?: SpanPayload | SpanDataPayload): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.url}${path}`, {
        method,
        headers: body ? { 'Content-Type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      throw new ServerUnavailableError(this.url, error instanceof Error ? error : undefined);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new RemoteRequestError(method, path, response.status, errorDetail(text));
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new RemoteRequestError(method, path, response.status, 'response is not JSON');
    }
  }

  private async requestValid<T>(
    method: Method,
    path: string,
    validate: (value: unknown) => ValidationResult<T>
  ): Promise<T> {
    const result = validate(await this.request(method, path));
    if (!result.valid) {
      throw ValidationError.fromErrors(`response of ${method} ${path}`, result.errors);
    }
    return result.value;
  }

  /**
   * One readiness probe; false while the server cannot be reached
   */
  async isReady(): Promise<boolean> {
    try {
      return (await this.request('GET', READINESS_PATH)) === 'ok';
    } catch (error) {
      if (error instanceof ServerUnavailableError || error instanceof RemoteRequestError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Poll readiness until it succeeds
   *
   * @throws ServerNotReadyError once `timeoutMs` has passed
   */
  async waitForReady(options: WaitForReadyOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? getServerReadyTimeoutMs();
    const pollIntervalMs = options.pollIntervalMs ?? SERVER_READY_POLL_INTERVAL_MS;
    const notReady = new Error('not ready');

    try {
      await withRetry(
        async () => {
          if (!(await this.isReady())) throw notReady;
        },
        {
          maxAttempts: Infinity,
          initialDelayMs: pollIntervalMs,
          maxDelayMs: pollIntervalMs,
          backoffMultiplier: 1,
          jitter: 0,
          deadlineMs: timeoutMs,
          isRetryable: (error) => error === notReady,
        }
      );
    } catch (error) {
      if (error === notReady) {
        throw new ServerNotReadyError(this.url, timeoutMs);
      }
      throw error;
    }
  }

  /**
   * Create a span
   *
   * @throws RemoteRequestError with status 409 when the id exists
   */
  async putSpan(id: SpanId, name: string, data: JsonObject, parentId: SpanId | null = null): Promise<void> {
    await this.request('PUT', spanPath(spanIdToString(id)), {
      name,
      data_json: JSON.stringify(data),
      parent_id: parentId ? spanIdToString(parentId) : null,
    });
  }

  /**
   * Merge-patch a span's data on the server
   *
   * @throws RemoteRequestError with status 404 for an unknown id
   */
  async patchSpan(id: SpanId, patch: JsonObject): Promise<void> {
    await this.request('PATCH', spanPath(spanIdToString(id)), { data_json: JSON.stringify(patch) });
  }

  /**
   * @throws RemoteRequestError with status 404 for an unknown id
   */
  async getSpan(id: SpanId): Promise<RemoteSpanRecord> {
    const payload = await this.requestValid('GET', spanPath(spanIdToString(id)), validateSpanPayload);
    return {
      id,
      name: payload.name,
      data: parseJsonObject(payload.data_json),
      parentId: payload.parent_id ? spanIdFromString(payload.parent_id) : null,
    };
  }

  async getChildrenIds(id: SpanId): Promise<SpanId[]> {
    const ids = await this.requestValid('GET', childrenPath(spanIdToString(id)), validateIdList);
    return ids.map(spanIdFromString);
  }

  async getRootIds(): Promise<SpanId[]> {
    const ids = await this.requestValid('GET', ROOT_IDS_PATH, validateIdList);
    return ids.map(spanIdFromString);
  }
}

function errorDetail(text: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && typeof parsed.error === 'string') {
      return parsed.error;
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return text.length > 0 ? text : undefined;
}
