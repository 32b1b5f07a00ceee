/**
 * 預設的可重試 HTTP 傳輸層
 *
 * 以全域 fetch 送出 POST，每次嘗試都有獨立的 timeout。
 * timeout 涵蓋讀取 response body，回傳的是已讀完的 Response。
 * 網路錯誤、逾時、429 與 5xx 會重試，間隔為 retryDelayMs * attempt；
 * 429 帶有 Retry-After（秒）時以該值為準，超過 maxRetryAfterMs 則直接回傳。
 */

import { createLogger } from '../../utils/logger.js';
import type { WebhookRequest, WebhookTransport } from './types.js';

const logger = createLogger('WebhookTransport');

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;
/** Retry-After 超過此值時不再等待，直接回傳 429 */
export const MAX_RETRY_AFTER_MS = 30_000;

export interface FetchTransportOptions {
  retryAttempts?: number;
  retryDelayMs?: number;
  maxRetryAfterMs?: number;
  fetch?: typeof fetch;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Retry-After 只支援秒數格式，HTTP-date 格式回傳 null
 */
export function parseRetryAfter(value: string | null): number | null {
  if (!value || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return Number(value.trim()) * 1000;
}

/**
 * 釋放不再讀取的 response body，失敗不影響結果
 */
export async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) {
    return;
  }
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug('Failed to release response body:', error);
  }
}

/**
 * 讓 promise 跟著 signal 一起中止
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class FetchTransport implements WebhookTransport {
  private retryAttempts: number;
  private retryDelayMs: number;
  private maxRetryAfterMs: number;
  private fetchImpl: typeof fetch;

  constructor(options?: FetchTransportOptions) {
    this.retryAttempts = Math.max(1, options?.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS);
    this.retryDelayMs = Math.max(0, options?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    this.maxRetryAfterMs = Math.max(0, options?.maxRetryAfterMs ?? MAX_RETRY_AFTER_MS);
    this.fetchImpl = options?.fetch ?? globalThis.fetch;
  }

  /**
   * 送出一次請求並讀完 body，整段都在同一個 timeout 內
   */
  private async attempt(request: WebhookRequest): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(new Error(`Webhook request timed out after ${request.timeoutMs}ms`)),
      request.timeoutMs
    );

    try {
      const response = await untilAborted(this.fetchImpl(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      }), controller.signal);
      const text = await untilAborted(response.text(), controller.signal);

      return new Response(text || null, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async do(request: WebhookRequest): Promise<Response> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      const isLastAttempt = attempt === this.retryAttempts;
      let response: Response;

      try {
        response = await this.attempt(request);
      } catch (error) {
        lastError = error;
        if (!isLastAttempt) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn(`Attempt ${attempt}/${this.retryAttempts} failed: ${message}, retrying...`);
          await sleep(this.retryDelayMs * attempt);
        }
        continue;
      }

      if (!isRetryableStatus(response.status) || isLastAttempt) {
        return response;
      }

      const retryAfter = response.status === 429 ? parseRetryAfter(response.headers.get('retry-after')) : null;
      if (retryAfter !== null && retryAfter > this.maxRetryAfterMs) {
        logger.warn(`HTTP 429 asks to wait ${retryAfter}ms, over the ${this.maxRetryAfterMs}ms limit; giving up`);
        return response;
      }

      const delay = retryAfter ?? this.retryDelayMs * attempt;
      logger.warn(`Attempt ${attempt}/${this.retryAttempts} got HTTP ${response.status}, retrying in ${delay}ms...`);
      await sleep(delay);
    }

    throw lastError;
  }
}
