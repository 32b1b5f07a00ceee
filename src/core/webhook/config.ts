/**
 * Client 設定解析
 *
 * 明確傳入的值優先，其次是環境變數（支援 .env），最後套用預設值。
 * 所有預設值都在建構時決定，送出訊息時不再修改設定。
 */

import { config } from 'dotenv';
import { DEFAULT_RETRY_ATTEMPTS, DEFAULT_RETRY_DELAY_MS } from './transport.js';
import type { NotificationClientConfig } from './types.js';

config();

export const DEFAULT_TIMEOUT_MS = 5000;
/** setTimeout 可接受的最大延遲 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface ResolvedClientConfig {
  webhookUrl: string;
  username?: string;
  channel?: string;
  timeout: number;
  retryAttempts: number;
  retryDelayMs: number;
}

function readEnvInt(name: string, allowZero = false, max = Number.MAX_SAFE_INTEGER): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new Error(`${name} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got "${raw}"`);
  }
  if (value > max) {
    throw new Error(`${name} must be at most ${max}, got "${raw}"`);
  }
  return value;
}

function checkOption(
  name: string,
  value: number | undefined,
  allowZero = false,
  max = Number.MAX_SAFE_INTEGER
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new Error(`${name} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got ${value}`);
  }
  if (value > max) {
    throw new Error(`${name} must be at most ${max}, got ${value}`);
  }
  return value;
}

export function resolveClientConfig(overrides?: Partial<NotificationClientConfig>): ResolvedClientConfig {
  const webhookUrl = overrides?.webhookUrl || process.env.SLACK_WEBHOOK_URL || '';
  if (!webhookUrl) {
    throw new Error('Webhook URL is required. Set SLACK_WEBHOOK_URL environment variable.');
  }

  // timeout 為 0 視同未設定
  const timeout = checkOption('timeout', overrides?.timeout, true, MAX_TIMEOUT_MS)
    || readEnvInt('SLACK_TIMEOUT_MS', true, MAX_TIMEOUT_MS)
    || DEFAULT_TIMEOUT_MS;
  const retryAttempts = checkOption('retryAttempts', overrides?.retryAttempts)
    ?? readEnvInt('SLACK_RETRY_ATTEMPTS')
    ?? DEFAULT_RETRY_ATTEMPTS;
  const retryDelayMs = checkOption('retryDelayMs', overrides?.retryDelayMs, true)
    ?? DEFAULT_RETRY_DELAY_MS;

  return {
    webhookUrl,
    username: overrides?.username || process.env.SLACK_USERNAME || undefined,
    channel: overrides?.channel || process.env.SLACK_CHANNEL || undefined,
    timeout,
    retryAttempts,
    retryDelayMs,
  };
}
