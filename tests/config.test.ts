import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resolveClientConfig, DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from '../src/core/webhook/config.js';

const ENV_KEYS = [
  'SLACK_WEBHOOK_URL',
  'SLACK_USERNAME',
  'SLACK_CHANNEL',
  'SLACK_TIMEOUT_MS',
  'SLACK_RETRY_ATTEMPTS',
];

describe('resolveClientConfig', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it('should apply defaults', () => {
    expect(resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a' })).toEqual({
      webhookUrl: 'https://hooks.example.com/a',
      username: undefined,
      channel: undefined,
      timeout: DEFAULT_TIMEOUT_MS,
      retryAttempts: 3,
      retryDelayMs: 1000,
    });
    expect(DEFAULT_TIMEOUT_MS).toBe(5000);
  });

  it('should read environment variables', () => {
    process.env.SLACK_WEBHOOK_URL = 'https://hooks.example.com/env';
    process.env.SLACK_USERNAME = 'env-bot';
    process.env.SLACK_CHANNEL = '#env';
    process.env.SLACK_TIMEOUT_MS = '2500';
    process.env.SLACK_RETRY_ATTEMPTS = '5';

    expect(resolveClientConfig()).toMatchObject({
      webhookUrl: 'https://hooks.example.com/env',
      username: 'env-bot',
      channel: '#env',
      timeout: 2500,
      retryAttempts: 5,
    });
  });

  it('should prefer explicit values over the environment', () => {
    process.env.SLACK_WEBHOOK_URL = 'https://hooks.example.com/env';
    process.env.SLACK_USERNAME = 'env-bot';
    process.env.SLACK_TIMEOUT_MS = '2500';

    expect(resolveClientConfig({
      webhookUrl: 'https://hooks.example.com/explicit',
      username: 'explicit-bot',
      timeout: 800,
      retryAttempts: 1,
      retryDelayMs: 0,
    })).toMatchObject({
      webhookUrl: 'https://hooks.example.com/explicit',
      username: 'explicit-bot',
      timeout: 800,
      retryAttempts: 1,
      retryDelayMs: 0,
    });
  });

  it('should fall back when the explicit timeout is zero', () => {
    process.env.SLACK_TIMEOUT_MS = '2500';
    expect(resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a', timeout: 0 }).timeout).toBe(2500);
  });

  it('should treat SLACK_TIMEOUT_MS=0 as unset', () => {
    process.env.SLACK_TIMEOUT_MS = '0';
    expect(resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a' }).timeout).toBe(5000);
  });

  it('should accept the largest timer delay', () => {
    expect(resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a', timeout: MAX_TIMEOUT_MS }).timeout)
      .toBe(2_147_483_647);
  });

  it('should reject timeouts a timer cannot hold', () => {
    expect(() => resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a', timeout: 2_147_483_648 })).toThrow(
      'timeout must be at most 2147483647, got 2147483648'
    );

    process.env.SLACK_TIMEOUT_MS = '3000000000';
    expect(() => resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a' })).toThrow(
      'SLACK_TIMEOUT_MS must be at most 2147483647, got "3000000000"'
    );
  });

  it('should require a webhook URL', () => {
    expect(() => resolveClientConfig()).toThrow(
      'Webhook URL is required. Set SLACK_WEBHOOK_URL environment variable.'
    );
  });

  it('should reject malformed numeric environment values', () => {
    process.env.SLACK_TIMEOUT_MS = 'soon';
    expect(() => resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a' })).toThrow(
      'SLACK_TIMEOUT_MS must be a non-negative integer, got "soon"'
    );
  });

  it('should reject invalid explicit options', () => {
    expect(() => resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a', retryAttempts: 0 })).toThrow(
      'retryAttempts must be a positive integer, got 0'
    );
    expect(() => resolveClientConfig({ webhookUrl: 'https://hooks.example.com/a', retryDelayMs: -1 })).toThrow(
      'retryDelayMs must be a non-negative integer, got -1'
    );
  });
});
