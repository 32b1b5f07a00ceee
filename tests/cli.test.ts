import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
  raw: vi.fn(),
}));

vi.mock('../src/utils/logger.js', () => ({
  createLogger: () => mockLogger,
}));

import { runCli, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, HELP_MESSAGE } from '../src/interfaces/cli.js';
import { NotificationClient } from '../src/core/webhook/client.js';
import type { WebhookRequest } from '../src/core/webhook/types.js';
import { VERSION } from '../src/version.js';

function createClient(body = 'ok') {
  const transport = {
    do: vi.fn(async (_request: WebhookRequest) => new Response(body)),
  };
  const client = new NotificationClient({ webhookUrl: 'https://hooks.example.com/cli', transport });
  return { client, transport };
}

describe('runCli', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should print help by default', async () => {
    expect(await runCli([])).toBe(EXIT_OK);
    expect(mockLogger.raw).toHaveBeenCalledWith(HELP_MESSAGE);
  });

  it('should print the version', async () => {
    expect(await runCli(['--version'])).toBe(EXIT_OK);
    expect(mockLogger.raw).toHaveBeenCalledWith(VERSION);
  });

  it('should send a warning with an icon override', async () => {
    const { client, transport } = createClient();

    const code = await runCli(['warning', 'low memory', ':bell:'], { createClient: () => client });

    expect(code).toBe(EXIT_OK);
    const payload = JSON.parse(transport.do.mock.calls[0][0].body);
    expect(payload.icon_emoji).toBe(':bell:');
    expect(payload.attachments).toEqual([
      expect.objectContaining({ color: 'warning', text: 'low memory' }),
    ]);
    expect(mockLogger.info).toHaveBeenCalledWith('Sent warning notification');
  });

  it('should send a simple message', async () => {
    const { client, transport } = createClient();

    expect(await runCli(['simple', 'hello'], { createClient: () => client })).toBe(EXIT_OK);
    expect(transport.do.mock.calls[0][0].body).toBe('{"text":"hello"}');
  });

  it('should reject an unknown command', async () => {
    expect(await runCli(['shout', 'x'])).toBe(EXIT_USAGE);
    expect(mockLogger.error).toHaveBeenCalledWith('Unknown command: shout');
  });

  it('should require message text', async () => {
    expect(await runCli(['error'])).toBe(EXIT_USAGE);
    expect(mockLogger.error).toHaveBeenCalledWith('Missing message text for "error"');
  });

  it('should report delivery failures', async () => {
    const { client } = createClient('no_service');

    expect(await runCli(['error', 'disk full'], { createClient: () => client })).toBe(EXIT_FAILURE);
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Failed to send notification: Webhook rejected message (HTTP 200): no_service'
    );
  });
});
