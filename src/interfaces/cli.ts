/**
 * 命令列介面
 *
 * slack-notify <simple|info|warning|error> <text> [icon]
 * 設定來自環境變數（SLACK_WEBHOOK_URL 等，支援 .env）。
 */

import { NotificationClient } from '../core/webhook/client.js';
import { createLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const logger = createLogger('CLI', { useStderr: true });

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const HELP_MESSAGE = `
slack-notify - post a message to a Slack incoming webhook

Usage: slack-notify <command> <text> [icon]

Commands:
  simple    plain message, no attachment
  info      green attachment ("good")
  warning   yellow attachment ("warning")
  error     red attachment ("danger")
  help      show this message
  version   print the version

Environment:
  SLACK_WEBHOOK_URL     webhook URL (required)
  SLACK_USERNAME        display name
  SLACK_CHANNEL         target channel
  SLACK_TIMEOUT_MS      per-attempt timeout, default 5000
  SLACK_RETRY_ATTEMPTS  attempts per message, default 3
`;

type SendCommand = 'simple' | 'info' | 'warning' | 'error';

const SEND_COMMANDS: readonly SendCommand[] = ['simple', 'info', 'warning', 'error'];

function isSendCommand(value: string): value is SendCommand {
  return (SEND_COMMANDS as readonly string[]).includes(value);
}

export interface CliDependencies {
  createClient?: () => NotificationClient;
}

async function send(client: NotificationClient, command: SendCommand, text: string, icon?: string): Promise<void> {
  switch (command) {
    case 'simple':
      return client.sendSimple(text, icon);
    case 'info':
      return client.sendInfo(text, icon);
    case 'warning':
      return client.sendWarning(text, icon);
    case 'error':
      return client.sendError(text, icon);
  }
}

/**
 * 執行 CLI，回傳 exit code
 */
export async function runCli(args: string[], deps?: CliDependencies): Promise<number> {
  const [command = 'help', text, icon] = args;

  if (command === 'help' || command === '-h' || command === '--help') {
    logger.raw(HELP_MESSAGE);
    return EXIT_OK;
  }

  if (command === 'version' || command === '-v' || command === '--version') {
    logger.raw(VERSION);
    return EXIT_OK;
  }

  if (!isSendCommand(command)) {
    logger.error(`Unknown command: ${command}`);
    logger.raw(HELP_MESSAGE);
    return EXIT_USAGE;
  }

  if (!text) {
    logger.error(`Missing message text for "${command}"`);
    return EXIT_USAGE;
  }

  try {
    const client = deps?.createClient ? deps.createClient() : new NotificationClient();
    await send(client, command, text, icon);
    logger.info(`Sent ${command} notification`);
    return EXIT_OK;
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to send notification: ${errorMsg}`);
    return EXIT_FAILURE;
  }
}
