import { createLogger } from '../../utils/logger.js';
import { VERSION } from '../../version.js';
import { resolveClientConfig } from './config.js';
import { WebhookError } from './errors.js';
import {
  buildJobMessage,
  buildSeverityJob,
  buildSimpleMessage,
  serializeMessage,
  type MessageDefaults,
} from './message.js';
import { discardBody, FetchTransport } from './transport.js';
import type {
  JobNotification,
  NotificationClientConfig,
  OutboundMessage,
  Severity,
  WebhookRequest,
  WebhookTransport,
} from './types.js';

const logger = createLogger('NotificationClient');

/** Incoming webhook 成功時回應的內容 */
export const SUCCESS_MARKER = 'ok';

/**
 * Incoming webhook 通知 client
 *
 * 建立一次後重複使用；建構後不再有可變狀態，可同時被多個呼叫端使用。
 */
export class NotificationClient {
  private webhookUrl: string;
  private username?: string;
  private channel?: string;
  private timeout: number;
  private transport: WebhookTransport;

  constructor(config?: Partial<NotificationClientConfig>) {
    const resolved = resolveClientConfig(config);

    this.webhookUrl = resolved.webhookUrl;
    this.username = resolved.username;
    this.channel = resolved.channel;
    this.timeout = resolved.timeout;
    this.transport = config?.transport ?? new FetchTransport({
      retryAttempts: resolved.retryAttempts,
      retryDelayMs: resolved.retryDelayMs,
    });
  }

  /**
   * 每次嘗試的 timeout（毫秒）
   */
  getTimeout(): number {
    return this.timeout;
  }

  /**
   * 送出純文字訊息，不帶 attachment
   */
  async sendSimple(text: string, iconEmoji?: string): Promise<void> {
    await this.deliver(buildSimpleMessage(this.defaults(), text, iconEmoji));
  }

  /**
   * 送出帶單一彩色 attachment 的訊息，ts 為呼叫當下時間
   */
  async sendJobNotification(job: JobNotification): Promise<void> {
    await this.deliver(buildJobMessage(this.defaults(), job, new Date()));
  }

  async sendError(message: string, iconEmoji?: string): Promise<void> {
    await this.sendSeverity('error', message, iconEmoji);
  }

  async sendInfo(message: string, iconEmoji?: string): Promise<void> {
    await this.sendSeverity('info', message, iconEmoji);
  }

  async sendWarning(message: string, iconEmoji?: string): Promise<void> {
    await this.sendSeverity('warning', message, iconEmoji);
  }

  private async sendSeverity(severity: Severity, message: string, iconEmoji?: string): Promise<void> {
    await this.sendJobNotification(buildSeverityJob(severity, message, iconEmoji));
  }

  private defaults(): MessageDefaults {
    return { username: this.username, channel: this.channel };
  }

  private buildRequest(body: string): WebhookRequest {
    let url: URL;
    try {
      url = new URL(this.webhookUrl);
    } catch (error) {
      throw new WebhookError('request', `Invalid webhook URL: "${this.webhookUrl}"`, { cause: error });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new WebhookError('request', `Unsupported webhook URL protocol: ${url.protocol}`);
    }

    return {
      url,
      body,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': `slack-webhook-notify/${VERSION}`,
      },
      timeoutMs: this.timeout,
    };
  }

  private async deliver(message: OutboundMessage): Promise<void> {
    const request = this.buildRequest(serializeMessage(message));

    // 傳輸層錯誤在重試用盡後原樣拋出
    const response = await this.transport.do(request);

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      await discardBody(response);
      const reason = error instanceof Error ? error.message : String(error);
      throw new WebhookError('response-read', `Failed to read webhook response: ${reason}`, {
        status: response.status,
        cause: error,
      });
    }

    if (body !== SUCCESS_MARKER) {
      throw new WebhookError(
        'rejected',
        `Webhook rejected message (HTTP ${response.status}): ${body || '<empty body>'}`,
        { status: response.status, body }
      );
    }

    logger.debug(`Delivered message to ${request.url.host}`);
  }
}
