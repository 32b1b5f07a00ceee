/**
 * Incoming webhook 訊息與設定型別
 *
 * 欄位名稱使用 camelCase，序列化時才轉成 webhook 的 snake_case（見 message.ts）。
 */

/** 慣用的嚴重程度顏色，也可傳入任意 hex 色碼 */
export type SeverityColor = 'good' | 'warning' | 'danger';

export type Severity = 'info' | 'warning' | 'error';

/**
 * Attachment 的進階欄位
 * 便利方法不會用到，保留給需要完整 payload 的呼叫端。
 */
export interface AttachmentExtras {
  callbackId?: string;
  id?: number;
  authorId?: string;
  authorName?: string;
  authorSubname?: string;
  authorLink?: string;
  authorIcon?: string;
  title?: string;
  titleLink?: string;
  pretext?: string;
  imageUrl?: string;
  thumbUrl?: string;
  mrkdwnIn?: string[];
}

export interface Attachment {
  color?: SeverityColor | string;
  fallback?: string;
  text?: string;
  /** Unix 秒數字串 */
  ts?: string;
  extras?: AttachmentExtras;
}

export interface OutboundMessage {
  username?: string;
  iconEmoji?: string;
  channel?: string;
  text?: string;
  attachments?: Attachment[];
}

export interface JobNotification {
  color: SeverityColor | string;
  iconEmoji?: string;
  /** attachment 內文 */
  details: string;
  /** 訊息本體的摘要文字 */
  text?: string;
}

export interface WebhookRequest {
  url: URL;
  body: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * 可重試的 HTTP 傳輸層
 * 重試與 backoff 由實作自行負責，client 只呼叫 do()。
 */
export interface WebhookTransport {
  do(request: WebhookRequest): Promise<Response>;
}

export interface NotificationClientConfig {
  webhookUrl: string;
  username?: string;
  channel?: string;
  /** 毫秒；未設定或 0 時使用 DEFAULT_TIMEOUT_MS */
  timeout?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
  transport?: WebhookTransport;
}
