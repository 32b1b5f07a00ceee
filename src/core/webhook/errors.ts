export type WebhookErrorStage = 'serialization' | 'request' | 'response-read' | 'rejected';

export interface WebhookErrorDetails {
  status?: number;
  body?: string;
  cause?: unknown;
}

/**
 * 送出 webhook 訊息失敗
 *
 * 傳輸層錯誤（網路、DNS、TLS、逾時）不包裝，原樣拋出；
 * 其餘階段的失敗以 stage 區分。
 */
export class WebhookError extends Error {
  readonly stage: WebhookErrorStage;
  readonly status?: number;
  readonly body?: string;

  constructor(stage: WebhookErrorStage, message: string, details?: WebhookErrorDetails) {
    super(message, details?.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'WebhookError';
    this.stage = stage;
    this.status = details?.status;
    this.body = details?.body;
  }
}
