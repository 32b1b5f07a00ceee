export { NotificationClient, SUCCESS_MARKER } from './client.js';
export { resolveClientConfig, DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS, type ResolvedClientConfig } from './config.js';
export { WebhookError, type WebhookErrorStage } from './errors.js';
export {
  buildJobMessage,
  buildSeverityJob,
  buildSimpleMessage,
  serializeMessage,
  toWirePayload,
  unixTimestamp,
  DEFAULT_ICON_EMOJI,
  SEVERITY_COLORS,
  type WireAttachment,
  type WirePayload,
} from './message.js';
export {
  FetchTransport,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  MAX_RETRY_AFTER_MS,
  type FetchTransportOptions,
} from './transport.js';
export type {
  Attachment,
  AttachmentExtras,
  JobNotification,
  NotificationClientConfig,
  OutboundMessage,
  Severity,
  SeverityColor,
  WebhookRequest,
  WebhookTransport,
} from './types.js';
