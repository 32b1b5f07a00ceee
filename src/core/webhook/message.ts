/**
 * 訊息組裝與序列化
 *
 * - 嚴重程度對應顏色（info → good、warning → warning、error → danger）
 * - attachment 的 ts 在送出當下才產生
 * - 序列化時省略所有空欄位，不輸出 null
 */

import { WebhookError } from './errors.js';
import type {
  Attachment,
  JobNotification,
  OutboundMessage,
  Severity,
  SeverityColor,
} from './types.js';

export const DEFAULT_ICON_EMOJI = ':hammer_and_wrench:';

export const SEVERITY_COLORS: Record<Severity, SeverityColor> = {
  info: 'good',
  warning: 'warning',
  error: 'danger',
};

export interface MessageDefaults {
  username?: string;
  channel?: string;
}

export interface WireAttachment {
  color?: string;
  fallback?: string;
  callback_id?: string;
  id?: number;
  author_id?: string;
  author_name?: string;
  author_subname?: string;
  author_link?: string;
  author_icon?: string;
  title?: string;
  title_link?: string;
  pretext?: string;
  text?: string;
  image_url?: string;
  thumb_url?: string;
  mrkdwn_in?: string[];
  ts?: number;
}

export interface WirePayload {
  username?: string;
  icon_emoji?: string;
  channel?: string;
  text?: string;
  attachments?: WireAttachment[];
}

/**
 * 目前時間的 Unix 秒數字串
 */
export function unixTimestamp(now: Date = new Date()): string {
  return Math.floor(now.getTime() / 1000).toString();
}

export function buildSimpleMessage(
  defaults: MessageDefaults,
  text: string,
  iconEmoji?: string
): OutboundMessage {
  return {
    text,
    username: defaults.username,
    iconEmoji,
    channel: defaults.channel,
  };
}

export function buildJobMessage(
  defaults: MessageDefaults,
  job: JobNotification,
  now: Date = new Date()
): OutboundMessage {
  const attachment: Attachment = {
    color: job.color,
    text: job.details,
    ts: unixTimestamp(now),
  };

  return {
    text: job.text,
    username: defaults.username,
    iconEmoji: job.iconEmoji,
    channel: defaults.channel,
    attachments: [attachment],
  };
}

/**
 * 便利方法用的 job 通知：固定顏色、預設圖示、不帶摘要
 */
export function buildSeverityJob(severity: Severity, message: string, iconEmoji?: string): JobNotification {
  return {
    color: SEVERITY_COLORS[severity],
    iconEmoji: iconEmoji || DEFAULT_ICON_EMOJI,
    details: message,
  };
}

function nonEmpty(value: string | undefined | null): value is string {
  return typeof value === 'string' && value.length > 0;
}

function toWireTimestamp(ts: string): number {
  if (!/^\d+$/.test(ts)) {
    throw new WebhookError('serialization', `Invalid attachment timestamp: "${ts}"`);
  }
  return Number(ts);
}

function toWireAttachment(attachment: Attachment): WireAttachment {
  const wire: WireAttachment = {};
  const extras = attachment.extras ?? {};

  if (nonEmpty(attachment.color)) wire.color = attachment.color;
  if (nonEmpty(attachment.fallback)) wire.fallback = attachment.fallback;
  if (nonEmpty(extras.callbackId)) wire.callback_id = extras.callbackId;
  if (extras.id) wire.id = extras.id;
  if (nonEmpty(extras.authorId)) wire.author_id = extras.authorId;
  if (nonEmpty(extras.authorName)) wire.author_name = extras.authorName;
  if (nonEmpty(extras.authorSubname)) wire.author_subname = extras.authorSubname;
  if (nonEmpty(extras.authorLink)) wire.author_link = extras.authorLink;
  if (nonEmpty(extras.authorIcon)) wire.author_icon = extras.authorIcon;
  if (nonEmpty(extras.title)) wire.title = extras.title;
  if (nonEmpty(extras.titleLink)) wire.title_link = extras.titleLink;
  if (nonEmpty(extras.pretext)) wire.pretext = extras.pretext;
  if (nonEmpty(attachment.text)) wire.text = attachment.text;
  if (nonEmpty(extras.imageUrl)) wire.image_url = extras.imageUrl;
  if (nonEmpty(extras.thumbUrl)) wire.thumb_url = extras.thumbUrl;
  if (extras.mrkdwnIn && extras.mrkdwnIn.length > 0) wire.mrkdwn_in = [...extras.mrkdwnIn];
  if (nonEmpty(attachment.ts)) wire.ts = toWireTimestamp(attachment.ts);

  return wire;
}

export function toWirePayload(message: OutboundMessage): WirePayload {
  const wire: WirePayload = {};

  if (nonEmpty(message.username)) wire.username = message.username;
  if (nonEmpty(message.iconEmoji)) wire.icon_emoji = message.iconEmoji;
  if (nonEmpty(message.channel)) wire.channel = message.channel;
  if (nonEmpty(message.text)) wire.text = message.text;
  if (message.attachments && message.attachments.length > 0) {
    wire.attachments = message.attachments.map(toWireAttachment);
  }

  return wire;
}

export function serializeMessage(message: OutboundMessage): string {
  try {
    return JSON.stringify(toWirePayload(message));
  } catch (error) {
    if (error instanceof WebhookError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new WebhookError('serialization', `Failed to serialize message: ${reason}`, { cause: error });
  }
}
