import { z } from 'zod';
import { ChatChannelConfigSchema, ChatWebhookChannel } from './chatWebhook.js';
import { EmailChannel, EmailChannelConfigSchema } from './email.js';
import { GenericWebhookChannel, WebhookChannelConfigSchema } from './genericWebhook.js';
import { IssueTrackerChannel, IssueTrackerConfigSchema } from './issueTracker.js';
import type { ChannelTransport } from './transport.js';
import type { ChannelAdapter } from './types.js';

export const ChannelsConfigSchema = z.object({
  email: EmailChannelConfigSchema.optional(),
  chat: ChatChannelConfigSchema.optional(),
  issueTracker: IssueTrackerConfigSchema.optional(),
  webhooks: z.array(WebhookChannelConfigSchema).default([]),
});

export type ChannelsConfig = z.input<typeof ChannelsConfigSchema>;

/**
 * Builds one adapter per configured destination. Absent sections mean the
 * channel is disabled.
 */
export function createChannels(config: ChannelsConfig, transport: ChannelTransport = {}): ChannelAdapter[] {
  const parsed = ChannelsConfigSchema.parse(config);
  const channels: ChannelAdapter[] = [];

  if (parsed.email) channels.push(new EmailChannel(parsed.email, transport));
  if (parsed.chat) channels.push(new ChatWebhookChannel(parsed.chat, transport));
  if (parsed.issueTracker) channels.push(new IssueTrackerChannel(parsed.issueTracker, transport));
  for (const webhook of parsed.webhooks) {
    channels.push(new GenericWebhookChannel(webhook, transport));
  }

  const ids = new Set<string>();
  for (const channel of channels) {
    if (ids.has(channel.id)) {
      throw new Error(`Duplicate notification channel id "${channel.id}"`);
    }
    ids.add(channel.id);
  }

  return channels;
}

export { ChatWebhookChannel, EmailChannel, GenericWebhookChannel, IssueTrackerChannel };
export type { ChannelAdapter, SendResult, ChannelKind } from './types.js';
export type { ChannelTransport } from './transport.js';
