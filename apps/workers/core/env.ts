/**
 * Environment configuration for the scan orchestrator and notification dispatch
 */
import { config } from 'dotenv';
import type { ChannelsConfig } from '../notify/channels/index.js';

config();

const int = (name: string, fallback: number) => parseInt(process.env[name] || String(fallback), 10);
const list = (value: string | undefined) =>
  (value || '')
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean);

export const PORT = int('PORT', 8080);
export const DATABASE_URL = process.env.DATABASE_URL || '';

// Scan slots and lifecycle guards
export const MAX_CONCURRENT_SCANS = int('MAX_CONCURRENT_SCANS', 2);
export const SCAN_TIMEOUT_MS = int('SCAN_TIMEOUT_MS', 2 * 60 * 60 * 1000);
export const CANCEL_GRACE_MS = int('CANCEL_GRACE_MS', 30_000);
export const DEFAULT_SCAN_POLICY = process.env.DEFAULT_SCAN_POLICY || 'default';
export const SCANNER_COMMAND = process.env.SCANNER_COMMAND || 'security-scanner';
export const REPORT_BASE_URL = process.env.REPORT_BASE_URL || undefined;

// Delivery retry policy
export const NOTIFY_MAX_ATTEMPTS = int('NOTIFY_MAX_ATTEMPTS', 3);
export const NOTIFY_BASE_DELAY_MS = int('NOTIFY_BASE_DELAY_MS', 1000);
export const NOTIFY_MAX_DELAY_MS = int('NOTIFY_MAX_DELAY_MS', 30_000);
export const NOTIFY_ATTEMPT_TIMEOUT_MS = int('NOTIFY_ATTEMPT_TIMEOUT_MS', 10_000);
export const NOTIFY_CONCURRENCY = int('NOTIFY_CONCURRENCY', 8);
export const PER_HOST_CONCURRENCY = int('PER_HOST_CONCURRENCY', 2);

/**
 * Channels enabled by the environment. A channel is on when its required
 * variables are set; WEBHOOK_URLS and MAIL_TO take comma-separated lists.
 */
export function channelsConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ChannelsConfig {
  const channels: ChannelsConfig = {};

  if (env.SLACK_WEBHOOK_URL) {
    channels.chat = { webhookUrl: env.SLACK_WEBHOOK_URL, channel: env.SLACK_CHANNEL || undefined };
  }

  if (env.MAIL_API_URL && env.MAIL_API_KEY && env.MAIL_FROM) {
    channels.email = {
      apiUrl: env.MAIL_API_URL,
      apiKey: env.MAIL_API_KEY,
      from: env.MAIL_FROM,
      to: list(env.MAIL_TO),
    };
  }

  if (env.GITHUB_TOKEN && env.GITHUB_REPO_OWNER && env.GITHUB_REPO_NAME) {
    channels.issueTracker = { token: env.GITHUB_TOKEN, owner: env.GITHUB_REPO_OWNER, repo: env.GITHUB_REPO_NAME };
  }

  channels.webhooks = list(env.WEBHOOK_URLS).map((url, index) => ({ id: `webhook-${index + 1}`, url, secret: env.WEBHOOK_SECRET || undefined }));

  return channels;
}
