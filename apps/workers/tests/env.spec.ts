import { describe, it, expect } from 'vitest';
import { channelsConfigFromEnv } from '../core/env.js';
import { createChannels } from '../notify/channels/index.js';

describe('channelsConfigFromEnv', () => {
  it('enables nothing without credentials', () => {
    expect(channelsConfigFromEnv({})).toEqual({ webhooks: [] });
  });

  it('reads every channel from the environment', () => {
    const config = channelsConfigFromEnv({
      SLACK_WEBHOOK_URL: 'https://chat.test/hooks/abc',
      SLACK_CHANNEL: '#security',
      MAIL_API_URL: 'https://mail.test/send',
      MAIL_API_KEY: 'test-secret',
      MAIL_FROM: 'scanner@example.com',
      MAIL_TO: 'a@example.com, b@example.com',
      GITHUB_TOKEN: 'test-secret',
      GITHUB_REPO_OWNER: 'acme',
      GITHUB_REPO_NAME: 'web',
      WEBHOOK_URLS: 'https://hooks.test/a,https://hooks.test/b',
      WEBHOOK_SECRET: 'test-secret',
    });

    expect(config).toEqual({
      chat: { webhookUrl: 'https://chat.test/hooks/abc', channel: '#security' },
      email: {
        apiUrl: 'https://mail.test/send',
        apiKey: 'test-secret',
        from: 'scanner@example.com',
        to: ['a@example.com', 'b@example.com'],
      },
      issueTracker: { token: 'test-secret', owner: 'acme', repo: 'web' },
      webhooks: [
        { id: 'webhook-1', url: 'https://hooks.test/a', secret: 'test-secret' },
        { id: 'webhook-2', url: 'https://hooks.test/b', secret: 'test-secret' },
      ],
    });
    expect(createChannels(config).map((channel) => channel.id)).toEqual([
      'email',
      'chat',
      'issue-tracker',
      'webhook-1',
      'webhook-2',
    ]);
  });
});
