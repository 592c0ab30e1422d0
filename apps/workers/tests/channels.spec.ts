import { createHmac } from 'node:crypto';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import {
  ChatWebhookChannel,
  EmailChannel,
  GenericWebhookChannel,
  IssueTrackerChannel,
  createChannels,
} from '../notify/channels/index.js';
import { buildChatMessage, summaryLine } from '../notify/channels/chatWebhook.js';
import { emailSubject, emailText } from '../notify/channels/email.js';
import { buildIssue } from '../notify/channels/issueTracker.js';
import { resultForStatus } from '../notify/channels/types.js';
import { HostLimiters } from '../src/core/limiters.js';
import { completedJob, envelopeFor, failedJob } from './fixtures.js';

const signal = () => new AbortController().signal;

describe('resultForStatus', () => {
  it('treats 2xx as sent', () => {
    expect(resultForStatus(204)).toEqual({ ok: true });
  });

  it('marks client errors as final except 408 and 429', () => {
    expect(resultForStatus(404, 'no such hook')).toEqual({ ok: false, reason: 'HTTP 404: no such hook', retryable: false });
    expect(resultForStatus(429)).toEqual({ ok: false, reason: 'HTTP 429', retryable: true });
    expect(resultForStatus(408)).toEqual({ ok: false, reason: 'HTTP 408', retryable: true });
    expect(resultForStatus(503)).toEqual({ ok: false, reason: 'HTTP 503', retryable: true });
  });
});

describe('chat message rendering', () => {
  it('summarizes critical findings', () => {
    expect(summaryLine(envelopeFor(completedJob()))).toBe(
      ':rotating_light: *Critical Issues Found* - 1 critical vulnerabilities detected!'
    );
  });

  it('reports a clean scan', () => {
    const clean = completedJob({
      statistics: { critical: 0, high: 0, medium: 0, low: 0, info: 0, total: 0 },
      buildOutcome: 'success',
    });
    expect(summaryLine(envelopeFor(clean))).toBe(':white_check_mark: *Clean Scan* - No vulnerabilities detected!');
  });

  it('builds a completed message with threshold fields and a report button', () => {
    const message = buildChatMessage(envelopeFor(completedJob()), 'Security Scanner', '#security');
    expect(message.text).toBe('Security scan completed for *shop*');
    expect(message.channel).toBe('#security');

    const [attachment] = message.attachments;
    expect(attachment.color).toBe('danger');
    expect(attachment.footer).toBe('Scan scan-abc');
    expect(attachment.ts).toBe(Date.UTC(2026, 2, 1, 12) / 1000);
    expect(attachment.fields).toContainEqual({ title: 'Outcome', value: 'FAILURE', short: true });
    expect(attachment.fields).toContainEqual({ title: 'Threshold exceeded: critical', value: '1 > 0', short: true });
    expect(attachment.actions).toEqual([{
      type: 'button',
      text: 'View Full Report',
      url: 'https://reports.test/scans/scan-abc/report.html',
      style: 'primary',
    }]);
  });

  it('builds a failure message carrying the error', () => {
    const message = buildChatMessage(envelopeFor(failedJob(), false), 'Security Scanner');
    expect(message.text).toBe('Security scan failed for *shop*');
    expect(message).not.toHaveProperty('channel');
    expect(message.attachments[0].pretext).toBe(':x: *Scan Failed*');
    expect(message.attachments[0].fields[2]).toEqual({ title: 'Error', value: 'timeout', short: false });
  });
});

describe('email rendering', () => {
  it('picks a subject per event', () => {
    expect(emailSubject(envelopeFor(completedJob()))).toBe('ALERT: thresholds exceeded for shop (failure)');
    expect(emailSubject(envelopeFor(failedJob()))).toBe('Security scan failed: shop');
    expect(emailSubject(envelopeFor(completedJob({ buildOutcome: 'success' })))).toBe(
      'Security scan passed: shop (6 findings)'
    );
  });

  it('writes a plain-text body with counts and breaches', () => {
    expect(emailText(envelopeFor(completedJob()))).toBe([
      'Application: shop',
      'Scan: scan-abc (quick)',
      'Outcome: FAILURE',
      'critical: 1',
      'high: 5',
      'medium: 0',
      'low: 0',
      'info: 0',
      'total: 6',
      'Threshold exceeded: critical 1 > 0',
      'Report: https://reports.test/scans/scan-abc/report.html',
    ].join('\n'));
  });

  it('writes a failure body without counts', () => {
    expect(emailText(envelopeFor(failedJob(), false))).toBe(
      ['Application: shop', 'Scan: scan-abc (quick)', 'Status: FAILED', 'Error: timeout'].join('\n')
    );
  });

  it('renders the HTML template', () => {
    const channel = new EmailChannel({
      apiUrl: 'https://mail.test/send',
      apiKey: 'test-secret',
      from: 'scanner@example.com',
      to: ['team@example.com'],
    });
    const message = channel.render(envelopeFor(completedJob()));
    expect(message?.to).toEqual(['team@example.com']);
    expect(message?.html).toContain('<h2>Security Scan Report: FAILURE</h2>');
    expect(message?.html).toContain('<tr><td>critical</td><td>1</td></tr>');
  });

  it('skips when nobody is subscribed', () => {
    const channel = new EmailChannel({ apiUrl: 'https://mail.test/send', apiKey: 'test-secret', from: 'scanner@example.com' });
    expect(channel.render(envelopeFor(completedJob()))).toBeNull();
  });
});

describe('issue rendering', () => {
  it('titles and labels the issue by outcome', () => {
    const issue = buildIssue(envelopeFor(completedJob()), ['security']);
    expect(issue.title).toBe('[Security] shop: failure (1 critical, 5 high)');
    expect(issue.labels).toEqual(['security', 'outcome:failure']);
    expect(issue.body).toContain('| critical | 1 |');
    expect(issue.body).toContain('- critical: 1 found, limit 0');
    expect(issue.body).toContain('[Full report](https://reports.test/scans/scan-abc/report.html)');
  });

  it('only opens issues for outcomes at or above the configured minimum', () => {
    const channel = new IssueTrackerChannel({ token: 'test-secret', owner: 'acme', repo: 'web', minOutcome: 'failure' });
    expect(channel.render(envelopeFor(completedJob({ buildOutcome: 'unstable' })))).toBeNull();
    expect(channel.render(envelopeFor(completedJob({ buildOutcome: 'success' })))).toBeNull();
    expect(channel.render(envelopeFor(failedJob()))).toBeNull();
    expect(channel.render(envelopeFor(completedJob()))?.title).toBe('[Security] shop: failure (1 critical, 5 high)');
  });
});

describe('channel delivery', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('posts the signed webhook payload', async () => {
    const channel = new GenericWebhookChannel(
      { url: 'https://hooks.test/scan-events', secret: 'test-secret' },
      { dispatcher: agent }
    );
    const payload = channel.render(envelopeFor(completedJob()));
    const body = JSON.stringify(payload);
    const signature = `sha256=${createHmac('sha256', 'test-secret').update(body).digest('hex')}`;

    agent.get('https://hooks.test')
      .intercept({
        path: '/scan-events',
        method: 'POST',
        body,
        headers: { 'x-signature-256': signature, 'content-type': 'application/json' },
      })
      .reply(202, '');

    expect(channel.id).toBe('webhook:hooks.test');
    await expect(channel.send(payload, signal())).resolves.toEqual({ ok: true });
    agent.assertNoPendingInterceptors();
  });

  it('reports a 4xx from the chat webhook as non-retryable', async () => {
    const channel = new ChatWebhookChannel({ webhookUrl: 'https://chat.test/hooks/abc' }, { dispatcher: agent });
    agent.get('https://chat.test').intercept({ path: '/hooks/abc', method: 'POST' }).reply(404, 'no_service');

    const result = await channel.send(channel.render(envelopeFor(completedJob())), signal());
    expect(result).toEqual({ ok: false, reason: 'HTTP 404: no_service', retryable: false });
  });

  it('authenticates against the mail API', async () => {
    const channel = new EmailChannel(
      { apiUrl: 'https://mail.test/send', apiKey: 'test-secret', from: 'scanner@example.com', to: ['team@example.com'] },
      { dispatcher: agent }
    );
    agent.get('https://mail.test')
      .intercept({ path: '/send', method: 'POST', headers: { authorization: 'Bearer test-secret' } })
      .reply(200, '{"id":"msg-1"}');

    const message = channel.render(envelopeFor(completedJob()));
    if (!message) throw new Error('expected an email to be rendered');
    await expect(channel.send(message, signal())).resolves.toEqual({ ok: true });
  });

  it('opens an issue in the configured repository', async () => {
    const channel = new IssueTrackerChannel(
      { token: 'test-secret', owner: 'acme', repo: 'web', apiBaseUrl: 'https://git.test/api/' },
      { dispatcher: agent }
    );
    agent.get('https://git.test')
      .intercept({ path: '/api/repos/acme/web/issues', method: 'POST' })
      .reply(422, '{"message":"Validation Failed"}');

    const issue = channel.render(envelopeFor(completedJob()));
    if (!issue) throw new Error('expected an issue to be rendered');
    await expect(channel.send(issue, signal())).resolves.toEqual({
      ok: false,
      reason: 'HTTP 422: {"message":"Validation Failed"}',
      retryable: false,
    });
  });

  it('checks connectivity per channel', async () => {
    const webhook = new GenericWebhookChannel({ id: 'ops', url: 'https://hooks.test/ping' }, { dispatcher: agent });
    const issues = new IssueTrackerChannel(
      { token: 'test-secret', owner: 'acme', repo: 'web', apiBaseUrl: 'https://git.test' },
      { dispatcher: agent }
    );
    agent.get('https://hooks.test').intercept({ path: '/ping', method: 'POST' }).reply(200, 'ok');
    agent.get('https://git.test').intercept({ path: '/repos/acme/web', method: 'GET' }).reply(401, 'Bad credentials');

    await expect(webhook.testConnection()).resolves.toBe(true);
    await expect(issues.testConnection()).resolves.toBe(false);
  });

  it('routes requests through the per-host limiter', async () => {
    const hostLimiters = new HostLimiters(1);
    const channel = new GenericWebhookChannel({ url: 'https://hooks.test/limited' }, { dispatcher: agent, hostLimiters });
    agent.get('https://hooks.test').intercept({ path: '/limited', method: 'POST' }).reply(200, 'ok').times(2);

    const payload = channel.render(envelopeFor(completedJob()));
    const results = await Promise.all([channel.send(payload, signal()), channel.send(payload, signal())]);

    expect(results).toEqual([{ ok: true }, { ok: true }]);
    expect(hostLimiters.stats()).toEqual([{ hostname: 'hooks.test', size: 0, pending: 0, concurrency: 1 }]);
  });
});

describe('createChannels', () => {
  it('builds one adapter per configured destination', () => {
    const channels = createChannels({
      chat: { webhookUrl: 'https://chat.test/hooks/abc' },
      issueTracker: { token: 'test-secret', owner: 'acme', repo: 'web' },
      webhooks: [{ id: 'webhook-1', url: 'https://hooks.test/a' }, { id: 'webhook-2', url: 'https://hooks.test/b' }],
    });
    expect(channels.map((c) => [c.id, c.kind])).toEqual([
      ['chat', 'chat'],
      ['issue-tracker', 'issue-tracker'],
      ['webhook-1', 'webhook'],
      ['webhook-2', 'webhook'],
    ]);
  });

  it('rejects duplicate channel ids', () => {
    expect(() => createChannels({
      webhooks: [{ url: 'https://hooks.test/a' }, { url: 'https://hooks.test/b' }],
    })).toThrow('Duplicate notification channel id "webhook:hooks.test"');
  });

  it('validates channel settings', () => {
    expect(() => createChannels({ chat: { webhookUrl: 'not-a-url' } })).toThrow();
  });
});
