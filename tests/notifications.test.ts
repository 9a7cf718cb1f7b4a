/**
 * Slack notification tests
 *
 * fetch is stubbed and the config module mocked, so nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockSecrets = vi.hoisted((): { slack?: { webhookUrl: string } } => ({}));

vi.mock('../src/config/index.js', () => ({
  getConfig: () => ({
    notifications: { slack: { enabled: false } },
  }),
  getSecrets: () => mockSecrets,
}));

import {
  escapeMrkdwn,
  formatSlackMessage,
  formatTodoNotification,
  notifySlack,
  sendToSlack,
} from '../src/core/notifications.js';
import { WebhookError } from '../src/core/errors.js';
import type { TrackedIssue } from '../src/core/jira-cli.js';

const WEBHOOK = 'https://hooks.slack.com/services/test-secret';

function issue(key: string, status: string, summary = `Summary ${key}`): TrackedIssue {
  return { key, summary, status, url: `https://jira.example.com/browse/${key}` };
}

describe('formatSlackMessage', () => {
  it('builds header, body, divider and footer blocks', () => {
    const message = formatSlackMessage({ title: 'Jira TODO', text: 'body', footer: 'footer' });

    expect(message).toEqual({
      text: 'Jira TODO',
      blocks: [
        { type: 'header', text: { type: 'plain_text', text: 'Jira TODO', emoji: true } },
        { type: 'section', text: { type: 'mrkdwn', text: 'body' } },
        { type: 'divider' },
        { type: 'context', elements: [{ type: 'mrkdwn', text: 'footer' }] },
      ],
    });
  });

  it('links at most 15 tickets', () => {
    const ticketLinks = Array.from({ length: 17 }, (_, i) => ({
      id: `ACM-${i + 1}`,
      url: `https://jira.example.com/browse/ACM-${i + 1}`,
    }));

    const links = formatSlackMessage({ text: 'x', ticketLinks, footer: 'f' }).blocks[1].text?.text ?? '';
    const lines = links.split('\n');

    expect(lines).toHaveLength(16);
    expect(lines[0]).toBe('• <https://jira.example.com/browse/ACM-1|ACM-1>');
    expect(lines[15]).toBe('…and 2 more');
  });

  it('escapes mrkdwn control characters', () => {
    expect(escapeMrkdwn('a<b>&c')).toBe('a&lt;b&gt;&amp;c');
  });
});

describe('formatTodoNotification', () => {
  it('summarizes counts per status', () => {
    const message = formatTodoNotification([issue('ACM-1', 'New'), issue('ACM-2', 'In Progress')], '2025-01-06');

    expect(message.title).toBe('Jira TODO · 2025-01-06');
    expect(message.text).toBe('*2 open issues*\n• In Progress: 1\n• New: 1');
    expect(message.ticketLinks).toEqual([
      { id: 'ACM-1', url: 'https://jira.example.com/browse/ACM-1', title: 'Summary ACM-1' },
      { id: 'ACM-2', url: 'https://jira.example.com/browse/ACM-2', title: 'Summary ACM-2' },
    ]);
  });

  it('says when nothing is assigned', () => {
    expect(formatTodoNotification([], '2025-01-06').text).toBe('No open issues assigned today.');
  });
});

describe('Slack delivery', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    delete mockSecrets.slack;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the formatted payload to the webhook', async () => {
    fetchMock.mockResolvedValueOnce({ ok: true, status: 200, statusText: 'OK' });

    await sendToSlack({ text: 'hello', footer: 'f' }, WEBHOOK);

    expect(fetchMock).toHaveBeenCalledWith(WEBHOOK, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(formatSlackMessage({ text: 'hello', footer: 'f' })),
    });
  });

  it('throws when no webhook is configured', async () => {
    await expect(sendToSlack({ text: 'hello' })).rejects.toThrow(
      'Slack webhook URL not configured. Set SLACK_WEBHOOK_URL.'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports an HTTP error status', async () => {
    fetchMock.mockResolvedValueOnce({ ok: false, status: 403, statusText: 'Forbidden' });

    const error = await sendToSlack({ text: 'hello' }, WEBHOOK).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WebhookError);
    expect(error).toMatchObject({ message: 'Slack API error: 403 Forbidden', statusCode: 403 });
  });

  it('reports a network failure', async () => {
    fetchMock.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND'));

    await expect(sendToSlack({ text: 'hello' }, WEBHOOK)).rejects.toThrow(
      'Failed to send Slack message: getaddrinfo ENOTFOUND'
    );
  });

  it('skips delivery when the webhook is not set', async () => {
    expect(await notifySlack({ text: 'hello' })).toEqual({ sent: false, reason: 'not-configured' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('uses the webhook from the environment secrets', async () => {
    mockSecrets.slack = { webhookUrl: WEBHOOK };
    fetchMock.mockResolvedValueOnce({ ok: true, status: 200, statusText: 'OK' });

    expect(await notifySlack({ text: 'hello' })).toEqual({ sent: true });
    expect(fetchMock).toHaveBeenCalledWith(WEBHOOK, expect.anything());
  });

  it('returns the failure instead of throwing', async () => {
    mockSecrets.slack = { webhookUrl: WEBHOOK };
    fetchMock.mockResolvedValueOnce({ ok: false, status: 500, statusText: 'Server Error' });

    const result = await notifySlack({ text: 'hello' });

    expect(result.sent).toBe(false);
    if (!result.sent && result.reason === 'failed') {
      expect(result.error.message).toBe('Slack API error: 500 Server Error');
    } else {
      expect.unreachable();
    }
  });
});
