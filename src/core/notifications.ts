/**
 * Slack webhook delivery for the daily TODO broadcast
 */

import { getConfig, getSecrets } from '../config/index.js';
import { WebhookError } from './errors.js';
import type { TrackedIssue } from './jira-cli.js';
import { countBy } from './todo-files.js';

export interface NotificationMessage {
  title?: string;
  text: string;
  ticketLinks?: { id: string; url: string; title?: string }[];
  footer?: string;
}

/**
 * Slack webhook message format
 */
interface SlackMessage {
  text?: string;
  blocks: SlackBlock[];
}

interface SlackBlock {
  type: string;
  text?: {
    type: string;
    text: string;
    emoji?: boolean;
  };
  elements?: Array<{
    type: string;
    text?: string;
  }>;
}

export type DeliveryResult =
  | { sent: true }
  | { sent: false; reason: 'not-configured' }
  | { sent: false; reason: 'failed'; error: WebhookError };

// Slack rejects section text over 3000 characters
const MAX_SECTION_LENGTH = 3000;
const MAX_LINKED_TICKETS = 15;

/**
 * Format a message for Slack
 */
export function formatSlackMessage(message: NotificationMessage): SlackMessage {
  const blocks: SlackBlock[] = [];

  // Header
  if (message.title) {
    blocks.push({
      type: 'header',
      text: {
        type: 'plain_text',
        text: message.title,
        emoji: true,
      },
    });
  }

  blocks.push({
    type: 'section',
    text: {
      type: 'mrkdwn',
      text: message.text.slice(0, MAX_SECTION_LENGTH),
    },
  });

  // Ticket links
  if (message.ticketLinks && message.ticketLinks.length > 0) {
    const shown = message.ticketLinks.slice(0, MAX_LINKED_TICKETS);
    const more = message.ticketLinks.length - shown.length;
    const ticketText = shown
      .map((t) => `• <${t.url}|${t.id}>${t.title ? `: ${escapeMrkdwn(t.title)}` : ''}`)
      .concat(more > 0 ? [`…and ${more} more`] : [])
      .join('\n');

    blocks.push({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: ticketText.slice(0, MAX_SECTION_LENGTH),
      },
    });
  }

  blocks.push({ type: 'divider' });

  blocks.push({
    type: 'context',
    elements: [
      {
        type: 'mrkdwn',
        text: message.footer || `Sent via jira-rollup · ${new Date().toLocaleString()}`,
      },
    ],
  });

  return { text: message.title ?? message.text.slice(0, 150), blocks };
}

/**
 * Slack treats &, < and > as control characters in mrkdwn
 */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function resolveWebhookUrl(): string | undefined {
  return getSecrets().slack?.webhookUrl || getConfig().notifications.slack.webhookUrl;
}

/**
 * Send a notification to Slack
 */
export async function sendToSlack(message: NotificationMessage, webhookUrl?: string): Promise<true> {
  const url = webhookUrl || resolveWebhookUrl();

  if (!url) {
    throw new WebhookError('Slack webhook URL not configured. Set SLACK_WEBHOOK_URL.');
  }

  const payload = formatSlackMessage(message);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  } catch (error) {
    throw new WebhookError(
      `Failed to send Slack message: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      error
    );
  }

  if (!response.ok) {
    throw new WebhookError(
      `Slack API error: ${response.status} ${response.statusText}`,
      response.status
    );
  }

  return true;
}

/**
 * Best-effort delivery: never throws, reports what happened
 */
export async function notifySlack(message: NotificationMessage): Promise<DeliveryResult> {
  const url = resolveWebhookUrl();
  if (!url) {
    return { sent: false, reason: 'not-configured' };
  }

  try {
    await sendToSlack(message, url);
    return { sent: true };
  } catch (error) {
    const webhookError =
      error instanceof WebhookError
        ? error
        : new WebhookError(error instanceof Error ? error.message : String(error), undefined, error);
    return { sent: false, reason: 'failed', error: webhookError };
  }
}

/**
 * Format the daily TODO list for Slack
 */
export function formatTodoNotification(issues: TrackedIssue[], date: string): NotificationMessage {
  const counts = countBy(issues.map((i) => i.status));
  const summary =
    issues.length === 0
      ? 'No open issues assigned today.'
      : `*${issues.length} open issue${issues.length === 1 ? '' : 's'}*\n` +
        counts.map(([status, n]) => `• ${escapeMrkdwn(status)}: ${n}`).join('\n');

  return {
    title: `Jira TODO · ${date}`,
    text: summary,
    ticketLinks: issues.map((i) => ({ id: i.key, url: i.url, title: i.summary })),
  };
}
