/**
 * Merged pull request → tracked Jira issue
 *
 * Creation is the only step allowed to fail the run; sprint membership,
 * transition, PR back-links and the audit line are attempted in order and
 * reported as warnings when they fail.
 */

import type { JiraDefaults } from '../config/schema.js';
import { appendAuditEntry } from './audit-log.js';
import { estimateEffort, type EffortEstimate } from './effort.js';
import { RollupError } from './errors.js';
import type { PullRequest } from './github.js';
import type { CreateIssueFields } from './jira-cli.js';

/** The parts of GitHubClient this workflow needs */
export interface PullRequestSource {
  getPR(prNumber: number): Promise<PullRequest>;
  comment(prNumber: number, body: string): Promise<void>;
  updateBody(prNumber: number, body: string): Promise<void>;
}

/** The parts of JiraCli this workflow needs */
export interface IssueTracker {
  issueUrl(key: string): string;
  me(): Promise<string>;
  createIssue(fields: CreateIssueFields): Promise<string>;
  moveIssue(key: string, status: string): Promise<void>;
  activeSprintId(): Promise<string | null>;
  addToSprint(sprintId: string, key: string): Promise<void>;
}

export interface IssuePlan {
  pr: PullRequest;
  estimate: EffortEstimate;
  fields: CreateIssueFields;
}

export interface ConversionOptions {
  updateBody?: boolean;
  auditLog: string;
  now?: Date;
}

export interface ConversionResult {
  key: string;
  url: string;
  warnings: string[];
}

const MAX_DESCRIPTION_LENGTH = 2000;

export class UnmergedPullRequestError extends RollupError {
  constructor(pr: PullRequest) {
    super(
      `Pull request #${pr.number} is ${pr.state}, not merged`,
      'Merge it first, or pass --allow-unmerged to create the issue anyway'
    );
    this.name = 'UnmergedPullRequestError';
  }
}

export function buildIssueBody(pr: PullRequest, estimate: EffortEstimate): string {
  const lines = [
    `Created from pull request ${pr.url}`,
    '',
    `Branch: ${pr.headBranch || 'unknown'}`,
  ];
  if (pr.author) lines.push(`Author: ${pr.author}`);
  lines.push(
    `Size: +${pr.additions} / -${pr.deletions} across ${pr.changedFiles} file(s)`,
    `Effort estimate: ${estimate.bucket} (${estimate.storyPoints} pts, ${estimate.originalEstimate})`
  );

  const description = pr.body.trim();
  if (description) {
    const clipped =
      description.length > MAX_DESCRIPTION_LENGTH
        ? `${description.slice(0, MAX_DESCRIPTION_LENGTH)}...`
        : description;
    lines.push('', '----', '', clipped);
  }

  return lines.join('\n');
}

export function buildIssuePlan(
  pr: PullRequest,
  defaults: JiraDefaults,
  options: { allowUnmerged?: boolean } = {}
): IssuePlan {
  if (pr.state !== 'merged' && !options.allowUnmerged) {
    throw new UnmergedPullRequestError(pr);
  }

  const estimate = estimateEffort(pr);
  const labels = [...defaults.labels, `effort-${estimate.bucket.toLowerCase()}`];

  return {
    pr,
    estimate,
    fields: {
      project: defaults.project,
      type: defaults.issueType,
      summary: pr.title,
      body: buildIssueBody(pr, estimate),
      priority: defaults.priority,
      labels,
      component: defaults.component,
      assignee: defaults.assignee,
      originalEstimate: estimate.originalEstimate,
    },
  };
}

export function backLinkComment(key: string, url: string, estimate: EffortEstimate): string {
  return `Tracked in Jira: [${key}](${url}) · effort ${estimate.bucket} (${estimate.storyPoints} pts)`;
}

export function appendJiraLine(body: string, key: string, url: string): string {
  if (body.includes(key)) return body;
  const trimmed = body.replace(/\s+$/, '');
  return `${trimmed}${trimmed ? '\n\n' : ''}Jira: [${key}](${url})`;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create the issue, then run the best-effort follow-ups
 */
export async function executeIssuePlan(
  plan: IssuePlan,
  deps: { tracker: IssueTracker; source: PullRequestSource; defaults: JiraDefaults },
  options: ConversionOptions
): Promise<ConversionResult> {
  const { tracker, source, defaults } = deps;
  const { pr, estimate } = plan;
  const warnings: string[] = [];
  const fields = { ...plan.fields };

  if (!fields.assignee) {
    try {
      fields.assignee = await tracker.me();
    } catch (error) {
      warnings.push(`Could not resolve the current Jira user; issue left unassigned (${messageOf(error)})`);
    }
  }

  const key = await tracker.createIssue(fields);
  const url = tracker.issueUrl(key);

  try {
    const sprintId = defaults.sprintId ?? (await tracker.activeSprintId());
    if (sprintId) {
      await tracker.addToSprint(sprintId, key);
    } else {
      warnings.push('No active sprint found; issue not added to a sprint');
    }
  } catch (error) {
    warnings.push(`Sprint assignment failed: ${messageOf(error)}`);
  }

  if (pr.state === 'merged') {
    try {
      await tracker.moveIssue(key, defaults.doneStatus);
    } catch (error) {
      warnings.push(`Transition to "${defaults.doneStatus}" failed: ${messageOf(error)}`);
    }
  }

  try {
    await source.comment(pr.number, backLinkComment(key, url, estimate));
  } catch (error) {
    warnings.push(`PR comment failed: ${messageOf(error)}`);
  }

  if (options.updateBody) {
    try {
      const updated = appendJiraLine(pr.body, key, url);
      if (updated !== pr.body) {
        await source.updateBody(pr.number, updated);
      }
    } catch (error) {
      warnings.push(`PR description update failed: ${messageOf(error)}`);
    }
  }

  try {
    appendAuditEntry(options.auditLog, {
      timestamp: options.now ?? new Date(),
      prUrl: pr.url,
      issueKey: key,
      effort: estimate.bucket,
      linesChanged: estimate.linesChanged,
      filesChanged: estimate.filesChanged,
    });
  } catch (error) {
    warnings.push(`Audit log not written: ${messageOf(error)}`);
  }

  return { key, url, warnings };
}
