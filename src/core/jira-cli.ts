import { z } from 'zod';
import { runTool } from './cli-runner.js';
import { TrackerResponseError } from './errors.js';

/**
 * An issue as returned by the daily / weekly queries
 */
export interface TrackedIssue {
  key: string;
  summary: string;
  status: string;
  priority?: string;
  type?: string;
  url: string;
}

export interface CreateIssueFields {
  project?: string;
  type: string;
  summary: string;
  body: string;
  priority?: string;
  labels: string[];
  component?: string;
  assignee?: string;
  originalEstimate?: string;
}

const NamedSchema = z.object({ name: z.string() }).nullish();

const RawIssueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().nullish(),
    status: NamedSchema,
    priority: NamedSchema,
    issuetype: NamedSchema,
  }),
});

// `jira issue list --raw` prints the search response; older releases print the bare array
const RawListSchema = z.union([
  z.array(RawIssueSchema),
  z.object({ issues: z.array(RawIssueSchema) }),
]);

const ISSUE_KEY_PATTERN = /\b([A-Z][A-Z0-9]*-\d+)\b/;

/**
 * jira-cli (ankitpokhrel/jira-cli) wrapper
 * Lists, creates and transitions issues and manages sprint membership
 */
export class JiraCli {
  constructor(private readonly browseUrl: string) {}

  issueUrl(key: string): string {
    return `${this.browseUrl.replace(/\/+$/, '')}/${key}`;
  }

  /**
   * Run a JQL query and return the matching issues
   */
  async listIssues(jql: string): Promise<TrackedIssue[]> {
    const stdout = await runTool('jira', ['issue', 'list', '--jql', jql, '--raw'], 'list issues');
    return this.parseIssueList(stdout);
  }

  parseIssueList(stdout: string): TrackedIssue[] {
    if (!stdout) return [];

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (err) {
      throw new TrackerResponseError('jira', 'issue list output is not JSON', err);
    }

    const parsed = RawListSchema.safeParse(json);
    if (!parsed.success) {
      throw new TrackerResponseError('jira', parsed.error.issues[0]?.message ?? 'bad shape');
    }

    const raw = Array.isArray(parsed.data) ? parsed.data : parsed.data.issues;
    return raw.map((issue) => ({
      key: issue.key,
      summary: issue.fields.summary ?? '',
      status: issue.fields.status?.name ?? 'Unknown',
      priority: issue.fields.priority?.name,
      type: issue.fields.issuetype?.name,
      url: this.issueUrl(issue.key),
    }));
  }

  /**
   * Login of the authenticated user
   */
  async me(): Promise<string> {
    return runTool('jira', ['me'], 'resolve the current user');
  }

  /**
   * Create an issue non-interactively and return its key
   */
  async createIssue(fields: CreateIssueFields): Promise<string> {
    const stdout = await runTool('jira', this.buildCreateArgs(fields), 'create the issue');
    const key = this.parseCreatedKey(stdout);
    if (!key) {
      throw new TrackerResponseError('jira', `no issue key in create output "${stdout}"`);
    }
    return key;
  }

  buildCreateArgs(fields: CreateIssueFields): string[] {
    const args = ['issue', 'create', '--no-input', '-t', fields.type, '-s', fields.summary];
    if (fields.project) args.push('-p', fields.project);
    args.push('-b', fields.body);
    if (fields.priority) args.push('-y', fields.priority);
    for (const label of fields.labels) args.push('-l', label);
    if (fields.component) args.push('-C', fields.component);
    if (fields.assignee) args.push('-a', fields.assignee);
    if (fields.originalEstimate) args.push('--original-estimate', fields.originalEstimate);
    return args;
  }

  /**
   * jira-cli prints the new issue URL (…/browse/KEY); fall back to the first key
   */
  parseCreatedKey(stdout: string): string | null {
    const fromUrl = stdout.match(/\/browse\/([A-Z][A-Z0-9]*-\d+)/);
    if (fromUrl) return fromUrl[1];
    const bare = stdout.match(ISSUE_KEY_PATTERN);
    return bare ? bare[1] : null;
  }

  async moveIssue(key: string, status: string): Promise<void> {
    await runTool('jira', ['issue', 'move', key, status], `move ${key} to "${status}"`);
  }

  /**
   * Id of the first active sprint on the configured board, or null
   */
  async activeSprintId(): Promise<string | null> {
    const stdout = await runTool(
      'jira',
      ['sprint', 'list', '--state', 'active', '--table', '--plain', '--no-headers', '--columns', 'id'],
      'list active sprints'
    );
    const first = stdout.split('\n')[0]?.trim();
    return first ? first.split(/\s+/)[0] : null;
  }

  async addToSprint(sprintId: string, key: string): Promise<void> {
    await runTool('jira', ['sprint', 'add', sprintId, key], `add ${key} to sprint ${sprintId}`);
  }
}
