import { z } from 'zod';
import { runTool } from './cli-runner.js';
import { TrackerResponseError } from './errors.js';

export interface PullRequest {
  number: number;
  title: string;
  body: string;
  url: string;
  state: 'open' | 'closed' | 'merged';
  additions: number;
  deletions: number;
  changedFiles: number;
  headBranch: string;
  author?: string;
  mergedAt?: string;
}

const PR_FIELDS =
  'number,title,body,url,state,additions,deletions,changedFiles,headRefName,author,mergedAt';

const RawPRSchema = z.object({
  number: z.number(),
  title: z.string(),
  body: z.string().nullish(),
  url: z.string(),
  state: z.string(),
  additions: z.number().default(0),
  deletions: z.number().default(0),
  changedFiles: z.number().default(0),
  headRefName: z.string().default(''),
  author: z.object({ login: z.string() }).nullish(),
  mergedAt: z.string().nullish(),
});

function normalizeState(state: string): PullRequest['state'] {
  const lower = state.toLowerCase();
  if (lower === 'merged') return 'merged';
  if (lower === 'closed') return 'closed';
  return 'open';
}

/**
 * GitHub integration using the gh CLI
 * Reads pull request metadata and writes back-links
 */
export class GitHubClient {
  constructor(private readonly repo?: string) {}

  private repoArgs(): string[] {
    return this.repo ? ['--repo', this.repo] : [];
  }

  /**
   * Get PR details by number
   */
  async getPR(prNumber: number): Promise<PullRequest> {
    const stdout = await runTool(
      'gh',
      ['pr', 'view', String(prNumber), '--json', PR_FIELDS, ...this.repoArgs()],
      `read pull request #${prNumber}`
    );
    return this.parsePR(stdout);
  }

  parsePR(stdout: string): PullRequest {
    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (err) {
      throw new TrackerResponseError('gh', 'pr view output is not JSON', err);
    }

    const parsed = RawPRSchema.safeParse(json);
    if (!parsed.success) {
      throw new TrackerResponseError('gh', parsed.error.issues[0]?.message ?? 'bad shape');
    }

    const data = parsed.data;
    return {
      number: data.number,
      title: data.title,
      body: data.body ?? '',
      url: data.url,
      state: normalizeState(data.state),
      additions: data.additions,
      deletions: data.deletions,
      changedFiles: data.changedFiles,
      headBranch: data.headRefName,
      author: data.author?.login,
      mergedAt: data.mergedAt ?? undefined,
    };
  }

  async comment(prNumber: number, body: string): Promise<void> {
    await runTool(
      'gh',
      ['pr', 'comment', String(prNumber), '--body', body, ...this.repoArgs()],
      `comment on pull request #${prNumber}`
    );
  }

  async updateBody(prNumber: number, body: string): Promise<void> {
    await runTool(
      'gh',
      ['pr', 'edit', String(prNumber), '--body', body, ...this.repoArgs()],
      `update the description of pull request #${prNumber}`
    );
  }
}
