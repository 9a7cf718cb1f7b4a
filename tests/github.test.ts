import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

import { execa } from 'execa';
import { GitHubClient } from '../src/core/github.js';
import { TrackerResponseError } from '../src/core/errors.js';

const mockedExeca = vi.mocked(execa);

const PR_FIELDS =
  'number,title,body,url,state,additions,deletions,changedFiles,headRefName,author,mergedAt';

function prJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    number: 17,
    title: 'Add login form',
    body: null,
    url: 'https://github.com/acme/app/pull/17',
    state: 'MERGED',
    additions: 30,
    deletions: 10,
    changedFiles: 2,
    headRefName: 'feature/login',
    author: { login: 'dev1' },
    mergedAt: '2025-05-01T12:00:00Z',
    ...overrides,
  });
}

describe('GitHubClient', () => {
  beforeEach(() => {
    mockedExeca.mockReset();
  });

  it('reads a pull request through gh pr view', async () => {
    mockedExeca.mockResolvedValueOnce({ stdout: prJson(), stderr: '', exitCode: 0 } as never);

    const pr = await new GitHubClient().getPR(17);

    expect(mockedExeca).toHaveBeenCalledWith(
      'gh',
      ['pr', 'view', '17', '--json', PR_FIELDS],
      expect.anything()
    );
    expect(pr).toEqual({
      number: 17,
      title: 'Add login form',
      body: '',
      url: 'https://github.com/acme/app/pull/17',
      state: 'merged',
      additions: 30,
      deletions: 10,
      changedFiles: 2,
      headBranch: 'feature/login',
      author: 'dev1',
      mergedAt: '2025-05-01T12:00:00Z',
    });
  });

  it('passes --repo when a repository is given', async () => {
    mockedExeca.mockResolvedValueOnce({ stdout: prJson(), stderr: '', exitCode: 0 } as never);

    await new GitHubClient('acme/app').getPR(17);

    expect(mockedExeca).toHaveBeenCalledWith(
      'gh',
      ['pr', 'view', '17', '--json', PR_FIELDS, '--repo', 'acme/app'],
      expect.anything()
    );
  });

  it('normalizes the PR state', () => {
    const client = new GitHubClient();
    expect(client.parsePR(prJson({ state: 'OPEN', mergedAt: null })).state).toBe('open');
    expect(client.parsePR(prJson({ state: 'CLOSED', mergedAt: null })).state).toBe('closed');
  });

  it('rejects unexpected output', () => {
    const client = new GitHubClient();
    expect(() => client.parsePR('not json')).toThrow(TrackerResponseError);
    expect(() => client.parsePR(JSON.stringify({ number: 'x' }))).toThrow(TrackerResponseError);
  });

  it('comments on and edits the pull request', async () => {
    mockedExeca.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 } as never);
    const client = new GitHubClient('acme/app');

    await client.comment(17, 'Tracked in Jira');
    await client.updateBody(17, 'new body');

    expect(mockedExeca).toHaveBeenNthCalledWith(
      1,
      'gh',
      ['pr', 'comment', '17', '--body', 'Tracked in Jira', '--repo', 'acme/app'],
      expect.anything()
    );
    expect(mockedExeca).toHaveBeenNthCalledWith(
      2,
      'gh',
      ['pr', 'edit', '17', '--body', 'new body', '--repo', 'acme/app'],
      expect.anything()
    );
  });
});
