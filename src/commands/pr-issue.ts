import { Command, InvalidArgumentError } from 'commander';
import inquirer from 'inquirer';
import { getConfig, getPaths } from '../config/index.js';
import { requireTools } from '../core/cli-runner.js';
import { RollupError } from '../core/errors.js';
import { GitHubClient } from '../core/github.js';
import { JiraCli } from '../core/jira-cli.js';
import { buildIssuePlan, executeIssuePlan } from '../core/pr-to-issue.js';
import UI from '../ui/renderer.js';
import { ASCII } from '../ui/ascii.js';
import { reportFailure } from './shared.js';

const { colors } = UI;

interface PRIssueOptions {
  repo?: string;
  allowUnmerged?: boolean;
  updateBody?: boolean;
  yes?: boolean;
  dryRun?: boolean;
  debug?: boolean;
}

export interface PRReference {
  number: number;
  // [HOST/]OWNER/REPO as gh takes it for --repo; absent for a bare number
  repo?: string;
}

const PR_NUMBER = /^#?(\d+)$/;
const PR_URL = /^https?:\/\/([^/]+)\/([^/]+)\/([^/]+)\/pull\/(\d+)(?:[/?#].*)?$/;

/**
 * Accepts `123`, `#123` or a pull request URL. A URL also names the
 * repository, with the host kept for anything but github.com.
 */
export function parsePRReference(value: string): PRReference {
  const input = value.trim();

  const number = input.match(PR_NUMBER);
  if (number) {
    return { number: parseInt(number[1], 10) };
  }

  const url = input.match(PR_URL);
  if (!url) {
    throw new InvalidArgumentError('Expected a pull request number or URL.');
  }
  const [, host, owner, name, prNumber] = url;
  const repo = host.toLowerCase() === 'github.com' ? `${owner}/${name}` : `${host}/${owner}/${name}`;
  return { number: parseInt(prNumber, 10), repo };
}

function resolveRepo(ref: PRReference, explicit?: string): string | undefined {
  if (explicit && ref.repo && explicit.toLowerCase() !== ref.repo.toLowerCase()) {
    throw new RollupError(
      `Pull request URL points at ${ref.repo} but --repo is ${explicit}`,
      'Drop --repo or pass the pull request number instead of the URL'
    );
  }
  return explicit ?? ref.repo;
}

export const prIssueCommand = new Command('pr-issue')
  .description('Create a Jira issue for a merged pull request, with an effort estimate')
  .argument('<pr>', 'Pull request number or URL', parsePRReference)
  .option('-R, --repo <owner/name>', 'Repository (default: the current directory\'s)')
  .option('--allow-unmerged', 'Create the issue even if the pull request is not merged')
  .option('--update-body', 'Also append a Jira link to the pull request description')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--dry-run', 'Show the planned issue without creating it')
  .option('--debug', 'Show stack traces on failure')
  .action(async (ref: PRReference, options: PRIssueOptions) => {
    const isDebug = options.debug || process.env.JIRA_ROLLUP_DEBUG === '1';
    const prNumber = ref.number;
    const spinner = UI.spinner(`Reading pull request #${prNumber}...`);

    try {
      const repo = resolveRepo(ref, options.repo);
      await requireTools(options.dryRun ? ['gh'] : ['gh', 'jira']);

      const config = getConfig();
      const github = new GitHubClient(repo);
      const jira = new JiraCli(config.jira.browseUrl);

      spinner.start();
      const pr = await github.getPR(prNumber);
      spinner.stop();

      const plan = buildIssuePlan(pr, config.jira, { allowUnmerged: options.allowUnmerged });
      const { estimate, fields } = plan;

      console.log('');
      console.log(UI.header(`${ASCII.icons.pr} PR #${pr.number} → Jira`));
      console.log('');
      console.log(UI.keyValue('Title', fields.summary));
      console.log(UI.keyValue('Pull request', colors.accent(pr.url)));
      console.log(UI.keyValue('State', pr.state));
      console.log(
        UI.keyValue(
          'Size',
          `${colors.success(`+${pr.additions}`)} ${colors.error(`-${pr.deletions}`)} in ${pr.changedFiles} file(s)`
        )
      );
      console.log(
        UI.keyValue(
          'Effort',
          `${colors.bold(estimate.bucket)} · ${estimate.storyPoints} pts · ${estimate.originalEstimate}`
        )
      );
      console.log(
        UI.keyValue('Issue', `${fields.type} in ${fields.project ?? 'default project'}`)
      );
      console.log(UI.keyValue('Labels', fields.labels.join(', ')));

      if (options.dryRun) {
        console.log('');
        console.log(UI.info('Dry run: no issue created'));
        return;
      }

      if (!options.yes && process.stdin.isTTY) {
        const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
          {
            type: 'confirm',
            name: 'proceed',
            message: 'Create this Jira issue?',
            default: true,
          },
        ]);
        if (!proceed) {
          console.log(UI.info('Cancelled'));
          return;
        }
      }

      spinner.start('Creating Jira issue...');
      const result = await executeIssuePlan(
        plan,
        { tracker: jira, source: github, defaults: config.jira },
        { updateBody: options.updateBody, auditLog: getPaths().auditLog }
      );
      spinner.stop();

      console.log(
        UI.box(
          `${colors.success(ASCII.status.success)} ${colors.bold(result.key)}  ${fields.summary}\n${colors.accent(result.url)}`,
          'Jira issue created'
        )
      );
      for (const warning of result.warnings) {
        console.log(UI.warning(warning));
      }
      if (result.warnings.length > 0) console.log('');
    } catch (error) {
      spinner.stop();
      reportFailure('Could not create an issue from the pull request', error, isDebug);
      process.exit(1);
    }
  });
