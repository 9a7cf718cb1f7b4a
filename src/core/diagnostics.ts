import { accessSync, constants, existsSync } from 'fs';
import { execa } from 'execa';
import { getConfigPath, getPaths } from '../config/index.js';
import { commandExists, getVersion } from './cli-runner.js';
import { RollupError } from './errors.js';
import { resolveWebhookUrl } from './notifications.js';

export interface CheckResult {
  name: string;
  status: 'ok' | 'warning' | 'error';
  message: string;
  fix?: string;
}

const MIN_NODE_MAJOR = 20;

export function checkNode(version: string = process.versions.node): CheckResult {
  const major = parseInt(version.split('.')[0], 10);
  if (major >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'ok', message: `v${version}` };
  }
  return {
    name: 'Node.js',
    status: 'error',
    message: `v${version} (requires >= ${MIN_NODE_MAJOR})`,
    fix: `Install Node.js ${MIN_NODE_MAJOR}+ from https://nodejs.org`,
  };
}

async function checkJira(): Promise<CheckResult[]> {
  if (!(await commandExists('jira'))) {
    return [
      {
        name: 'jira-cli',
        status: 'error',
        message: 'Not found',
        fix: 'brew install ankitpokhrel/jira-cli/jira-cli && jira init',
      },
      { name: 'Jira auth', status: 'warning', message: 'Requires jira-cli' },
    ];
  }

  const checks: CheckResult[] = [
    { name: 'jira-cli', status: 'ok', message: (await getVersion('jira', ['version'])) || 'Installed' },
  ];

  try {
    const { stdout } = await execa('jira', ['me']);
    checks.push({ name: 'Jira auth', status: 'ok', message: `Logged in as ${stdout.trim()}` });
  } catch {
    checks.push({
      name: 'Jira auth',
      status: 'error',
      message: 'Not authenticated',
      fix: 'Run: jira init',
    });
  }
  return checks;
}

async function checkGitHub(): Promise<CheckResult[]> {
  if (!(await commandExists('gh'))) {
    return [
      {
        name: 'GitHub CLI',
        status: 'warning',
        message: 'Not found (needed by pr-issue only)',
        fix: 'Install from https://cli.github.com',
      },
    ];
  }

  const checks: CheckResult[] = [
    { name: 'GitHub CLI', status: 'ok', message: (await getVersion('gh')) || 'Installed' },
  ];

  try {
    await execa('gh', ['auth', 'status']);
    checks.push({ name: 'GitHub auth', status: 'ok', message: 'Authenticated' });
  } catch {
    checks.push({
      name: 'GitHub auth',
      status: 'warning',
      message: 'Not authenticated (needed by pr-issue only)',
      fix: 'Run: gh auth login',
    });
  }
  return checks;
}

function checkSettings(): CheckResult[] {
  let webhook: string | undefined;
  let dataDir: string;
  let configPath: string;
  try {
    webhook = resolveWebhookUrl();
    dataDir = getPaths().dataDir;
    configPath = getConfigPath();
  } catch (error) {
    return [
      {
        name: 'Config',
        status: 'error',
        message: error instanceof Error ? error.message : String(error),
        fix: error instanceof RollupError ? error.hint : undefined,
      },
    ];
  }

  const checks: CheckResult[] = [
    {
      name: 'Config',
      status: 'ok',
      message: existsSync(configPath) ? configPath : `defaults (no ${configPath})`,
    },
    webhook
      ? { name: 'Slack webhook', status: 'ok', message: 'Configured' }
      : {
          name: 'Slack webhook',
          status: 'warning',
          message: 'Not set; sync --notify will skip Slack',
          fix: 'export SLACK_WEBHOOK_URL=https://hooks.slack.com/services/...',
        },
  ];

  if (!existsSync(dataDir)) {
    checks.push({ name: 'Data dir', status: 'ok', message: `${dataDir} (created on first sync)` });
  } else {
    try {
      accessSync(dataDir, constants.W_OK);
      checks.push({ name: 'Data dir', status: 'ok', message: dataDir });
    } catch {
      checks.push({
        name: 'Data dir',
        status: 'error',
        message: `${dataDir} is not writable`,
        fix: 'Fix the permissions or set JIRA_ROLLUP_HOME',
      });
    }
  }

  return checks;
}

/**
 * Run all diagnostic checks
 */
export async function runChecks(): Promise<CheckResult[]> {
  return [checkNode(), ...(await checkJira()), ...(await checkGitHub()), ...checkSettings()];
}
