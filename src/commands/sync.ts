import { Command } from 'commander';
import { getConfig, getPaths } from '../config/index.js';
import { requireTools } from '../core/cli-runner.js';
import { JiraCli, type TrackedIssue } from '../core/jira-cli.js';
import { formatTodoNotification, notifySlack } from '../core/notifications.js';
import {
  dailyFilePath,
  formatTodoLine,
  groupByStatus,
  renderDailyTodo,
  renderWeeklySummary,
  weeklyFilePath,
  weeklySummaryExists,
  writeTextFile,
} from '../core/todo-files.js';
import UI from '../ui/renderer.js';
import { ASCII } from '../ui/ascii.js';
import { copyToClipboard } from '../utils/helpers.js';
import { dateToString } from '../utils/dates.js';
import { reportFailure, warnStep } from './shared.js';

const { colors } = UI;

interface SyncOptions {
  notify?: boolean;
  weekly?: boolean;
  copy?: boolean;
  dryRun?: boolean;
  debug?: boolean;
}

function renderIssueList(issues: TrackedIssue[]): string {
  const sections: string[] = [];
  for (const [status, group] of groupByStatus(issues)) {
    sections.push(`${colors.status(status).bold(status)} ${colors.muted(`(${group.length})`)}`);
    sections.push(
      UI.list(
        group.map((i) => `${colors.accent(i.key.padEnd(10))} ${i.summary}`),
        { bullet: ASCII.status.pending }
      )
    );
  }
  return sections.join('\n');
}

export const syncCommand = new Command('sync')
  .description('Pull your assigned Jira issues into today\'s TODO file')
  .option('-n, --notify', 'Post the TODO summary to Slack (SLACK_WEBHOOK_URL)')
  .option('-w, --weekly', 'Write this week\'s summary file even if it already exists')
  .option('-c, --copy', 'Copy the TODO list to the clipboard')
  .option('--dry-run', 'Print only; do not write files or send notifications')
  .option('--debug', 'Show stack traces on failure')
  .action(async (options: SyncOptions) => {
    const isDebug = options.debug || process.env.JIRA_ROLLUP_DEBUG === '1';
    const spinner = UI.spinner('Fetching assigned issues from Jira...');

    try {
      await requireTools(['jira']);

      const config = getConfig();
      const paths = getPaths();
      const jira = new JiraCli(config.jira.browseUrl);
      const now = new Date();
      const today = dateToString(now);

      spinner.start();
      const issues = await jira.listIssues(config.jira.todoJql);
      spinner.stop();

      console.log('');
      console.log(UI.header(`${ASCII.icons.sync} TODO ${today}`));
      console.log('');
      console.log(issues.length > 0 ? renderIssueList(issues) : UI.info('No open issues assigned'));

      // ── Daily TODO file ────────────────────────────────────────────────
      const dailyPath = dailyFilePath(paths.dailyDir, now);
      if (options.dryRun) {
        console.log('');
        console.log(UI.info(`Dry run: would write ${dailyPath}`));
      } else {
        writeTextFile(dailyPath, renderDailyTodo(issues, now));
        console.log('');
        console.log(UI.success(`Saved ${issues.length} issue(s) to ${dailyPath}`));
      }

      if (options.copy && config.output.copyToClipboard) {
        if (await copyToClipboard(issues.map(formatTodoLine).join('\n'))) {
          console.log(UI.success('Copied to clipboard'));
        }
      }

      // ── Slack broadcast (best effort) ──────────────────────────────────
      if ((options.notify || config.notifications.slack.enabled) && !options.dryRun) {
        const result = await notifySlack(formatTodoNotification(issues, today));
        if (result.sent) {
          console.log(UI.success('Posted TODO summary to Slack'));
        } else if (result.reason === 'not-configured') {
          console.log(UI.warning('SLACK_WEBHOOK_URL is not set; skipping Slack notification'));
        } else {
          warnStep('Slack notification', result.error);
        }
      }

      // ── Weekly summary, once per ISO week ──────────────────────────────
      if (options.weekly || !weeklySummaryExists(paths.weeklyDir, now)) {
        const weeklyPath = weeklyFilePath(paths.weeklyDir, now);
        try {
          spinner.start('Fetching issues updated in the last 7 days...');
          const weekIssues = await jira.listIssues(config.jira.weeklyJql);
          spinner.stop();

          if (options.dryRun) {
            console.log(UI.info(`Dry run: would write ${weeklyPath}`));
          } else {
            writeTextFile(weeklyPath, renderWeeklySummary(weekIssues, now));
            console.log(UI.success(`Weekly summary written to ${weeklyPath}`));
          }
        } catch (error) {
          spinner.stop();
          warnStep('Weekly summary', error);
        }
      }

      console.log('');
    } catch (error) {
      spinner.stop();
      reportFailure('Sync failed', error, isDebug);
      process.exit(1);
    }
  });
