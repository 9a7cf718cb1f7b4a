import { Command } from 'commander';
import { getConfig, getPaths } from '../config/index.js';
import { resolveQuarter } from '../core/quarter.js';
import { generateQuarterlyReport } from '../core/quarterly-report.js';
import { statusDistribution, renderBar } from '../core/quarterly-stats.js';
import UI from '../ui/renderer.js';
import { ASCII } from '../ui/ascii.js';
import { reportFailure } from './shared.js';

const { colors } = UI;

export const quarterlyCommand = new Command('quarterly')
  .description('Roll the daily TODO files of a quarter up into one report')
  .argument('[quarter]', 'Quarter label YYYY-QN (default: the current quarter)')
  .option('--debug', 'Show stack traces on failure')
  .action(async (quarterArg: string | undefined, options: { debug?: boolean }) => {
    const isDebug = options.debug || process.env.JIRA_ROLLUP_DEBUG === '1';
    const spinner = UI.spinner('Scanning daily files...');

    try {
      const selector = resolveQuarter(quarterArg);
      const config = getConfig();
      const paths = getPaths();

      spinner.start();
      const result = generateQuarterlyReport({
        selector,
        dailyDir: paths.dailyDir,
        weeklyDir: paths.weeklyDir,
        reportsDir: paths.reportsDir,
        browseUrl: config.jira.browseUrl,
      });
      spinner.stop();

      const { state, insights } = result;

      console.log('');
      console.log(UI.header(`${ASCII.icons.quarterly} Quarterly report ${result.label}`));

      if (config.output.showStats) {
        console.log('');
        console.log(
          UI.stats([
            { label: 'mentions', value: state.total },
            { label: 'unique issues', value: state.uniqueIssues.size },
            { label: 'active weeks', value: state.byWeek.size },
            { label: 'daily files', value: state.filesScanned },
            { label: 'weekly summaries', value: result.weeklySummaries },
          ])
        );

        const rows = statusDistribution(state);
        if (rows.length > 0) {
          console.log(UI.section('Status distribution'));
          const width = Math.max(...rows.map((r) => r.status.length));
          for (const row of rows) {
            console.log(
              `  ${colors.status(row.status)(row.status.padEnd(width))}  ${String(row.count).padStart(4)}  ${colors.muted(`${row.percentage.toFixed(1)}%`.padStart(6))}  ${colors.primary(renderBar(row.barLength))}`
            );
          }
        }

        console.log('');
        console.log(
          UI.keyValue(
            'Busiest week',
            insights.busiestWeek
              ? `Week ${insights.busiestWeek.week} (${insights.busiestWeek.count})`
              : 'no data'
          )
        );
        console.log(
          UI.keyValue(
            'Avg per week',
            insights.averagePerWeek !== null ? insights.averagePerWeek.toFixed(1) : 'no data'
          )
        );
      }

      if (state.total === 0) {
        console.log('');
        console.log(UI.warning(`No TODO records found in ${paths.dailyDir} for ${result.label}`));
        console.log(UI.info('Daily files are written by: jira-rollup sync'));
      }

      if (state.unparsedLines > 0) {
        console.log(
          UI.info(`${state.unparsedLines} list item(s) did not match "- [ ] KEY: summary [status]"`)
        );
      }

      console.log('');
      console.log(UI.success(`Report written to ${result.path}`));
    } catch (error) {
      spinner.stop();
      reportFailure('Failed to generate quarterly report', error, isDebug);
      process.exit(1);
    }
  });
