import { Command } from 'commander';
import { runChecks } from '../core/diagnostics.js';
import UI from '../ui/renderer.js';
import { ASCII } from '../ui/ascii.js';

const { colors } = UI;

export const doctorCommand = new Command('doctor')
  .description('Check that jira-cli, gh and the data directories are ready')
  .action(async () => {
    console.log('');
    console.log(UI.header('System Check'));

    const spinner = UI.spinner('Running diagnostics...');
    spinner.start();

    const checks = await runChecks();

    spinner.stop();

    console.log(UI.section('Prerequisites', ASCII.icons.doctor));
    console.log('');

    const statusIcon = {
      ok: colors.success(ASCII.status.success),
      warning: colors.warning(ASCII.status.warning),
      error: colors.error(ASCII.status.error),
    };

    for (const check of checks) {
      const icon = statusIcon[check.status];
      const name = check.name.padEnd(15);
      const message =
        check.status === 'ok'
          ? colors.muted(check.message)
          : check.status === 'error'
            ? colors.error(check.message)
            : colors.warning(check.message);

      console.log(`  ${icon} ${name} ${message}`);

      if (check.fix && check.status !== 'ok') {
        console.log(`      ${colors.muted('Fix:')} ${colors.accent(check.fix)}`);
      }
    }

    console.log('');
    console.log(UI.divider());

    const errors = checks.filter((c) => c.status === 'error');
    if (errors.length === 0) {
      console.log(UI.success('All checks passed! jira-rollup is ready to use.'));
      console.log('');
      return;
    }

    console.log(UI.error(`${errors.length} issue(s) found`));
    console.log('');
    process.exit(1);
  });
