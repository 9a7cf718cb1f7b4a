import { RollupError } from '../core/errors.js';
import UI from '../ui/renderer.js';

const { colors } = UI;

/**
 * Print a command failure; RollupErrors carry their own hint
 */
export function reportFailure(title: string, error: unknown, debug = false): void {
  console.log('');
  console.log(UI.error(title));

  if (error instanceof RollupError) {
    console.log(colors.muted(`  ${error.toUserMessage()}`));
  } else {
    console.log(colors.muted(`  ${error instanceof Error ? error.message : String(error)}`));
  }

  if (debug && error instanceof Error && error.stack) {
    console.log('');
    console.log(colors.muted('Stack trace:'));
    console.log(colors.muted(error.stack));
  }
}

/**
 * Print a warning for a best-effort step that failed and carry on
 */
export function warnStep(step: string, error: unknown): void {
  const detail = error instanceof Error ? error.message : String(error);
  console.log(UI.warning(`${step} skipped: ${detail}`));
}
