/**
 * Rollup error types - structured errors for the CLI commands
 *
 * Every error carries a hint so the top-level command handler can tell the
 * user what to do next instead of printing a bare message.
 */

export type ExternalTool = 'jira' | 'gh';

/**
 * Base error for all jira-rollup failures
 */
export class RollupError extends Error {
  readonly hint: string;

  constructor(message: string, hint: string, cause?: unknown) {
    super(message);
    this.name = 'RollupError';
    this.hint = hint;
    if (cause) this.cause = cause;
  }

  /**
   * Format for user-facing display (CLI output)
   */
  toUserMessage(): string {
    return `${this.message}\n  → ${this.hint}`;
  }
}

const INSTALL_HINTS: Record<ExternalTool, string> = {
  jira: 'Install jira-cli (https://github.com/ankitpokhrel/jira-cli), e.g. `brew install ankitpokhrel/jira-cli/jira-cli`, then run `jira init`',
  gh: 'Install the GitHub CLI (https://cli.github.com), e.g. `brew install gh`, then run `gh auth login`',
};

/**
 * A required external command-line tool is not installed
 */
export class ToolMissingError extends RollupError {
  readonly tool: ExternalTool;

  constructor(tool: ExternalTool, cause?: unknown) {
    super(`Required command \`${tool}\` was not found on PATH`, INSTALL_HINTS[tool], cause);
    this.name = 'ToolMissingError';
    this.tool = tool;
  }
}

/**
 * Quarter label did not parse as YYYY-QN
 */
export class QuarterFormatError extends RollupError {
  readonly input: string;

  constructor(input: string) {
    super(
      `Invalid quarter "${input}"`,
      'Use the form YYYY-QN with a year from 1000 and a quarter from 1 to 4, e.g. 2025-Q1'
    );
    this.name = 'QuarterFormatError';
    this.input = input;
  }
}

/**
 * Reading or writing a report input/output failed
 */
export class ReportIOError extends RollupError {
  readonly path: string;

  constructor(path: string, action: 'read' | 'write' | 'create', cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Could not ${action} ${path}${reason}`,
      'Check that the path exists and that you have permission to access it',
      cause
    );
    this.name = 'ReportIOError';
    this.path = path;
  }
}

/**
 * An external CLI (jira / gh) exited with an error
 */
export class TrackerCommandError extends RollupError {
  readonly tool: ExternalTool;
  readonly exitCode?: number;
  readonly stderr: string;

  constructor(
    tool: ExternalTool,
    action: string,
    details: { exitCode?: number; stderr?: string },
    cause?: unknown
  ) {
    const stderr = details.stderr?.trim() ?? '';
    const code = details.exitCode !== undefined ? ` (exit ${details.exitCode})` : '';
    super(
      `${tool} failed to ${action}${code}${stderr ? `: ${stderr.split('\n')[0]}` : ''}`,
      tool === 'jira'
        ? 'Run `jira me` to verify jira-cli is configured and authenticated'
        : 'Run `gh auth status` to verify the GitHub CLI is authenticated',
      cause
    );
    this.name = 'TrackerCommandError';
    this.tool = tool;
    this.exitCode = details.exitCode;
    this.stderr = stderr;
  }
}

/**
 * The CLI returned output we could not interpret
 */
export class TrackerResponseError extends RollupError {
  constructor(tool: ExternalTool, details: string, cause?: unknown) {
    super(
      `Unexpected output from ${tool}: ${details}`,
      'This may indicate a CLI version mismatch. Upgrade the tool and try again.',
      cause
    );
    this.name = 'TrackerResponseError';
  }
}

/**
 * Slack webhook delivery failed
 */
export class WebhookError extends RollupError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, 'Check SLACK_WEBHOOK_URL and that the webhook is still active', cause);
    this.name = 'WebhookError';
    this.statusCode = statusCode;
  }
}

/**
 * Configuration file could not be parsed
 */
export class ConfigFileError extends RollupError {
  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Invalid configuration in ${path}${reason}`,
      'Fix or remove the file; see `jira-rollup doctor` for the resolved settings',
      cause
    );
    this.name = 'ConfigFileError';
  }
}
