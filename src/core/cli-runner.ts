import { execa } from 'execa';
import {
  ToolMissingError,
  TrackerCommandError,
  type ExternalTool,
} from './errors.js';

interface ExecFailure {
  code?: string;
  exitCode?: number;
  stderr?: string;
}

function asExecFailure(err: unknown): ExecFailure {
  if (typeof err !== 'object' || err === null) return {};
  const failure: ExecFailure = {};
  if ('code' in err && typeof err.code === 'string') failure.code = err.code;
  if ('exitCode' in err && typeof err.exitCode === 'number') failure.exitCode = err.exitCode;
  if ('stderr' in err && typeof err.stderr === 'string') failure.stderr = err.stderr;
  return failure;
}

/**
 * Run an external CLI and return its trimmed stdout.
 * ENOENT becomes ToolMissingError; any other failure a TrackerCommandError.
 */
export async function runTool(
  tool: ExternalTool,
  args: string[],
  action: string,
  options: { input?: string } = {}
): Promise<string> {
  try {
    const { stdout } = await execa(tool, args, {
      input: options.input,
      env: { NO_COLOR: '1' },
    });
    return stdout.trim();
  } catch (err) {
    const failure = asExecFailure(err);
    if (failure.code === 'ENOENT') {
      throw new ToolMissingError(tool, err);
    }
    throw new TrackerCommandError(
      tool,
      action,
      {
        exitCode: failure.exitCode,
        stderr: failure.stderr ?? (err instanceof Error ? err.message : String(err)),
      },
      err
    );
  }
}

/**
 * Check if a command exists
 */
export async function commandExists(cmd: string): Promise<boolean> {
  try {
    await execa('which', [cmd]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Fail fast when a required tool is missing
 */
export async function requireTools(tools: ExternalTool[]): Promise<void> {
  for (const tool of tools) {
    if (!(await commandExists(tool))) {
      throw new ToolMissingError(tool);
    }
  }
}

/**
 * First line of `<cmd> --version`, or null
 */
export async function getVersion(cmd: string, args: string[] = ['--version']): Promise<string | null> {
  try {
    const { stdout } = await execa(cmd, args);
    return stdout.trim().split('\n')[0];
  } catch {
    return null;
  }
}
