import boxen from 'boxen';
import ora, { Ora } from 'ora';
import { colors, chalk } from './colors.js';
import { ASCII, divider } from './ascii.js';

// Terminal width helper
const getTerminalWidth = (): number => {
  return process.stdout.columns || 80;
};

/**
 * Render the jira-rollup header
 */
export const renderHeader = (subtitle?: string): string => {
  return colors.primary.bold(ASCII.logoMini) + (subtitle ? colors.muted(` · ${subtitle}`) : '');
};

/**
 * Render a section header
 */
export const renderSection = (title: string, icon?: string): string => {
  const iconStr = icon ? `${icon} ` : '';
  return `\n${colors.primary.bold(`${iconStr}${title}`)}\n${colors.muted(divider(40))}`;
};

/**
 * Render a success message
 */
export const renderSuccess = (message: string): string => {
  return colors.success(`${ASCII.status.success} ${message}`);
};

/**
 * Render an error message
 */
export const renderError = (message: string, detail?: string): string => {
  const main = colors.error(`${ASCII.status.error} ${message}`);
  const detailStr = detail ? `\n  ${colors.muted(detail)}` : '';
  return main + detailStr;
};

/**
 * Render a warning message
 */
export const renderWarning = (message: string): string => {
  return colors.warning(`${ASCII.status.warning} ${message}`);
};

/**
 * Render an info message
 */
export const renderInfo = (message: string): string => {
  return colors.muted(`${ASCII.status.info} ${message}`);
};

/**
 * Render a boxed content area
 */
export const renderBox = (content: string, title?: string): string => {
  const width = Math.min(getTerminalWidth() - 4, 80);

  return boxen(content, {
    padding: 1,
    margin: { top: 1, bottom: 1, left: 0, right: 0 },
    borderStyle: 'round',
    borderColor: 'blue',
    title: title,
    titleAlignment: 'left',
    width,
  });
};

/**
 * Render a key-value pair
 */
export const renderKeyValue = (key: string, value: string, keyWidth: number = 18): string => {
  const paddedKey = key.padEnd(keyWidth);
  return `${colors.muted(paddedKey)} ${value}`;
};

/**
 * Render a list of items
 */
export const renderList = (
  items: string[],
  options: { bullet?: string; indent?: number } = {}
): string => {
  const { bullet = ASCII.status.bullet, indent = 2 } = options;
  const indentStr = ' '.repeat(indent);
  return items.map((item) => `${indentStr}${colors.accent(bullet)} ${item}`).join('\n');
};

/**
 * Render stats/metrics
 */
export const renderStats = (stats: Array<{ label: string; value: string | number }>): string => {
  return stats
    .map(({ label, value }) => `${colors.primary(String(value))} ${colors.muted(label)}`)
    .join(colors.muted(' · '));
};

/**
 * Create a spinner with custom styling
 */
export const createSpinner = (text: string): Ora => {
  return ora({
    text,
    spinner: 'dots',
    color: 'cyan',
  });
};

/**
 * Render a divider line
 */
export const renderDivider = (width?: number): string => {
  return colors.muted(divider(width || Math.min(getTerminalWidth() - 10, 60)));
};

// Export everything
export const UI = {
  header: renderHeader,
  section: renderSection,
  box: renderBox,
  success: renderSuccess,
  error: renderError,
  warning: renderWarning,
  info: renderInfo,
  keyValue: renderKeyValue,
  list: renderList,
  stats: renderStats,
  divider: renderDivider,
  spinner: createSpinner,

  // Re-exports
  colors,
  chalk,
  ASCII,
};

export default UI;
