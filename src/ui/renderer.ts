import boxen from 'boxen';
import ora, { type Ora } from 'ora';
import { colors } from './colors.js';
import { ASCII, divider } from './ascii.js';

// Terminal width helper
const getTerminalWidth = (): number => {
  return process.stdout.columns || 80;
};

/**
 * Render the commit-push header
 */
export const renderHeader = (subtitle?: string): string => {
  return colors.primary.bold(ASCII.logoMini) + (subtitle ? colors.muted(` · ${subtitle}`) : '');
};

/**
 * Render a section header
 */
export const renderSection = (title: string): string => {
  return `\n${colors.primary.bold(title)}\n${colors.muted(divider(40))}`;
};

export const renderSuccess = (message: string): string => {
  return colors.success(`${ASCII.status.success} ${message}`);
};

/**
 * Render an error message, with an optional detail line underneath
 */
export const renderError = (message: string, detail?: string): string => {
  const main = colors.error(`${ASCII.status.error} ${message}`);
  const detailStr = detail ? `\n  ${colors.muted(detail)}` : '';
  return main + detailStr;
};

export const renderWarning = (message: string): string => {
  return colors.warning(`${ASCII.status.warning} ${message}`);
};

export const renderInfo = (message: string): string => {
  return colors.muted(`${ASCII.status.info} ${message}`);
};

/**
 * Render a boxed content area
 */
export const renderBox = (content: string, title?: string): string => {
  const width = Math.min(getTerminalWidth() - 4, 80);

  return boxen(content, {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    margin: { top: 1, bottom: 1, left: 0, right: 0 },
    borderStyle: 'round',
    borderColor: 'blue',
    title,
    titleAlignment: 'left',
    width,
  });
};

/**
 * Render a key-value pair
 */
export const renderKeyValue = (key: string, value: string, keyWidth: number = 15): string => {
  const paddedKey = key.padEnd(keyWidth);
  return `${colors.muted(paddedKey)} ${value}`;
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

// Export everything
export const UI = {
  // Rendering
  header: renderHeader,
  section: renderSection,
  box: renderBox,
  success: renderSuccess,
  error: renderError,
  warning: renderWarning,
  info: renderInfo,
  keyValue: renderKeyValue,

  // Utilities
  spinner: createSpinner,

  // Re-exports
  colors,
  ASCII,
};

export default UI;
