// Symbols for commit-push output

export const ASCII = {
  logoMini: `◆ commit-push`,

  // Status symbols
  status: {
    success: '✓',
    error: '✗',
    warning: '!',
    info: 'i',
    check: '✔',
    cross: '✖',
  },
};

// Strip ANSI codes for length calculation
export const stripAnsi = (str: string): string => {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, '');
};

// Create a horizontal divider
export const divider = (width: number = 50, char: string = '─'): string => {
  return char.repeat(width);
};
