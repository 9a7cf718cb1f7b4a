// Symbols for jira-rollup console output

export const ASCII = {
  logoMini: `◆ jira-rollup`,

  // Command icons
  icons: {
    sync: '◈',
    pr: '◉',
    quarterly: '◎',
    doctor: '◇',
  },

  // Status symbols
  status: {
    success: '✓',
    error: '✗',
    warning: '!',
    info: 'i',
    pending: '○',
    bullet: '•',
  },
};

// Create a horizontal divider
export const divider = (width: number = 50, char: string = '─'): string => {
  return char.repeat(width);
};
