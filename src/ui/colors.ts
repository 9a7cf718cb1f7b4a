import chalk, { ChalkInstance } from 'chalk';
import { getConfig } from '../config/index.js';
import { Theme, ThemeSchema } from '../config/schema.js';

// Dynamic theme colors based on config
const getThemeColor = (colorName: string): ChalkInstance => {
  const colorMap: Record<string, ChalkInstance> = {
    blue: chalk.blue,
    green: chalk.green,
    yellow: chalk.yellow,
    red: chalk.red,
    cyan: chalk.cyan,
    magenta: chalk.magenta,
    white: chalk.white,
    gray: chalk.gray,
    // Bright variants
    brightBlue: chalk.blueBright,
    brightGreen: chalk.greenBright,
    brightYellow: chalk.yellowBright,
    brightRed: chalk.redBright,
    brightCyan: chalk.cyanBright,
    brightMagenta: chalk.magentaBright,
  };
  return colorMap[colorName] || chalk.white;
};

export class Colors {
  private cachedTheme: Theme | undefined;

  // Default theme when the config cannot be loaded
  private get theme(): Theme {
    if (!this.cachedTheme) {
      try {
        this.cachedTheme = getConfig().theme;
      } catch {
        this.cachedTheme = ThemeSchema.parse({});
      }
    }
    return this.cachedTheme;
  }

  get primary(): ChalkInstance {
    return getThemeColor(this.theme.primary);
  }

  get success(): ChalkInstance {
    return getThemeColor(this.theme.success);
  }

  get warning(): ChalkInstance {
    return getThemeColor(this.theme.warning);
  }

  get error(): ChalkInstance {
    return getThemeColor(this.theme.error);
  }

  get accent(): ChalkInstance {
    return getThemeColor(this.theme.accent);
  }

  get muted(): ChalkInstance {
    return getThemeColor(this.theme.muted);
  }

  get bold(): ChalkInstance {
    return chalk.bold;
  }

  /**
   * Color for a Jira status name
   */
  status(status: string): ChalkInstance {
    const lower = status.toLowerCase();
    if (lower.includes('progress')) return this.primary;
    if (lower.includes('review')) return this.accent;
    if (lower.includes('block')) return this.error;
    if (lower === 'new' || lower.includes('to do') || lower.includes('open')) return this.warning;
    if (lower.includes('done') || lower.includes('closed')) return this.success;
    return chalk.white;
  }
}

// Export singleton
export const colors = new Colors();

// Static chalk exports for simple usage
export { chalk };
