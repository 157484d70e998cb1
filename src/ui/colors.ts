import chalk, { type ChalkInstance } from 'chalk';
import { getConfig } from '../config/index.js';
import { type Theme, ThemeSchema } from '../config/schema.js';

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
  return colorMap[colorName] ?? chalk.white;
};

export class Colors {
  private resolvedTheme: Theme | undefined;

  // Read lazily so that importing the renderer never loads config
  private get theme(): Theme {
    if (!this.resolvedTheme) {
      try {
        this.resolvedTheme = getConfig().theme;
      } catch {
        // The command reports invalid config itself; render with defaults meanwhile
        this.resolvedTheme = ThemeSchema.parse({});
      }
    }
    return this.resolvedTheme;
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
}

// Export singleton
export const colors = new Colors();
