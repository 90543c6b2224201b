/**
 * Terminal color utilities for gcl CLI output
 */

// Colors are off for piped output, and with NO_COLOR set
const supportsColor = (): boolean => {
  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;
  if (!process.stdout.isTTY) return false;
  return true;
};

const colorEnabled = supportsColor();

const wrap =
  (code: string) =>
  (s: string): string =>
    colorEnabled ? `\x1b[${code}m${s}\x1b[0m` : s;

export const colors = {
  red: wrap('31'),
  green: wrap('32'),
  yellow: wrap('33'),
  blue: wrap('34'),
  magenta: wrap('35'),
  cyan: wrap('36'),
  gray: wrap('90'),

  bold: wrap('1'),
  dim: wrap('2'),

  // Semantic aliases
  error: wrap('31'),
  success: wrap('32'),
  warning: wrap('33'),
  info: wrap('36'),
  hint: wrap('33'),
  command: wrap('36'),
};

/**
 * Whether stdout output is coloured
 */
export function colorsEnabled(): boolean {
  return colorEnabled;
}

export default colors;
