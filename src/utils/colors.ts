/**
 * Minimal terminal colors utility
 *
 * Nestable: colors.bold(colors.red('text'))
 */

export interface ColorStream {
  isTTY?: boolean;
}

/**
 * Decide whether a stream should receive ANSI colors
 */
export function supportsColor(stream: ColorStream, env: NodeJS.ProcessEnv = process.env): boolean {
  // Respect NO_COLOR standard (https://no-color.org/)
  if ('NO_COLOR' in env) return false;

  if ('FORCE_COLOR' in env) return true;

  if (env.TERM === 'dumb') return false;

  return stream.isTTY === true;
}

export type Colorizer = (s: string | number) => string;

export interface Colors {
  bold: Colorizer;
  dim: Colorizer;
  red: Colorizer;
  green: Colorizer;
  yellow: Colorizer;
  cyan: Colorizer;
  gray: Colorizer;
}

// ANSI escape code wrapper
const code = (enabled: boolean, open: number, close: number): Colorizer => {
  if (!enabled) return (s) => String(s);

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  // Handle nested codes by replacing inner close with open
  return (s) => openCode + String(s).replace(closeRe, openCode) + closeCode;
};

export function createColors(enabled: boolean): Colors {
  return {
    bold: code(enabled, 1, 22),
    dim: code(enabled, 2, 22),
    red: code(enabled, 31, 39),
    green: code(enabled, 32, 39),
    yellow: code(enabled, 33, 39),
    cyan: code(enabled, 36, 39),
    gray: code(enabled, 90, 39),
  };
}
