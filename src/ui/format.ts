import { color, icon, tree } from './theme.js';

/**
 * Error with ✗ symbol.
 */
export function error(text: string): string {
  return color.error(`${icon.error} ${text}`);
}

/**
 * Warning with ⚠ symbol.
 */
export function warn(text: string): string {
  return color.warning(`${icon.warning} ${text}`);
}

export function pass(text: string): string {
  return color.success(text);
}

export function fail(text: string): string {
  return color.error(text);
}

export function tertiary(text: string): string {
  return color.tertiary(text);
}

/**
 * Tree continuation pipe: "  │  text".
 */
export function treeCont(text: string): string {
  return `  ${color.tertiary(tree.pipe)}  ${text}`;
}

// Strip ANSI escape codes for width calculation and plain-text comparison.
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Shorten paths by replacing $HOME with ~.
 */
export function shortPath(fullPath: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
  if (home && fullPath.startsWith(home)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}
