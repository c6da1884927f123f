import chalk from 'chalk';

// === Brand Colors ===
export const brand = {
  green: chalk.hex('#22C55E'),
} as const;

// === Semantic Colors ===
export const color = {
  secondary: chalk.hex('#A1A1AA'),   // zinc-400, descriptions
  tertiary: chalk.hex('#71717A'),    // zinc-500, connectors
  success: chalk.green,
  error: chalk.red,
  warning: chalk.hex('#F59E0B'),
  file: chalk.hex('#3B82F6'),
  bold: chalk.bold,
} as const;

// === Icons ===
export const icon = {
  error: '\u2717',     // ✗
  warning: '\u26A0',   // ⚠
} as const;

// === Tree Connectors ===
export const tree = {
  pipe: '\u2502',        // │
} as const;

// === Box Drawing ===
export const box = {
  tl: '\u256D',          // ╭
  tr: '\u256E',          // ╮
  bl: '\u2570',          // ╰
  br: '\u256F',          // ╯
  v: '\u2502',           // │
  h: '\u2500',           // ─
} as const;
