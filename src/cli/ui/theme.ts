import chalk, { type ChalkInstance } from 'chalk';

import type { GuardStatus } from '../../core/invariants/guard.js';

// Colors honor NO_COLOR / FORCE_COLOR through chalk.

const GUARD_COLORS: Record<GuardStatus, ChalkInstance> = {
  ok: chalk.green,
  warn: chalk.yellow,
  missing: chalk.red
};

export const theme = {
  bold: chalk.bold,
  dim: chalk.dim,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,

  check: chalk.green('✔'),
  bullet: chalk.dim('•'),
  arrow: chalk.dim('→'),

  guard: (status: GuardStatus): ChalkInstance => GUARD_COLORS[status],

  // Green from 0.85, yellow from 0.65, red below.
  score: (value: number): ChalkInstance => {
    if (value >= 0.85) return chalk.green;
    if (value >= 0.65) return chalk.yellow;
    return chalk.red;
  },

  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan
  }
} as const;

export const INDENT = '  ';

/** Outer width of the relay summary box. */
export const BOX_WIDTH = 56;
