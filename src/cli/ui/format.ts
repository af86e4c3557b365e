import { BOX_WIDTH, INDENT, theme } from './theme.js';

const ANSI_SGR = new RegExp(String.raw`\u001b\[[0-9;]*m`, 'g');

/** Scores and weighted totals, three decimals; `—` when there is no number. */
export function formatScore(n: number | null | undefined): string {
  return typeof n === 'number' && Number.isFinite(n) ? n.toFixed(3) : '—';
}

/** Score text colored by its band. */
export function coloredScore(n: number): string {
  return theme.score(n)(formatScore(n));
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

/** Visible width of a string that may carry color codes. */
function visibleLength(text: string): number {
  return text.replace(ANSI_SGR, '').length;
}

/**
 * Lines framed in a rounded box with the title set into the top border.
 */
export function drawBox(title: string, lines: string[], width: number = BOX_WIDTH): string {
  const edge = theme.box.border;
  const inner = width - 2;
  const label = ` ${title} `;

  const top = edge('╭───') + theme.box.title(label) + edge(`${'─'.repeat(Math.max(0, inner - 3 - label.length))}╮`);
  const spacer = edge('│') + ' '.repeat(inner) + edge('│');
  const body = lines.map((line) => {
    const fill = ' '.repeat(Math.max(0, inner - 2 - visibleLength(line)));
    return `${edge('│')}  ${line}${fill}${edge('│')}`;
  });
  const bottom = edge(`╰${'─'.repeat(inner)}╯`);

  return [top, spacer, ...body, spacer, bottom].join('\n');
}

/** `  Label         value`, label dimmed and padded. */
export function keyValue(label: string, value: string, labelWidth = 14): string {
  return `${INDENT}${theme.dim(padRight(label, labelWidth))}${value}`;
}

export function rule(width: number): string {
  return theme.dim('─'.repeat(width));
}
