/**
 * Centering
 *
 * Pads a (possibly multi-line) block so it sits in the middle of a
 * columns x rows terminal. Blocks larger than the terminal get no padding.
 */

export interface TerminalSize {
  columns: number;
  rows: number;
}

export const DEFAULT_TERMINAL_SIZE: Readonly<TerminalSize> = { columns: 80, rows: 24 };

export function centerText(text: string, size: TerminalSize): string {
  const lines = text.split(/\r?\n/);
  // Code points, so a surrogate pair counts as one column
  const widest = lines.reduce((max, line) => Math.max(max, [...line].length), 0);
  const left = Math.max(Math.floor((size.columns - widest) / 2), 0);
  const top = Math.max(Math.floor((size.rows - lines.length) / 2), 0);

  const indent = ' '.repeat(left);
  return '\n'.repeat(top) + lines.map((line) => indent + line + '\n').join('');
}
