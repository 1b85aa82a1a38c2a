/**
 * Terminal Display
 *
 * Clears the screen and prints each cue centered. Terminal size is read on
 * every draw so resizing mid-song works; when the output is not a TTY the
 * configured fallback size is used.
 */

import type { Display } from '../scheduler/types';
import { centerText, DEFAULT_TERMINAL_SIZE, TerminalSize } from './center';

/** Clear screen, clear scrollback, cursor home */
export const CLEAR_SCREEN = '\x1b[2J\x1b[3J\x1b[H';

/** The part of process.stdout the display writes through */
export interface TerminalOutput {
  write(chunk: string): boolean;
  readonly columns?: number;
  readonly rows?: number;
}

export class TerminalDisplay implements Display {
  private readonly output: TerminalOutput;
  private readonly fallback: TerminalSize;

  constructor(output: TerminalOutput = process.stdout, fallback: TerminalSize = DEFAULT_TERMINAL_SIZE) {
    this.output = output;
    this.fallback = fallback;
  }

  get size(): TerminalSize {
    const { columns, rows } = this.output;
    if (columns && rows && columns > 0 && rows > 0) {
      return { columns, rows };
    }
    return this.fallback;
  }

  show(text: string): void {
    this.output.write(CLEAR_SCREEN + centerText(text, this.size));
  }

  notice(text: string): void {
    this.output.write(text + '\n');
  }
}
