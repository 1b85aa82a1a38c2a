export { centerText, DEFAULT_TERMINAL_SIZE } from './center';
export type { TerminalSize } from './center';
export { TerminalDisplay, CLEAR_SCREEN } from './terminal-display';
export type { TerminalOutput } from './terminal-display';
