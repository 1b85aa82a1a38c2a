/**
 * Answer parsing for "How many times to play?"
 */

import { RepeatCount, toRepeatCount } from '../session/repeat';

export const REPEAT_QUESTION = 'How many times to play? (default 1, enter 0 for infinite loop): ';

export type RepeatAnswer =
  | { ok: true; repeat: RepeatCount }
  | { ok: false; message: string };

export function parseRepeatAnswer(answer: string): RepeatAnswer {
  const trimmed = answer.trim();
  if (trimmed === '') return { ok: true, repeat: 1 };

  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { ok: false, message: 'Invalid number. Please enter an integer (e.g., 1, 2, 0).' };
  }

  const n = parseInt(trimmed, 10);
  if (!Number.isSafeInteger(n)) {
    return { ok: false, message: 'Invalid number. Please enter an integer (e.g., 1, 2, 0).' };
  }
  if (n < 0) {
    return { ok: false, message: 'Please enter 0 for infinite or a positive integer.' };
  }
  return { ok: true, repeat: toRepeatCount(n) };
}
