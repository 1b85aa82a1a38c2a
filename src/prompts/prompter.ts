/**
 * Interactive prompts
 *
 * Asks for the audio file, the lyric file and the repeat count, re-asking
 * until the answer is usable. Ctrl-C while a question is open ends the
 * program through CancelledByUserError.
 */

import { createInterface, Interface } from 'node:readline/promises';
import { isAbortError } from '../cancellation';
import { CancelledByUserError } from '../errors';
import type { RepeatCount } from '../session/repeat';
import { resolveInputPath, ResolveOptions } from './path-resolver';
import { parseRepeatAnswer, REPEAT_QUESTION } from './repeat-answer';

/** The part of a readline interface the prompter needs */
export interface QuestionSource {
  question(query: string, options: { signal: AbortSignal }): Promise<string>;
}

export interface PromptOutput {
  write(chunk: string): boolean;
}

export class Prompter {
  private readonly source: QuestionSource;
  private readonly output: PromptOutput;
  private readonly resolveOptions: ResolveOptions;
  private readonly abort = new AbortController();

  constructor(source: QuestionSource, output: PromptOutput, resolveOptions: ResolveOptions = {}) {
    this.source = source;
    this.output = output;
    this.resolveOptions = resolveOptions;
  }

  /** Abort the open question, if any; it then rejects with CancelledByUserError */
  interrupt(): void {
    this.abort.abort();
  }

  /** Ask until the answer names an existing file */
  async askForFile(query: string): Promise<string> {
    for (;;) {
      const raw = (await this.ask(query)).trim();
      if (raw === '') {
        this.say('Path cannot be empty. Please try again.');
        continue;
      }

      const { path, tried } = resolveInputPath(raw, this.resolveOptions);
      if (path) return path;

      this.say('File not found. Tried these forms:');
      for (const form of tried) {
        this.say(`  ${form}`);
      }
      this.say('Please re-enter the path.');
    }
  }

  async askRepeatCount(): Promise<RepeatCount> {
    for (;;) {
      const answer = parseRepeatAnswer(await this.ask(REPEAT_QUESTION));
      if (answer.ok) return answer.repeat;
      this.say(answer.message);
    }
  }

  private async ask(query: string): Promise<string> {
    if (this.abort.signal.aborted) throw new CancelledByUserError();
    try {
      return await this.source.question(query, { signal: this.abort.signal });
    } catch (err) {
      if (isAbortError(err)) throw new CancelledByUserError();
      throw err;
    }
  }

  private say(line: string): void {
    this.output.write(line + '\n');
  }
}

/**
 * Prompter on stdin/stdout. Call `close()` once the questions are done so
 * stdin stops holding the process open.
 */
export function createTerminalPrompter(resolveOptions: ResolveOptions = {}): { prompter: Prompter; close: () => void } {
  const rl: Interface = createInterface({ input: process.stdin, output: process.stdout });
  const prompter = new Prompter(rl, process.stdout, resolveOptions);
  // readline swallows Ctrl-C while it owns the terminal
  rl.on('SIGINT', () => prompter.interrupt());
  return { prompter, close: () => rl.close() };
}
