/**
 * Path resolution for typed or drag-and-dropped file paths
 *
 * Terminals paste dropped files in several shapes: quoted, with escaped
 * spaces, or with trailing junk. Each plausible reading is tried in turn.
 *
 *   '/music/My Song.mp3'       quoted
 *   /music/My\ Song.mp3        backslash-escaped
 *   ~/music/song.mp3           home-relative
 *   $MUSIC/song.mp3            environment variable
 */

import * as fs from 'fs';
import * as os from 'os';

export type FileCheck = (candidate: string) => boolean;

export interface PathResolution {
  /** The first candidate naming a regular file, or null */
  path: string | null;
  /** Every distinct form that was tried, in order */
  tried: string[];
}

export function isRegularFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * Split like a POSIX shell would: whitespace separates words, quotes group,
 * backslash escapes outside single quotes. Returns null on an unterminated
 * quote or a trailing backslash.
 */
export function splitShellWords(input: string): string[] | null {
  const words: string[] = [];
  let word = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && i + 1 < input.length && '"\\$`'.includes(input[i + 1])) {
        word += input[++i];
      } else {
        word += ch;
      }
      continue;
    }

    if (ch === '\\') {
      if (i + 1 >= input.length) return null;
      word += input[++i];
      inWord = true;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(word);
        word = '';
        inWord = false;
      }
    } else {
      word += ch;
      inWord = true;
    }
  }

  if (quote !== null) return null;
  if (inWord) words.push(word);
  return words;
}

/** `$NAME` and `${NAME}` from env; unknown variables are left as written */
export function expandVariables(input: string, env: NodeJS.ProcessEnv = process.env): string {
  return input.replace(/\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g, (whole, braced?: string, bare?: string) => {
    const name = braced ?? bare ?? '';
    const value = env[name];
    return value === undefined ? whole : value;
  });
}

/** Leading `~` or `~/` to the home directory */
export function expandHome(input: string, home: string = os.homedir()): string {
  if (input === '~') return home;
  if (input.startsWith('~/') || input.startsWith('~\\')) return home + input.slice(1);
  return input;
}

function stripMatchingQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function stripOuterQuoteChars(value: string): string {
  return value.replace(/^["']+/, '').replace(/["']+$/, '');
}

/** Distinct readings of `raw`, most literal first */
export function pathCandidates(raw: string): string[] {
  const forms: string[] = [raw, stripOuterQuoteChars(raw), raw.replace(/\\ /g, ' ')];

  const words = splitShellWords(raw);
  if (words && words.length > 0) {
    forms.push(words.join(' '), words[0]);
  }

  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const form of forms) {
    const trimmed = form.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      candidates.push(trimmed);
    }
  }
  return candidates;
}

export interface ResolveOptions {
  isFile?: FileCheck;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

/** Try every candidate reading of `raw` and return the first existing file */
export function resolveInputPath(raw: string, options: ResolveOptions = {}): PathResolution {
  const isFile = options.isFile ?? isRegularFile;
  const tried = pathCandidates(raw.trim());

  for (const candidate of tried) {
    const expanded = expandHome(expandVariables(stripMatchingQuotes(candidate), options.env), options.home);
    if (expanded && isFile(expanded)) {
      return { path: expanded, tried };
    }
  }
  return { path: null, tried };
}
