/**
 * Player detection
 *
 * Looks for a usable audio player on PATH, in priority order.
 */

import * as fs from 'fs';
import * as path from 'path';

export const PLAYER_PRIORITY: readonly string[] = ['mpv', 'ffplay', 'afplay', 'cvlc', 'vlc', 'mplayer', 'play'];

export type ExecutableLookup = (name: string) => string | null;

function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Full path of `name` if it is an executable on PATH (or a path to one).
 * On Windows each PATHEXT suffix is tried as well.
 */
export function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string | null {
  if (!name) return null;

  const extensions = platform === 'win32'
    ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
    : [''];

  if (name.includes('/') || (platform === 'win32' && name.includes('\\'))) {
    return extensions.map((ext) => name + ext).find(isExecutableFile) ?? null;
  }

  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * First available player. A non-empty `preferred` list replaces the default
 * priority list rather than extending it.
 */
export function detectPlayer(
  preferred?: readonly string[],
  lookup: ExecutableLookup = (name) => findExecutable(name),
): string | null {
  const candidates = preferred && preferred.length > 0 ? preferred : PLAYER_PRIORITY;
  return candidates.find((name) => lookup(name) !== null) ?? null;
}
