/**
 * Player command lines
 *
 * Flags for each known player: no video window, no console chatter, exit
 * when the track ends. Unknown names fall back to sox's `play`.
 */

export const DEFAULT_PLAYER = 'play';

const PLAYER_FLAGS: Readonly<Record<string, readonly string[]>> = {
  ffplay: ['-nodisp', '-autoexit', '-loglevel', 'quiet'],
  mpv: ['--no-video', '--really-quiet'],
  afplay: [],
  cvlc: ['--play-and-exit', '--no-video'],
  vlc: ['--intf', 'dummy', '--play-and-exit', '--no-video'],
  mplayer: ['-really-quiet', '-vo', 'null'],
};

export function isKnownPlayer(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(PLAYER_FLAGS, name);
}

/** Argument vector that plays `audioPath` with `player` */
export function buildPlayerCommand(player: string | null | undefined, audioPath: string): string[] {
  const name = (player ?? '').trim() || DEFAULT_PLAYER;
  if (!isKnownPlayer(name)) {
    return [DEFAULT_PLAYER, audioPath];
  }
  return [name, ...PLAYER_FLAGS[name], audioPath];
}
