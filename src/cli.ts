/**
 * Command-line arguments
 */

import { UsageError } from './errors';

export interface CliOptions {
  audioPath?: string;
  lyricsPath?: string;
  /** As given; 0 = infinite */
  repeat?: number;
  player?: string;
  configPath?: string;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `
  synced-lyrics
  Show .lrc lyrics in the terminal in time with an audio track

  Usage:
    synced-lyrics [options]

  Options:
    --audio, -a <path>     Audio file to play (asked for when omitted)
    --lyrics, -l <path>    .lrc file to display (asked for when omitted)
    --repeat, -r <n>       Play n times; 0 repeats until Ctrl-C (default 1)
    --player, -p <name>    Preferred player: mpv, ffplay, afplay, cvlc, vlc, mplayer, play
    --config, -c <path>    Path to config YAML file (default ./synced-lyrics.yml)
    --verbose, -v          Enable debug logging on stderr
    --help, -h             Show this help
`;

function requireValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value === '') {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/** Parse `process.argv` (node and script path included) */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--audio':
      case '-a':
        options.audioPath = requireValue(argv, ++i, arg);
        break;
      case '--lyrics':
      case '-l':
        options.lyricsPath = requireValue(argv, ++i, arg);
        break;
      case '--repeat':
      case '-r':
        {
          const raw = requireValue(argv, ++i, arg);
          const repeat = parseInt(raw, 10);
          if (!/^\d+$/.test(raw) || !Number.isSafeInteger(repeat)) {
            throw new UsageError(`${arg} expects 0 (infinite) or a positive integer, got "${raw}"`);
          }
          options.repeat = repeat;
        }
        break;
      case '--player':
      case '-p':
        options.player = requireValue(argv, ++i, arg).trim();
        break;
      case '--config':
      case '-c':
        options.configPath = requireValue(argv, ++i, arg);
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}
