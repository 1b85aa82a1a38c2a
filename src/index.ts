#!/usr/bin/env node

/**
 * synced-lyrics
 *
 * Plays an audio file through an external player and shows the matching
 * .lrc lyrics in the terminal, one centered line at a time.
 *
 * Usage:
 *   synced-lyrics                                   # ask for both files
 *   synced-lyrics -a song.mp3 -l song.lrc           # no questions
 *   synced-lyrics -a song.mp3 -l song.lrc -r 0      # loop until Ctrl-C
 *   synced-lyrics --player ffplay --verbose
 */

import { parseArgs, CliOptions, USAGE } from './cli';
import { Config, loadConfig } from './config';
import { describeTrack, loadLyricsFile, LyricsFile } from './cue-parser';
import { TerminalDisplay } from './display';
import {
  CancelledByUserError,
  ExitCode,
  SourceNotFoundError,
  SyncedLyricsError,
  UsageError,
  exitCodeFor,
} from './errors';
import { getLogger, initLogger } from './logger';
import {
  DEFAULT_PLAYER,
  PLAYER_PRIORITY,
  ProcessSupervisor,
  buildPlayerCommand,
  detectPlayer,
  findExecutable,
} from './player';
import { createTerminalPrompter, resolveInputPath } from './prompts';
import { RepeatCount, SessionController, describeRepeat, toRepeatCount } from './session';

const log = getLogger('Main');

const AUDIO_QUESTION = 'Enter audio file path (drag file here or type path): ';
const LYRICS_QUESTION = 'Enter .lrc file path (drag file here or type path): ';

interface SessionInputs {
  audioPath: string;
  lyrics: LyricsFile;
  repeat: RepeatCount;
}

function printBanner(): void {
  console.log('');
  console.log('  synced-lyrics');
  console.log('  Terminal lyrics in time with your music');
  console.log('');
}

/** A path passed as a flag gets the same lenient reading as a typed one */
function resolveGivenPath(raw: string, kind: 'audio' | 'lyrics'): string {
  const { path } = resolveInputPath(raw);
  if (path) return path;
  if (kind === 'lyrics') throw new SourceNotFoundError(raw);
  throw new UsageError(`Audio file not found: ${raw}`);
}

/**
 * Flags first, questions for whatever is missing. The repeat count is only
 * asked for in an interactive run; otherwise it comes from config.
 */
async function collectInputs(cli: CliOptions, config: Config): Promise<SessionInputs> {
  const configuredRepeat = toRepeatCount(cli.repeat ?? config.playback.repeat);

  if (cli.audioPath && cli.lyricsPath) {
    const audioPath = resolveGivenPath(cli.audioPath, 'audio');
    const lyrics = await loadLyricsFile(resolveGivenPath(cli.lyricsPath, 'lyrics'));
    return { audioPath, lyrics, repeat: configuredRepeat };
  }

  const { prompter, close } = createTerminalPrompter();
  try {
    const audioPath = cli.audioPath
      ? resolveGivenPath(cli.audioPath, 'audio')
      : await prompter.askForFile(AUDIO_QUESTION);
    const lyricsPath = cli.lyricsPath
      ? resolveGivenPath(cli.lyricsPath, 'lyrics')
      : await prompter.askForFile(LYRICS_QUESTION);

    const lyrics = await loadLyricsFile(lyricsPath);
    const repeat = cli.repeat !== undefined ? configuredRepeat : await prompter.askRepeatCount();
    return { audioPath, lyrics, repeat };
  } finally {
    close();
  }
}

/** Player names to probe: --player first, then the configured or built-in list */
function playerCandidates(cli: CliOptions, config: Config): string[] {
  const base = config.player.preferred.length > 0 ? config.player.preferred : PLAYER_PRIORITY;
  const names = cli.player ? [cli.player, ...base] : [...base];
  return Array.from(new Set(names));
}

function choosePlayerCommand(cli: CliOptions, config: Config, audioPath: string): string[] {
  let player = detectPlayer(playerCandidates(cli, config));
  if (player) {
    console.log(`Using audio player: ${player}`);
  } else {
    log.warn(`No known audio player detected in PATH. Will attempt to use '${DEFAULT_PLAYER}' (sox) and may fail.`);
    player = DEFAULT_PLAYER;
  }

  const command = buildPlayerCommand(player, audioPath);
  if (findExecutable(command[0]) === null) {
    log.warn(`Player '${command[0]}' not found in PATH. Will attempt to run it, but it may fail.`);
  }
  return command;
}

async function main(): Promise<ExitCode> {
  const cli = parseArgs(process.argv);
  if (cli.help) {
    console.log(USAGE);
    return ExitCode.Ok;
  }

  const config = loadConfig(cli.configPath);
  initLogger({
    level: cli.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });

  printBanner();

  const { audioPath, lyrics, repeat } = await collectInputs(cli, config);
  const track = describeTrack(lyrics.metadata);
  if (track) console.log(`Now playing: ${track}`);
  log.info({ cues: lyrics.schedule.length, repeat: describeRepeat(repeat) }, 'Lyrics loaded');

  const command = choosePlayerCommand(cli, config, audioPath);

  const session = new SessionController({
    schedule: lyrics.schedule,
    command,
    repeat,
    launcher: new ProcessSupervisor(),
    display: new TerminalDisplay(process.stdout, config.display),
    timing: config.timing,
  });

  const unbindSignals = session.bindSignals(process);
  try {
    const result = await session.run();
    if (result.outcome === 'cancelled') {
      throw new CancelledByUserError();
    }
    log.debug({ iterations: result.iterations }, 'Done');
    return ExitCode.Ok;
  } finally {
    unbindSignals();
  }
}

function reportFailure(err: unknown): ExitCode {
  if (err instanceof CancelledByUserError) {
    console.log('\nInterrupted. Exiting.');
  } else if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    console.error('Run with --help for usage.');
  } else if (err instanceof SyncedLyricsError) {
    console.error(`Error: ${err.message}`);
  } else {
    log.fatal({ err }, 'Unexpected failure');
  }
  return exitCodeFor(err);
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => process.exit(reportFailure(err)),
  );
}
