/**
 * Lyric File Loader
 *
 * Reads a lyric file as strict UTF-8 and parses it. Read failures are mapped
 * onto the two source errors the CLI reports.
 */

import { promises as fs } from 'fs';
import { SourceNotFoundError, SourceUnreadableError, systemErrorCode } from '../errors';
import { getLogger } from '../logger';
import { parseCues, parseMetadata } from './parser';
import { LyricsFile } from './types';

const log = getLogger('CueParser');

/** Parse already-read lyric text */
export function parseLyrics(rawText: string): LyricsFile {
  return {
    schedule: parseCues(rawText),
    metadata: parseMetadata(rawText),
  };
}

export async function loadLyricsFile(filePath: string): Promise<LyricsFile> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      throw new SourceNotFoundError(filePath, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new SourceUnreadableError(filePath, reason, { cause: error });
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new SourceUnreadableError(filePath, 'file is not valid UTF-8', { cause: error });
  }

  const lyrics = parseLyrics(text);
  log.debug({ path: filePath, cues: lyrics.schedule.length }, 'Loaded lyrics');
  return lyrics;
}
