/**
 * LRC Cue Parser
 *
 * Turns `[mm:ss]` / `[mm:ss.ff]` tagged text into a sorted schedule.
 *
 *   [00:12.50]First line
 *   [00:17.20][01:02.00]Chorus line    -> two cues, same text
 *   [ar:Someone]                       -> metadata, no cue
 *
 * Seconds are taken as written: `[01:75]` is 135s, not a parse error.
 */

import { Cue, LyricsMetadata, Schedule } from './types';

const TIMESTAMP_PATTERN = /\[(\d+):(\d{1,2}(?:\.\d+)?)\]/g;
const ID_TAG_PATTERN = /\[([A-Za-z]+):([^\]]*)\]/g;
const LINE_BREAK = /\r\n|\r|\n/;

/** Timestamp in seconds of each marker on the line, in order of appearance */
function markerTimestamps(line: string): number[] {
  const timestamps: number[] = [];
  for (const match of line.matchAll(TIMESTAMP_PATTERN)) {
    const minutes = parseInt(match[1], 10);
    const seconds = parseFloat(match[2]);
    timestamps.push(minutes * 60 + seconds);
  }
  return timestamps;
}

/**
 * Parse raw lyric text into a schedule.
 * Lines without a marker, or whose text is empty once markers are removed,
 * produce nothing.
 */
export function parseCues(rawText: string): Schedule {
  const cues: Cue[] = [];

  for (const rawLine of rawText.split(LINE_BREAK)) {
    const line = rawLine.trim();
    if (!line) continue;

    const timestamps = markerTimestamps(line);
    if (timestamps.length === 0) continue;

    const text = line.replace(TIMESTAMP_PATTERN, '').trim();
    if (!text) continue;

    for (const timestamp of timestamps) {
      if (!Number.isFinite(timestamp)) continue;
      cues.push({ timestamp, text });
    }
  }

  // Array.prototype.sort is stable, so equal timestamps keep file order
  cues.sort((a, b) => a.timestamp - b.timestamp);

  return Object.freeze(cues.map((cue) => Object.freeze(cue)));
}

/**
 * Collect ID tags from lines that carry no timestamp marker.
 * Later tags override earlier ones with the same key.
 */
export function parseMetadata(rawText: string): LyricsMetadata {
  const metadata: Record<string, string> = {};

  for (const rawLine of rawText.split(LINE_BREAK)) {
    const line = rawLine.trim();
    if (!line || markerTimestamps(line).length > 0) continue;

    for (const match of line.matchAll(ID_TAG_PATTERN)) {
      metadata[match[1].toLowerCase()] = match[2].trim();
    }
  }

  return Object.freeze(metadata);
}

/** "Title - Artist" banner from metadata, or null when there is no title */
export function describeTrack(metadata: LyricsMetadata): string | null {
  const title = metadata['ti'];
  if (!title) return null;
  const artist = metadata['ar'];
  return artist ? `${title} - ${artist}` : title;
}
