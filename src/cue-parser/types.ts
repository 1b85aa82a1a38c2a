/**
 * Cue Parser Types
 *
 * A schedule is built once from the lyric file and never mutated afterwards.
 */

/** One line of lyrics to show at a given moment */
export interface Cue {
  timestamp: number;   // seconds from track start, finite and >= 0
  text: string;        // non-empty, timestamp markers removed
}

/** Cues in ascending timestamp order; equal timestamps keep file order */
export type Schedule = ReadonlyArray<Readonly<Cue>>;

/** ID tags such as [ti:...] and [ar:...], keyed by lower-cased tag name */
export type LyricsMetadata = Readonly<Record<string, string>>;

export interface LyricsFile {
  schedule: Schedule;
  metadata: LyricsMetadata;
}
