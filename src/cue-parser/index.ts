export type { Cue, Schedule, LyricsMetadata, LyricsFile } from './types';
export { parseCues, parseMetadata, describeTrack } from './parser';
export { loadLyricsFile, parseLyrics } from './loader';
