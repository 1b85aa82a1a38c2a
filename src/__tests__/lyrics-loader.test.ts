import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadLyricsFile, parseLyrics } from '../cue-parser/loader';
import { SourceNotFoundError, SourceUnreadableError } from '../errors';

describe('loadLyricsFile', () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'synced-lyrics-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should load and parse a UTF-8 file', async () => {
    const file = path.join(dir, 'song.lrc');
    fs.writeFileSync(file, '[ti:Test Song]\n[00:02.00]Second\n[00:01.00]First\n', 'utf-8');

    const lyrics = await loadLyricsFile(file);
    assert.deepStrictEqual(lyrics.schedule, [
      { timestamp: 1, text: 'First' },
      { timestamp: 2, text: 'Second' },
    ]);
    assert.deepStrictEqual(lyrics.metadata, { ti: 'Test Song' });
  });

  it('should drop a leading byte order mark', async () => {
    const file = path.join(dir, 'bom.lrc');
    fs.writeFileSync(file, '\ufeff[00:01]Hi', 'utf-8');

    const lyrics = await loadLyricsFile(file);
    assert.deepStrictEqual(lyrics.schedule, [{ timestamp: 1, text: 'Hi' }]);
  });

  it('should accept a file with no cues', async () => {
    const file = path.join(dir, 'empty.lrc');
    fs.writeFileSync(file, '', 'utf-8');

    const lyrics = await loadLyricsFile(file);
    assert.strictEqual(lyrics.schedule.length, 0);
  });

  it('should reject a missing file with SourceNotFoundError', async () => {
    const file = path.join(dir, 'missing.lrc');
    await assert.rejects(loadLyricsFile(file), (err: unknown) => {
      assert.ok(err instanceof SourceNotFoundError);
      assert.strictEqual(err.code, 'SOURCE_NOT_FOUND');
      assert.strictEqual(err.filePath, file);
      return true;
    });
  });

  it('should reject a directory with SourceUnreadableError', async () => {
    await assert.rejects(loadLyricsFile(dir), SourceUnreadableError);
  });

  it('should reject invalid UTF-8 with SourceUnreadableError', async () => {
    const file = path.join(dir, 'latin1.lrc');
    fs.writeFileSync(file, Buffer.from([0x5b, 0x30, 0x30, 0x3a, 0x30, 0x31, 0x5d, 0xe9, 0xff]));

    await assert.rejects(loadLyricsFile(file), (err: unknown) => {
      assert.ok(err instanceof SourceUnreadableError);
      assert.match(err.message, /not valid UTF-8/);
      return true;
    });
  });
});

describe('parseLyrics', () => {
  it('should return schedule and metadata together', () => {
    const lyrics = parseLyrics('[ar:Band]\n[00:03]Line');
    assert.deepStrictEqual(lyrics.schedule, [{ timestamp: 3, text: 'Line' }]);
    assert.deepStrictEqual(lyrics.metadata, { ar: 'Band' });
  });
});
