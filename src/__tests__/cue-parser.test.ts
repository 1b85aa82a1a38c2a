import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseCues, parseMetadata, describeTrack } from '../cue-parser/parser';

function texts(lrc: string): string[] {
  return parseCues(lrc).map(c => c.text);
}

function timestamps(lrc: string): number[] {
  return parseCues(lrc).map(c => c.timestamp);
}

describe('parseCues', () => {
  describe('Basic parsing', () => {
    it('should parse one cue per tagged line', () => {
      const schedule = parseCues('[00:01.00]Hello World\n[00:02.50]Bye World');
      assert.deepStrictEqual(schedule, [
        { timestamp: 1, text: 'Hello World' },
        { timestamp: 2.5, text: 'Bye World' },
      ]);
    });

    it('should return an empty schedule for empty input', () => {
      assert.deepStrictEqual(parseCues(''), []);
    });

    it('should accept markers without a fractional part', () => {
      assert.deepStrictEqual(timestamps('[01:02]Line'), [62]);
    });

    it('should accept single-digit and long minute fields', () => {
      assert.deepStrictEqual(timestamps('[2:5]A\n[100:00]B'), [125, 6000]);
    });

    it('should accept any number of fractional digits', () => {
      assert.deepStrictEqual(timestamps('[00:01.5]A\n[00:02.125]B'), [1.5, 2.125]);
    });

    it('should handle CRLF and CR line endings', () => {
      assert.deepStrictEqual(texts('[00:01]A\r\n[00:02]B\r[00:03]C\r\n'), ['A', 'B', 'C']);
    });

    it('should trim whitespace around the text', () => {
      assert.deepStrictEqual(texts('   [00:01]   padded line   '), ['padded line']);
    });
  });

  describe('Seconds are not normalized', () => {
    it('should keep seconds >= 60 as written', () => {
      assert.deepStrictEqual(timestamps('[01:75]Late'), [135]);
    });

    it('should treat three-digit seconds as plain text', () => {
      assert.deepStrictEqual(parseCues('[00:123]Nope'), []);
    });
  });

  describe('Lines that produce no cue', () => {
    it('should skip lines without a marker', () => {
      assert.deepStrictEqual(texts('just some text\n[00:01]Real'), ['Real']);
    });

    it('should skip markers with no remaining text', () => {
      assert.deepStrictEqual(parseCues('[00:01]\n[00:02]    \n[00:03][00:04]'), []);
    });

    it('should skip ID tags', () => {
      assert.deepStrictEqual(parseCues('[ti:Song]\n[ar:Artist]\n[offset:+100]'), []);
    });

    it('should treat malformed markers as plain text', () => {
      assert.deepStrictEqual(parseCues('[aa:bb]x\n[00-01]y\n[00:01'), []);
    });

    it('should keep non-timestamp brackets in the text', () => {
      assert.deepStrictEqual(texts('[00:01][Chorus] La la'), ['[Chorus] La la']);
    });
  });

  describe('Multiple markers per line', () => {
    it('should emit one cue per marker with the same text', () => {
      const schedule = parseCues('[00:01.00][00:04.00]Hello');
      assert.deepStrictEqual(schedule, [
        { timestamp: 1, text: 'Hello' },
        { timestamp: 4, text: 'Hello' },
      ]);
    });

    it('should interleave repeated lines with other lines by time', () => {
      const lrc = '[00:01][00:03]Chorus\n[00:02]Verse';
      assert.deepStrictEqual(texts(lrc), ['Chorus', 'Verse', 'Chorus']);
      assert.deepStrictEqual(timestamps(lrc), [1, 2, 3]);
    });

    it('should remove markers found mid-line', () => {
      assert.deepStrictEqual(texts('[00:01]Hello [00:03]world'), ['Hello world', 'Hello world']);
    });
  });

  describe('Ordering', () => {
    it('should sort cues ascending by timestamp', () => {
      assert.deepStrictEqual(texts('[00:05]C\n[00:01]A\n[00:03]B'), ['A', 'B', 'C']);
    });

    it('should keep file order for equal timestamps', () => {
      const lrc = '[00:02]First\n[00:01]Zero\n[00:02]Second\n[00:02]Third';
      assert.deepStrictEqual(texts(lrc), ['Zero', 'First', 'Second', 'Third']);
    });

    it('should not deduplicate identical cues', () => {
      assert.deepStrictEqual(texts('[00:01]Echo\n[00:01]Echo'), ['Echo', 'Echo']);
    });

    it('should produce a non-decreasing schedule for shuffled input', () => {
      const lrc = ['[00:09]i', '[00:02]b', '[00:07]g', '[00:02]c', '[00:00]a', '[00:05.5]e', '[00:05]d'].join('\n');
      const schedule = parseCues(lrc);
      for (let i = 1; i < schedule.length; i++) {
        assert.ok(schedule[i - 1].timestamp <= schedule[i].timestamp);
      }
      assert.deepStrictEqual(schedule.map(c => c.text), ['a', 'b', 'c', 'd', 'e', 'g', 'i']);
    });
  });

  describe('Immutability', () => {
    it('should freeze the schedule and its cues', () => {
      const schedule = parseCues('[00:01]A');
      assert.strictEqual(Object.isFrozen(schedule), true);
      assert.strictEqual(Object.isFrozen(schedule[0]), true);
    });
  });
});

describe('parseMetadata', () => {
  it('should collect ID tags with lower-cased keys', () => {
    const lrc = '[ti:Song Title]\n[AR: Some Artist ]\n[00:01]Line\n[al:Album]';
    assert.deepStrictEqual(parseMetadata(lrc), {
      ti: 'Song Title',
      ar: 'Some Artist',
      al: 'Album',
    });
  });

  it('should ignore tag-like text on timestamped lines', () => {
    assert.deepStrictEqual(parseMetadata('[00:01][ti:Not A Title]text'), {});
  });
});

describe('describeTrack', () => {
  it('should combine title and artist', () => {
    assert.strictEqual(describeTrack({ ti: 'Song', ar: 'Band' }), 'Song - Band');
  });

  it('should fall back to the title alone', () => {
    assert.strictEqual(describeTrack({ ti: 'Song' }), 'Song');
  });

  it('should return null without a title', () => {
    assert.strictEqual(describeTrack({ ar: 'Band' }), null);
  });
});
