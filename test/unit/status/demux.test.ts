import { StreamDemuxer, demux } from '../../../src/status/demux.js';
import { STATUS_CLOSE, STATUS_OPEN } from '../../../src/status/markers.js';

const report = (statuses: string) => `${STATUS_OPEN} : ${statuses} : ${STATUS_CLOSE}`;

describe('StreamDemuxer', () => {
  it('passes plain output through', () => {
    const demuxer = new StreamDemuxer();
    expect(demuxer.feed('hello\n')).toBe('hello\n');
    expect(demuxer.end()).toEqual({ output: 'hello\n', payloads: [] });
  });

  it('separates status reports from output', () => {
    const demuxer = new StreamDemuxer();
    const visible = demuxer.feed(`a\n${report('0')}b\n${report('0 1')}`);
    expect(visible).toBe('a\nb\n');
    expect(demuxer.end()).toEqual({ output: 'a\nb\n', payloads: [' : 0 : ', ' : 0 1 : '] });
  });

  it('tracks its state across chunks', () => {
    const demuxer = new StreamDemuxer();
    demuxer.feed(`out${STATUS_OPEN} : 0`);
    expect(demuxer.currentState).toBe('CAPTURING_STATUS');
    expect(demuxer.feed(` 1 : ${STATUS_CLOSE}more`)).toBe('more');
    expect(demuxer.currentState).toBe('CAPTURING_OUTPUT');
    expect(demuxer.end()).toEqual({ output: 'outmore', payloads: [' : 0 1 : '] });
  });

  it('handles one code point per chunk', () => {
    const demuxer = new StreamDemuxer();
    for (const codePoint of `x${report('2')}y`) demuxer.feed(codePoint);
    expect(demuxer.end()).toEqual({ output: 'xy', payloads: [' : 2 : '] });
  });

  it('keeps surrogate pairs split across chunks intact', () => {
    const emoji = '\u{1F600}';
    const demuxer = new StreamDemuxer();
    expect(demuxer.feed(`ok ${emoji[0]}`)).toBe('ok ');
    expect(demuxer.feed(`${emoji[1]}!`)).toBe(`${emoji}!`);
    expect(demuxer.end().output).toBe(`ok ${emoji}!`);
  });

  it('does not mistake lookalike ideographs for markers', () => {
    const demuxer = new StreamDemuxer();
    expect(demuxer.feed('止まれ 行く')).toBe('止まれ 行く');
    expect(demuxer.end().payloads).toEqual([]);
  });

  it('treats a close marker outside a report as output', () => {
    const demuxer = new StreamDemuxer();
    expect(demuxer.feed(`${STATUS_CLOSE}z`)).toBe(`${STATUS_CLOSE}z`);
  });

  it('drops a report cut off by the end of the stream', () => {
    const demuxer = new StreamDemuxer();
    demuxer.feed(`done\n${STATUS_OPEN} : 0`);
    expect(demuxer.end()).toEqual({ output: 'done\n', payloads: [] });
  });

  it('notifies each completed report', () => {
    const seen: string[] = [];
    const demuxer = new StreamDemuxer({ onPayload: (payload) => seen.push(payload) });
    demuxer.feed(`${report('0')}${report('4')}`);
    expect(seen).toEqual([' : 0 : ', ' : 4 : ']);
  });

  it('hands visible text of each chunk to onOutput', () => {
    const live: string[] = [];
    const demuxer = new StreamDemuxer({ onOutput: (visible) => live.push(visible) });
    demuxer.feed(`one\n${STATUS_OPEN} : 0`);
    demuxer.feed(` : ${STATUS_CLOSE}`);
    demuxer.feed('two\n');
    expect(live).toEqual(['one\n', 'two\n']);
  });
});

describe('demux', () => {
  it('drains an async iterable and reports visible chunks live', async () => {
    async function* chunks() {
      yield 'first\n';
      yield `${STATUS_OPEN} : 0 `;
      yield `: ${STATUS_CLOSE}second\n`;
      yield report('1');
    }
    const live: string[] = [];
    const result = await demux(chunks(), (visible) => live.push(visible));
    expect(live).toEqual(['first\n', 'second\n']);
    expect(result).toEqual({ output: 'first\nsecond\n', payloads: [' : 0 : ', ' : 1 : '] });
  });

  it('accepts a plain iterable', async () => {
    const result = await demux(['', report('0')]);
    expect(result).toEqual({ output: '', payloads: [' : 0 : '] });
  });
});
