import { describe, it, expect } from 'vitest';
import { ResultSink } from './result-sink.js';
import type { Item } from '../crawl/types.js';
import type { RecordWriter, ResultRecord } from './types.js';

const GROUP = 'https://groups.example.com/g/soil-carbon';

function item(identity: string): Item {
  return {
    identity,
    title: `Thread ${identity}`,
    timestampLabel: 'Jan 12',
    author: 'R. Poster',
    collectionRef: GROUP,
  };
}

class MemoryWriter implements RecordWriter {
  readonly written: ResultRecord[] = [];
  failNext = false;

  async write(records: readonly ResultRecord[]): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }

    this.written.push(...records);
  }
}

describe('ResultSink', () => {
  it('maps items to result records', () => {
    const sink = new ResultSink();

    const record = sink.add(item(`${GROUP}/c/a1`), 'Biochar trial results');

    expect(record).toEqual({
      group_url: GROUP,
      title: `Thread ${GROUP}/c/a1`,
      date: 'Jan 12',
      author: 'R. Poster',
      url: `${GROUP}/c/a1`,
      content: 'Biochar trial results',
    });
  });

  it('keeps completion order', () => {
    const sink = new ResultSink();
    sink.add(item('u2'), 'second');
    sink.add(item('u1'), 'first');

    expect(sink.records.map((record) => record.url)).toEqual(['u2', 'u1']);
    expect(sink.size).toBe(2);
  });

  it('flush hands records to the writer and clears them', async () => {
    const sink = new ResultSink();
    const writer = new MemoryWriter();
    sink.add(item('u1'), 'one');
    sink.add(item('u2'), 'two');

    const flushed = await sink.flush(writer);

    expect(flushed).toBe(2);
    expect(writer.written.map((record) => record.content)).toEqual(['one', 'two']);
    expect(sink.size).toBe(0);
    expect(sink.totalFlushed).toBe(2);
  });

  it('flush with nothing pending does not call the writer', async () => {
    const sink = new ResultSink();
    const writer = new MemoryWriter();
    writer.failNext = true;

    await expect(sink.flush(writer)).resolves.toBe(0);
  });

  it('keeps records added while a write is in progress', async () => {
    const sink = new ResultSink();
    const written: string[] = [];
    const writer: RecordWriter = {
      async write(records) {
        written.push(...records.map((record) => record.url));
        if (written.length === 1) {
          sink.add(item('u2'), 'late');
        }
      },
    };
    sink.add(item('u1'), 'one');

    await expect(sink.flush(writer)).resolves.toBe(1);
    expect(sink.records.map((record) => record.url)).toEqual(['u2']);

    await sink.flush(writer);
    expect(written).toEqual(['u1', 'u2']);
    expect(sink.size).toBe(0);
  });

  it('keeps records when the writer fails', async () => {
    const sink = new ResultSink();
    const writer = new MemoryWriter();
    sink.add(item('u1'), 'one');
    writer.failNext = true;

    await expect(sink.flush(writer)).rejects.toThrow('disk full');
    expect(sink.size).toBe(1);

    await sink.flush(writer);
    expect(writer.written).toHaveLength(1);
    expect(sink.size).toBe(0);
  });
});
