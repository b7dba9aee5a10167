import type { Item } from '../crawl/types.js';
import type { RecordWriter, ResultRecord } from './types.js';

/**
 * Records extracted during the run, in completion order, until they are
 * handed to a writer.
 */
export class ResultSink {
  private pending: ResultRecord[];
  private flushedCount: number;

  constructor() {
    this.pending = [];
    this.flushedCount = 0;
  }

  add(item: Item, content: string): ResultRecord {
    const record: ResultRecord = {
      group_url: item.collectionRef,
      title: item.title,
      date: item.timestampLabel,
      author: item.author,
      url: item.identity,
      content,
    };

    this.pending.push(record);
    return record;
  }

  get records(): readonly ResultRecord[] {
    return this.pending;
  }

  get size(): number {
    return this.pending.length;
  }

  get totalFlushed(): number {
    return this.flushedCount;
  }

  /**
   * Pending records are only dropped once the writer accepted them; a failed
   * write keeps them for the next attempt.
   */
  async flush(writer: RecordWriter): Promise<number> {
    if (this.pending.length === 0) {
      return 0;
    }

    const batch = [...this.pending];
    await writer.write(batch);

    this.pending = this.pending.slice(batch.length);
    this.flushedCount += batch.length;
    return batch.length;
  }
}
