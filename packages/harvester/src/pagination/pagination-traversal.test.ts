import { describe, it, expect, vi } from 'vitest';
import { PaginationTraversal } from './pagination-traversal.js';
import { FakeGroupSource, thread } from '../testing/fake-group-source.js';
import type { CandidateBatch, ItemSummary, PageState } from '../crawl/types.js';

const GROUP = 'https://groups.example.com/g/soil-carbon';

class ScrollingSource extends FakeGroupSource {
  readonly sizes: number[];
  loadMoreCalls = 0;
  private measureCalls = 0;

  constructor(sizes: number[], items: ItemSummary[]) {
    super({ pages: { [GROUP]: [items] } });
    this.sizes = sizes;
  }

  async loadMore(): Promise<void> {
    this.loadMoreCalls += 1;
  }

  async measureListing(): Promise<number> {
    const size = this.sizes[Math.min(this.measureCalls, this.sizes.length - 1)] ?? 0;
    this.measureCalls += 1;
    return size;
  }
}

async function collect(traversal: PaginationTraversal): Promise<CandidateBatch[]> {
  const batches: CandidateBatch[] = [];
  for await (const batch of traversal.pages(GROUP)) {
    batches.push(batch);
  }
  return batches;
}

describe('PaginationTraversal', () => {
  it('yields one batch per page until the source runs out', async () => {
    const source = new FakeGroupSource({
      pages: {
        [GROUP]: [[thread('u1'), thread('u2')], [thread('u3')], [thread('u4'), thread('u5')]],
      },
    });
    const traversal = new PaginationTraversal(source, { sleep: async () => {} });

    const batches = await collect(traversal);

    expect(batches.map((batch) => batch.pageNumber)).toEqual([1, 2, 3]);
    expect(batches.map((batch) => batch.items.map((item) => item.identity))).toEqual([
      ['u1', 'u2'],
      ['u3'],
      ['u4', 'u5'],
    ]);
    expect(source.advanceCalls).toBe(3);
  });

  it('drops repeated identities within a page', async () => {
    const source = new FakeGroupSource({
      pages: { [GROUP]: [[thread('u1'), thread('u2'), thread('u1')]] },
    });
    const traversal = new PaginationTraversal(source);

    const [batch] = await collect(traversal);

    expect(batch?.items.map((item) => item.identity)).toEqual(['u1', 'u2']);
  });

  it('does not advance when the consumer stops early', async () => {
    const source = new FakeGroupSource({
      pages: { [GROUP]: [[thread('u1')], [thread('u2')]] },
    });
    const traversal = new PaginationTraversal(source);

    for await (const batch of traversal.pages(GROUP)) {
      expect(batch.pageNumber).toBe(1);
      break;
    }

    expect(source.advanceCalls).toBe(0);
  });

  it('passes the page number to the source', async () => {
    const source = new FakeGroupSource({
      pages: { [GROUP]: [[thread('u1')], [thread('u2')]] },
    });
    const listed: PageState[] = [];
    const original = source.listCandidates.bind(source);
    source.listCandidates = (collection: string, pageState: PageState) => {
      listed.push(pageState);
      return original(collection, pageState);
    };

    await collect(new PaginationTraversal(source));

    expect(listed).toEqual([{ pageNumber: 1 }, { pageNumber: 2 }]);
  });

  it('keeps loading until the listing stops growing', async () => {
    const source = new ScrollingSource([10, 20, 30, 30], [thread('u1')]);
    const sleep = vi.fn(async () => {});
    const traversal = new PaginationTraversal(source, {
      maxScrollAttempts: 10,
      settleMs: 1500,
      sleep,
    });

    const attempts = await traversal.loadWholePage(GROUP);

    expect(attempts).toBe(3);
    expect(source.loadMoreCalls).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(1500);
  });

  it('caps load attempts when the listing keeps growing', async () => {
    const source = new ScrollingSource([1, 2, 3, 4, 5, 6, 7, 8], [thread('u1')]);
    const traversal = new PaginationTraversal(source, {
      maxScrollAttempts: 4,
      settleMs: 0,
      sleep: async () => {},
    });

    const attempts = await traversal.loadWholePage(GROUP);

    expect(attempts).toBe(4);
    expect(source.loadMoreCalls).toBe(4);
  });

  it('skips in-page loading for sources without it', async () => {
    const source = new FakeGroupSource({ pages: { [GROUP]: [[thread('u1')]] } });
    const sleep = vi.fn(async () => {});

    const attempts = await new PaginationTraversal(source, { sleep }).loadWholePage(GROUP);

    expect(attempts).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('loads the whole page before listing it', async () => {
    const source = new ScrollingSource([5, 9, 9], [thread('u1'), thread('u2')]);
    const traversal = new PaginationTraversal(source, { settleMs: 0, sleep: async () => {} });

    const batches = await collect(traversal);

    expect(source.loadMoreCalls).toBe(2);
    expect(batches).toHaveLength(1);
    expect(batches[0]?.items).toHaveLength(2);
  });
});
