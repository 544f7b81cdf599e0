import { describe, it, expect } from 'vitest';
import { checkin } from '../testing/fakes';
import { MemoryObjectStore } from '../testing/memoryObjectStore';
import type { FeedPost, StoredPost } from '../api/types';
import { parseCsv } from '../storage/csv';
import { formatCheckpoint } from '../storage/checkpoint';
import { postKey } from '../storage/objectStore';
import { runParser } from './parser';

function seed(store: MemoryObjectStore, breweryId: string, posts: Array<[number, FeedPost]>, ingestedUpTo: number) {
  for (const [postId, post] of posts) {
    const stored: StoredPost = { ...post, breweryId };
    store.objects.set(postKey(breweryId, postId), JSON.stringify(stored));
  }
  store.objects.set('last_update.json', formatCheckpoint({ [breweryId]: ingestedUpTo }));
}

function aggregateGuids(store: MemoryObjectStore): string[] {
  const rows = parseCsv(store.objects.get('untappd_aggregate_data.csv') ?? '');
  return rows.slice(1).map(row => row[0]);
}

const posts: Array<[number, FeedPost]> = [
  [101, checkin('hopfan', 101, 'hopfan is drinking a Sculpin by Ballast Point', 'Fine (3/5 Stars)')],
  [102, checkin('hopfan', 102, 'hopfan is drinking a Sculpin by Ballast Point at V9', 'Piney (4.5/5 Stars)')],
  [103, checkin('maltlover', 103, 'maltlover is drinking a Porter by Ballast Point at V9')],
];

describe('runParser', () => {
  it('appends rows in post order and registers first-seen venues', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', posts, 103);

    const summary = await runParser({ store }, ['1001']);

    expect(summary.succeeded).toBe(3);
    expect(aggregateGuids(store)).toEqual(['101', '102', '103']);
    expect(store.objects.get('venue_list.csv')).toBe(
      'venue,url\r\nV9,https://untappd.com/user/hopfan/checkin/102\r\n',
    );
    expect(store.objects.get('last_parsed.json')).toBe('{"1001": "103"}');
  });

  it('writes one aggregate row with every parsed field', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', posts.slice(1, 2), 102);

    await runParser({ store }, ['1001']);

    const rows = parseCsv(store.objects.get('untappd_aggregate_data.csv') ?? '');
    expect(rows).toEqual([
      ['guid', 'username', 'brewery', 'beer', 'location', 'comment', 'rating', 'date', 'url'],
      [
        '102',
        'hopfan',
        '1001',
        'Sculpin by Ballast Point',
        'V9',
        'Piney ',
        '4.5',
        'Sat, 17 Oct 2026 18:00:00 +0000',
        'https://untappd.com/user/hopfan/checkin/102',
      ],
    ]);
  });

  it('does not duplicate a row after a crash before the checkpoint write', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', posts, 103);
    store.failNextPut(key => key === 'last_parsed.json');

    const first = await runParser({ store }, ['1001']);
    expect(first.failed).toBe(1);
    expect(aggregateGuids(store)).toEqual(['101']);
    expect(store.objects.has('last_parsed.json')).toBe(false);

    const second = await runParser({ store }, ['1001']);
    expect(second.failed).toBe(0);
    expect(second.skipped).toBe(1);
    expect(aggregateGuids(store)).toEqual(['101', '102', '103']);
    expect(store.objects.get('last_parsed.json')).toBe('{"1001": "103"}');
  });

  it('skips malformed posts and still advances', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', [posts[0], [102, checkin('hopfan', 102, 'Brewery news')], posts[2]], 103);

    const summary = await runParser({ store }, ['1001']);

    expect(summary.skipped).toBe(1);
    expect(aggregateGuids(store)).toEqual(['101', '103']);
    expect(store.objects.get('venue_list.csv')).toBe(
      'venue,url\r\nV9,https://untappd.com/user/maltlover/checkin/103\r\n',
    );
    expect(store.objects.get('last_parsed.json')).toBe('{"1001": "103"}');
  });

  it('never parses past the ingestion checkpoint', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', posts, 102);

    await runParser({ store }, ['1001']);

    expect(aggregateGuids(store)).toEqual(['101', '102']);
    expect(store.objects.get('last_parsed.json')).toBe('{"1001": "102"}');
  });

  it('resumes after the parsing checkpoint', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', posts, 103);
    await runParser({ store }, ['1001']);
    const writes = store.writes.length;

    const again = await runParser({ store }, ['1001']);

    expect(again.succeeded).toBe(0);
    expect(store.writes.length).toBe(writes);
  });

  it('orders post ids numerically', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', [
      [100, checkin('hopfan', 100, 'hopfan is drinking a Stout by Ballast Point')],
      [99, checkin('hopfan', 99, 'hopfan is drinking a Lager by Ballast Point')],
    ], 100);

    await runParser({ store }, ['1001']);

    expect(aggregateGuids(store)).toEqual(['99', '100']);
  });

  it('registers a venue only once across breweries', async () => {
    const store = new MemoryObjectStore();
    seed(store, '1001', posts.slice(1, 2), 102);
    store.objects.set(postKey('2002', 201), JSON.stringify({
      ...checkin('brewfan', 201, 'brewfan is drinking a Saison by Farmhouse at V9'),
      breweryId: '2002',
    }));
    store.objects.set('last_update.json', formatCheckpoint({ '1001': 102, '2002': 201 }));

    await runParser({ store }, ['1001', '2002']);

    expect(aggregateGuids(store)).toEqual(['102', '201']);
    expect(parseCsv(store.objects.get('venue_list.csv') ?? '')).toEqual([
      ['venue', 'url'],
      ['V9', 'https://untappd.com/user/hopfan/checkin/102'],
    ]);
    expect(store.objects.get('last_parsed.json')).toBe('{"1001": "102", "2002": "201"}');
  });
});
