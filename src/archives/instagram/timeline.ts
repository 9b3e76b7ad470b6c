import { setTimeout as wait } from 'node:timers/promises';
import type { Cursor, FeedClient, FeedPage, Logger, Post, StopReason } from './types.js';
import { TimelineError } from './errors.js';

export const defaultMaxPages = 5;
export const defaultDelay: [number, number] = [1000, 3000];

export interface CollectOptions {
  /**
   * Number of unique posts wanted.
   */
  target: number,

  /**
   * Safety bound on the number of timeline requests. This isn't how the loop
   * normally ends; it keeps a misbehaving service from paging forever.
   *
   * @defaultValue 5
   */
  maxPages?: number,

  /**
   * Minimum and maximum pause between requests, in milliseconds.
   *
   * @defaultValue `[1000, 3000]`
   */
  delay?: [number, number],
  sleep?: (ms: number) => Promise<void>,
  random?: () => number,
  log?: Logger
}

export type CollectResult = {
  posts: Post[],
  pages: number,
  stopReason: StopReason
}

function assertPositiveInteger(value: number, label: string) {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${label} must be a positive integer; got ${value}`);
  }
}

/**
 * Picks a pause length in the [min, max] range.
 */
export function jitter([min, max]: [number, number], random: () => number = Math.random): number {
  const low = Math.max(0, Math.min(min, max));
  const high = Math.max(0, Math.max(min, max));
  return Math.round(low + (high - low) * random());
}

/**
 * Pages through the timeline until it has `target` unique posts, the feed runs
 * dry, the feed stops producing anything new, or the page budget is spent.
 *
 * Posts come back in the order the service delivered them, with any repeats
 * dropped. Request failures are not retried; they surface as a TimelineError
 * and whatever had been gathered is discarded.
 */
export async function collectTimeline(client: FeedClient, options: CollectOptions): Promise<CollectResult> {
  const { target } = options;
  const maxPages = options.maxPages ?? defaultMaxPages;
  const delay = options.delay ?? defaultDelay;
  const sleep = options.sleep ?? ((ms: number) => wait(ms).then(() => undefined));
  const log = options.log ?? (() => {});

  assertPositiveInteger(target, 'Target post count');
  assertPositiveInteger(maxPages, 'Page budget');

  const posts: Post[] = [];
  const seen = new Set<string>();
  let cursor: Cursor | undefined;
  let pages = 0;
  let stopReason: StopReason = 'page-budget';

  while (pages < maxPages) {
    log(`Fetching page ${pages + 1} (have ${posts.length} posts so far)`);

    let page: FeedPage;
    try {
      page = await client.fetchTimelinePage(cursor);
    } catch (err: unknown) {
      throw new TimelineError(err, posts.length, pages);
    }
    pages++;

    if (page.items.length === 0) {
      log('No more posts available');
      stopReason = 'exhausted';
      break;
    }

    let added = 0;
    for (const post of page.items) {
      if (seen.has(post.key)) continue;
      seen.add(post.key);
      posts.push(post);
      added++;
    }

    if (added === 0) {
      log('No new posts found, stopping');
      stopReason = 'stalled';
      break;
    }
    log(`Got ${added} new posts`);

    if (posts.length >= target) {
      stopReason = 'target-reached';
      break;
    }

    if (!page.nextCursor) {
      log('Feed has no further pages');
      stopReason = 'end-of-feed';
      break;
    }
    cursor = page.nextCursor;

    if (pages < maxPages) {
      await sleep(jitter(delay, options.random));
    }
  }

  return { posts: posts.slice(0, target), pages, stopReason };
}
