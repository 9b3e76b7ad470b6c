import test from 'ava';
import { collectTimeline, jitter } from '../src/archives/instagram/timeline.js';
import { TimelineError, TransportError } from '../src/archives/instagram/errors.js';
import { EndlessFeed, ScriptedFeed, makePosts, pagesFrom } from './helpers/fakes.js';

const noSleep = async () => {};

test('stops once the target is reached', async t => {
  const feed = new ScriptedFeed(pagesFrom([
    makePosts('p', 10, 1),
    makePosts('p', 10, 11),
    makePosts('p', 5, 21),
  ]));
  const result = await collectTimeline(feed, { target: 20, sleep: noSleep });

  t.is(result.posts.length, 20);
  t.deepEqual(result.posts.map(p => p.key), makePosts('p', 20).map(p => p.key));
  t.is(result.pages, 2);
  t.is(result.stopReason, 'target-reached');
  t.deepEqual(feed.requests, [undefined, 'cursor-1']);
});

test('short feed ends on the first empty page', async t => {
  const feed = new ScriptedFeed(pagesFrom([makePosts('p', 8)], true));
  const result = await collectTimeline(feed, { target: 20, sleep: noSleep });

  t.is(result.posts.length, 8);
  t.is(result.stopReason, 'exhausted');
  t.deepEqual(feed.requests, [undefined, 'cursor-1']);
});

test('repeated page is treated as a stall', async t => {
  const first = makePosts('p', 10);
  const feed = new ScriptedFeed([
    { items: first, nextCursor: 'cursor-1' },
    { items: first, nextCursor: 'cursor-2' },
  ]);
  const result = await collectTimeline(feed, { target: 50, sleep: noSleep });

  t.is(result.posts.length, 10);
  t.is(result.stopReason, 'stalled');
  t.is(result.pages, 2);
  t.is(feed.requests.length, 2);
});

test('overlapping pages keep only the first copy of each post', async t => {
  const feed = new ScriptedFeed(pagesFrom([
    makePosts('p', 5, 1),
    [...makePosts('p', 3, 4), ...makePosts('p', 2, 6)],
    makePosts('p', 4, 8),
  ]));
  const result = await collectTimeline(feed, { target: 50, sleep: noSleep });
  const keys = result.posts.map(p => p.key);

  t.deepEqual(keys, ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7', 'p8', 'p9', 'p10', 'p11']);
  t.is(new Set(keys).size, keys.length);
  t.is(result.stopReason, 'end-of-feed');
});

test('missing cursor ends the run', async t => {
  const feed = new ScriptedFeed([{ items: makePosts('p', 4) }]);
  const result = await collectTimeline(feed, { target: 20, sleep: noSleep });

  t.is(result.posts.length, 4);
  t.is(result.stopReason, 'end-of-feed');
  t.is(feed.requests.length, 1);
});

test('page budget bounds the number of requests', async t => {
  const feed = new EndlessFeed(10);
  const sleeps: number[] = [];
  const result = await collectTimeline(feed, {
    target: 100,
    maxPages: 3,
    delay: [5, 5],
    sleep: async ms => { sleeps.push(ms); },
  });

  t.is(feed.requests.length, 3);
  t.is(result.posts.length, 30);
  t.is(result.stopReason, 'page-budget');
  t.deepEqual(sleeps, [5, 5]);
});

test('result is truncated to the target', async t => {
  const feed = new EndlessFeed(10);
  const result = await collectTimeline(feed, { target: 15, sleep: noSleep });

  t.is(result.posts.length, 15);
  t.is(result.posts[14].key, 'page2-5');
  t.is(feed.requests.length, 2);
});

test('pauses only between requests', async t => {
  const feed = new ScriptedFeed(pagesFrom([
    makePosts('p', 10, 1),
    makePosts('p', 10, 11),
    makePosts('p', 5, 21),
  ]));
  const sleeps: number[] = [];
  await collectTimeline(feed, {
    target: 20,
    delay: [1000, 3000],
    random: () => 0.5,
    sleep: async ms => { sleeps.push(ms); },
  });

  t.deepEqual(sleeps, [2000]);
});

test('request failures surface with progress', async t => {
  const feed = new ScriptedFeed([
    { items: makePosts('p', 10), nextCursor: 'cursor-1' },
    new TransportError('rate limited', { status: 429 }),
  ]);
  const err = await t.throwsAsync(collectTimeline(feed, { target: 20, sleep: noSleep }), { instanceOf: TimelineError });

  t.is(err?.postsCollected, 10);
  t.is(err?.pagesFetched, 1);
  t.true(err?.retryable);
  t.is(err?.message, 'Timeline request 2 failed after 10 posts: rate limited');
});

test('invalid targets are rejected before any request', async t => {
  const feed = new ScriptedFeed();
  await t.throwsAsync(collectTimeline(feed, { target: 0 }), { instanceOf: RangeError });
  await t.throwsAsync(collectTimeline(feed, { target: 5, maxPages: 0 }), { instanceOf: RangeError });
  t.is(feed.requests.length, 0);
});

test('jitter stays in range', t => {
  t.is(jitter([1000, 3000], () => 0), 1000);
  t.is(jitter([1000, 3000], () => 0.5), 2000);
  t.is(jitter([3000, 1000], () => 1), 3000);
  t.is(jitter([-50, 0], () => 0.5), 0);
});
