import pLimit from 'p-limit';
import { BaseArchive } from '../base-archive.js';
import { fileStamp } from '../../util/index.js';
import { collectTimeline, defaultMaxPages, defaultDelay } from './timeline.js';
import { fetchComments } from './comments.js';
import { MediaDownloader } from './media.js';
import { loadArchivedPosts, type ArchivedPost } from './history.js';
import { isSponsored } from './normalize.js';
import { toRecord } from './record.js';
import { formatPost, formatSummary, formatTeaser } from './display.js';
import { ArchiveAbortedError, TimelineError } from './errors.js';
import type {
  ArchiveProgress,
  ArchiveSummary,
  FeedArchiveOptions,
  FeedClient,
  Post,
} from './types.js';

const defaults = {
  amount: 20,
  maxPages: defaultMaxPages,
  delay: defaultDelay,
  comments: false,
  media: false,
  skipSponsored: false,
  skipArchived: true,
  chronological: false,
  concurrency: 1,
} satisfies FeedArchiveOptions;

/**
 * Pulls a run's worth of posts from the home timeline and writes them to a
 * timestamped JSON file, with comments and media if asked for.
 *
 * The client has to be logged in already; see SessionPolicy.
 */
export class InstagramFeed extends BaseArchive<ArchiveSummary> {
  declare options: FeedArchiveOptions;
  progress: ArchiveProgress = freshProgress();

  constructor(protected client: FeedClient, options: FeedArchiveOptions = {}) {
    super({ ...defaults, ...options });
  }

  get filename(): string {
    const now = this.options.now?.() ?? new Date();
    let suffix = this.options.chronological ? '_chrono' : '';
    suffix += this.options.skipSponsored ? '_no_ads' : '';
    return `feed_${fileStamp(now)}${suffix}.json`;
  }

  async doArchive(): Promise<ArchiveSummary> {
    this.progress = freshProgress();
    try {
      return await this.archive();
    } catch (err: unknown) {
      if (err instanceof TimelineError) {
        this.progress.collected = err.postsCollected;
      }
      const aborted = new ArchiveAbortedError(err, { ...this.progress });
      this.log(aborted.message);
      throw aborted;
    }
  }

  protected async archive(): Promise<ArchiveSummary> {
    const amount = this.options.amount ?? defaults.amount;
    const archived = this.options.skipArchived
      ? await loadArchivedPosts(this.files, (...data) => this.log(...data))
      : new Map<string, ArchivedPost>();

    this.log(`Fetching ${amount} posts from your feed`);
    const { posts, pages, stopReason } = await collectTimeline(this.client, {
      target: amount,
      maxPages: this.options.maxPages,
      delay: this.options.delay,
      sleep: this.options.sleep,
      log: (...data) => this.log(...data),
    });
    this.progress.collected = posts.length;
    for (const post of posts) this.log(`  • ${formatTeaser(post)}`);
    this.log(`Retrieved ${posts.length} posts total`);

    const kept: Post[] = [];
    for (const post of posts) {
      this.progress.processed++;
      const previous = archived.get(post.key);
      if (previous) {
        this.log(`Skipping duplicate @${post.author.handle} (already in ${previous.file})`);
        this.progress.skippedArchived++;
        continue;
      }
      if (this.options.skipSponsored && isSponsored(post)) {
        this.log(`Skipping sponsored post from @${post.author.handle}`);
        this.progress.skippedSponsored++;
        continue;
      }
      for (const line of formatPost(post)) this.log(line);
      kept.push(post);
    }

    const enriched = await this.enrich(kept);

    if (this.options.chronological) {
      this.log('Sorting posts chronologically (newest first)');
      enriched.sort((a, b) => (b.takenAt?.getTime() ?? 0) - (a.takenAt?.getTime() ?? 0));
    }

    const file = await this.files.writeOutput(this.filename, enriched.map(toRecord));
    this.progress.saved = enriched.length;
    this.log(`Feed data saved to ${file}`);

    const summary: ArchiveSummary = {
      ...this.progress,
      file,
      pages,
      stopReason,
      photos: enriched.filter(p => p.kind === 'photo').length,
      videos: enriched.filter(p => p.kind === 'video').length,
      albums: enriched.filter(p => p.kind === 'album').length,
      sponsored: enriched.filter(isSponsored).length,
      includedComments: !!this.options.comments,
      includedMedia: !!this.options.media,
    };
    for (const line of formatSummary(summary)) this.log(line);
    return summary;
  }

  /**
   * Adds comments and downloaded files to each post. Posts are handled by a
   * bounded pool, but results come back in timeline order.
   */
  protected async enrich(posts: Post[]): Promise<Post[]> {
    const limit = pLimit(Math.max(1, this.options.concurrency ?? defaults.concurrency));
    const commentLimit = this.options.comments || 0;
    const downloader = this.options.media
      ? new MediaDownloader(this.files, { timeout: this.options.timeout, http: this.options.http, log: (...data) => this.log(...data) })
      : undefined;

    return Promise.all(posts.map(post => limit(async () => {
      const output: Post = { ...post };
      if (commentLimit > 0 && post.commentCount > 0) {
        output.comments = await fetchComments(this.client, post.key, commentLimit, (...data) => this.log(...data));
        this.progress.commentsFetched += output.comments.length;
      }
      if (downloader) {
        output.downloadedFiles = await downloader.download(post);
        this.progress.filesDownloaded += output.downloadedFiles.length;
      }
      return output;
    })));
  }
}

function freshProgress(): ArchiveProgress {
  return {
    collected: 0,
    processed: 0,
    saved: 0,
    skippedArchived: 0,
    skippedSponsored: 0,
    commentsFetched: 0,
    filesDownloaded: 0,
  };
}
