import { humanDate } from '../../util/index.js';
import { isSponsored } from './normalize.js';
import type { ArchiveSummary, Post } from './types.js';

const rule = '='.repeat(80);
const captionLength = 150;

function count(value: number) {
  return value.toLocaleString('en-US');
}

/**
 * Console block describing a single post.
 */
export function formatPost(post: Post): string[] {
  const lines = [rule];
  lines.push(`Post: ${post.url ?? post.key}`);
  lines.push(`User: @${post.author.handle}` + (post.author.displayName ? ` (${post.author.displayName})` : ''));
  if (post.author.verified) lines.push('  ✓ Verified');

  if (isSponsored(post)) {
    const sponsors = post.sponsors.map(s => `@${s.handle}`).join(', ');
    lines.push(sponsors ? `  SPONSORED - Paid partnership with ${sponsors}` : '  SPONSORED - Paid partnership');
  }

  lines.push(`Type: ${post.kind === 'unknown' ? post.mediaType : post.kind}`);
  if (post.kind === 'album' && post.media.length > 0) {
    lines.push(`  (${post.media.length} items in album)`);
  }
  lines.push(`Posted: ${humanDate(post.takenAt) ?? 'unknown'}`);
  lines.push(`Likes: ${count(post.likes)} | Comments: ${count(post.commentCount)}`);
  if (post.location) lines.push(`Location: ${post.location}`);
  if (post.caption) {
    const caption = post.caption.length > captionLength
      ? post.caption.slice(0, captionLength) + '...'
      : post.caption;
    lines.push(`Caption: ${caption}`);
  }
  return lines;
}

/**
 * One-line teaser used while the timeline is being paged.
 */
export function formatTeaser(post: Post): string {
  return `@${post.author.handle} - ${post.kind} - ${(post.caption ?? '').slice(0, 50)}`;
}

export function formatSummary(summary: ArchiveSummary): string[] {
  const lines = [rule, 'SUMMARY', rule];
  lines.push(`Posts processed: ${summary.processed}`);
  lines.push(`Posts saved: ${summary.saved}`);
  if (summary.skippedArchived > 0) lines.push(`Duplicates skipped: ${summary.skippedArchived}`);
  if (summary.skippedSponsored > 0) lines.push(`Sponsored skipped: ${summary.skippedSponsored}`);
  lines.push(`Photos: ${summary.photos}`);
  lines.push(`Videos: ${summary.videos}`);
  lines.push(`Albums: ${summary.albums}`);
  if (summary.sponsored > 0) lines.push(`Sponsored posts included: ${summary.sponsored}`);
  if (summary.includedComments) lines.push(`Comments fetched: ${summary.commentsFetched}`);
  if (summary.includedMedia) lines.push(`Files downloaded: ${summary.filesDownloaded}`);
  lines.push(`Saved to ${summary.file}`);
  return lines;
}
