import { humanDate, unixTime } from '../../util/index.js';
import { isSponsored } from './normalize.js';
import type { Post } from './types.js';

export type CommentRecord = {
  user: string,
  text: string,
  created_at: string | null,
  likes: number
}

/**
 * The shape written to the feed JSON files, and read by the viewer. Field names
 * match the archives produced by earlier versions of these scripts.
 */
export type PostRecord = {
  id: string,
  code: string | null,
  url: string | null,
  user: string,
  user_id: string | null,
  user_full_name: string | null,
  is_verified: boolean,
  user_avatar_url: string | null,
  caption: string | null,
  likes: number,
  comments_count: number,
  timestamp: number | null,
  timestamp_human: string | null,
  media_type: number,
  media_type_name: string,
  thumbnail_url: string | null,
  video_url: string | null,
  media_urls: string[],
  carousel_media_count: number,
  location: string | null,
  filter_type: number | null,
  is_paid_partnership: boolean,
  sponsor_tags: { username: string, user_id: string | null }[],
  is_sponsored: boolean,
  has_audio: boolean | null,
  comments?: CommentRecord[],
  downloaded_files?: string[]
}

export function toRecord(post: Post): PostRecord {
  const record: PostRecord = {
    id: post.key,
    code: post.code ?? null,
    url: post.url ?? null,
    user: post.author.handle,
    user_id: post.author.id ?? null,
    user_full_name: post.author.displayName ?? null,
    is_verified: post.author.verified,
    user_avatar_url: post.author.avatarUrl ?? null,
    caption: post.caption ?? null,
    likes: post.likes,
    comments_count: post.commentCount,
    timestamp: unixTime(post.takenAt) ?? null,
    timestamp_human: humanDate(post.takenAt) ?? null,
    media_type: post.mediaType,
    media_type_name: post.kind === 'unknown' ? String(post.mediaType) : post.kind,
    thumbnail_url: post.thumbnailUrl ?? null,
    video_url: post.videoUrl ?? null,
    media_urls: post.media.map(m => m.url),
    carousel_media_count: post.kind === 'album' ? post.media.length : 0,
    location: post.location ?? null,
    filter_type: post.filterType ?? null,
    is_paid_partnership: post.paidPartnership,
    sponsor_tags: post.sponsors.map(s => ({ username: s.handle, user_id: s.id ?? null })),
    is_sponsored: isSponsored(post),
    has_audio: post.hasAudio ?? null,
  };

  if (post.comments) {
    record.comments = post.comments.map(c => ({
      user: c.handle,
      text: c.text,
      created_at: c.createdAt?.toISOString() ?? null,
      likes: c.likes ?? 0,
    }));
  }

  if (post.downloadedFiles) {
    record.downloaded_files = post.downloadedFiles;
  }

  return record;
}
