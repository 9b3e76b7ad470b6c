import * as ss from 'superstruct';
import is from '@sindresorhus/is';
import type { Comment, MediaKind, MediaResource, Post, Sponsor } from './types.js';
import { ResponseShapeError } from './errors.js';

const Id = ss.union([ss.string(), ss.number()]);

const Candidate = ss.type({ url: ss.string() });

const ImageVersions = ss.type({
  candidates: ss.array(Candidate)
});

const UserSchema = ss.type({
  pk: ss.optional(Id),
  username: ss.string(),
  full_name: ss.optional(ss.nullable(ss.string())),
  is_verified: ss.optional(ss.nullable(ss.boolean())),
  profile_pic_url: ss.optional(ss.nullable(ss.string())),
});

const SponsorUser = ss.type({
  pk: ss.optional(Id),
  username: ss.string(),
});

const ResourceSchema = ss.type({
  media_type: ss.number(),
  image_versions2: ss.optional(ImageVersions),
  video_versions: ss.optional(ss.array(Candidate)),
});

export const RawMediaSchema = ss.type({
  id: ss.optional(Id),
  pk: ss.optional(Id),
  code: ss.optional(ss.nullable(ss.string())),
  taken_at: ss.optional(ss.nullable(ss.number())),
  media_type: ss.number(),
  user: UserSchema,
  caption: ss.optional(ss.nullable(ss.type({ text: ss.string() }))),
  caption_text: ss.optional(ss.nullable(ss.string())),
  like_count: ss.optional(ss.nullable(ss.number())),
  comment_count: ss.optional(ss.nullable(ss.number())),
  image_versions2: ss.optional(ImageVersions),
  video_versions: ss.optional(ss.array(Candidate)),
  carousel_media: ss.optional(ss.array(ResourceSchema)),
  location: ss.optional(ss.nullable(ss.type({ name: ss.string() }))),
  is_paid_partnership: ss.optional(ss.nullable(ss.boolean())),
  sponsor_tags: ss.optional(ss.nullable(ss.array(
    ss.union([SponsorUser, ss.type({ sponsor: SponsorUser })])
  ))),
  has_audio: ss.optional(ss.nullable(ss.boolean())),
  filter_type: ss.optional(ss.nullable(ss.number())),
});

export const RawCommentSchema = ss.type({
  text: ss.string(),
  user: ss.type({ username: ss.string() }),
  created_at: ss.optional(ss.nullable(ss.number())),
  created_at_utc: ss.optional(ss.nullable(ss.number())),
  comment_like_count: ss.optional(ss.nullable(ss.number())),
});

export type RawMedia = ss.Infer<typeof RawMediaSchema>;
export type RawComment = ss.Infer<typeof RawCommentSchema>;

const kinds: Record<number, MediaKind> = {
  1: 'photo',
  2: 'video',
  8: 'album'
};

export function mediaKind(mediaType: number): MediaKind {
  return kinds[mediaType] ?? 'unknown';
}

function check<T, S>(value: unknown, struct: ss.Struct<T, S>, label: string): T {
  try {
    return ss.create(value, struct);
  } catch (err: unknown) {
    if (err instanceof ss.StructError) {
      throw new ResponseShapeError(`Unexpected ${label} shape: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

function resources(raw: RawMedia): MediaResource[] {
  if (raw.carousel_media?.length) {
    const output: MediaResource[] = [];
    for (const item of raw.carousel_media) {
      const video = item.video_versions?.[0]?.url;
      const photo = item.image_versions2?.candidates[0]?.url;
      if (item.media_type === 2 && video) {
        output.push({ kind: 'video', url: video });
      } else if (photo) {
        output.push({ kind: 'photo', url: photo });
      }
    }
    return output;
  }

  const video = raw.video_versions?.[0]?.url;
  const photo = raw.image_versions2?.candidates[0]?.url;
  if (raw.media_type === 2 && video) return [{ kind: 'video', url: video }];
  if (photo) return [{ kind: 'photo', url: photo }];
  return [];
}

function sponsors(raw: RawMedia): Sponsor[] {
  return (raw.sponsor_tags ?? []).map(tag => {
    const user = 'sponsor' in tag ? tag.sponsor : tag;
    return {
      id: is.undefined(user.pk) ? undefined : String(user.pk),
      handle: user.username
    };
  });
}

/**
 * Maps one raw timeline media object onto a Post.
 *
 * Throws a ResponseShapeError if the object is missing the fields we depend on,
 * or has no usable identifier.
 */
export function normalizePost(input: unknown): Post {
  const raw = check(input, RawMediaSchema, 'media');
  const id = raw.id ?? raw.pk;
  if (is.undefined(id) || String(id) === '') {
    throw new ResponseShapeError('Timeline media has no id or pk');
  }

  const media = resources(raw);
  const code = raw.code ?? undefined;

  return {
    key: String(id),
    code,
    url: code ? `https://www.instagram.com/p/${code}/` : undefined,
    author: {
      id: is.undefined(raw.user.pk) ? undefined : String(raw.user.pk),
      handle: raw.user.username,
      displayName: raw.user.full_name || undefined,
      verified: raw.user.is_verified ?? false,
      avatarUrl: raw.user.profile_pic_url ?? undefined,
    },
    kind: mediaKind(raw.media_type),
    mediaType: raw.media_type,
    caption: raw.caption?.text ?? raw.caption_text ?? undefined,
    likes: raw.like_count ?? 0,
    commentCount: raw.comment_count ?? 0,
    takenAt: is.number(raw.taken_at) ? new Date(raw.taken_at * 1000) : undefined,
    location: raw.location?.name,
    thumbnailUrl: raw.image_versions2?.candidates[0]?.url ?? media.find(m => m.kind === 'photo')?.url,
    videoUrl: raw.video_versions?.[0]?.url,
    media,
    paidPartnership: raw.is_paid_partnership ?? false,
    sponsors: sponsors(raw),
    hasAudio: raw.has_audio ?? undefined,
    filterType: raw.filter_type ?? undefined,
  };
}

export function normalizeComment(input: unknown): Comment {
  const raw = check(input, RawCommentSchema, 'comment');
  const seconds = raw.created_at_utc ?? raw.created_at;
  return {
    handle: raw.user.username,
    text: raw.text,
    likes: raw.comment_like_count ?? undefined,
    createdAt: is.number(seconds) ? new Date(seconds * 1000) : undefined,
  };
}

/**
 * Sponsored means an explicitly tagged paid partnership; brand content that
 * isn't tagged as such can't be told apart from anything else.
 */
export function isSponsored(post: Post): boolean {
  return post.paidPartnership || post.sponsors.length > 0;
}
