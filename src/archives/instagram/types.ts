import type { KyInstance } from 'ky';
import type { BaseArchiveOptions } from '../base-archive.js';
import type { TransportError } from './errors.js';

export type MediaKind = 'photo' | 'video' | 'album' | 'unknown';

export type MediaResource = {
  kind: 'photo' | 'video',
  url: string
}

export type PostAuthor = {
  id?: string,
  handle: string,
  displayName?: string,
  verified: boolean,
  avatarUrl?: string
}

export type Sponsor = {
  id?: string,
  handle: string
}

/**
 * A single timeline entry, normalized from whatever the remote API handed us.
 */
export type Post = {
  /**
   * Stable identifier from the remote service; used to deduplicate posts across
   * pages and across runs.
   */
  key: string,
  code?: string,
  url?: string,
  author: PostAuthor,
  kind: MediaKind,

  /**
   * The raw numeric media type; only interesting when `kind` is 'unknown'.
   */
  mediaType: number,
  caption?: string,
  likes: number,
  commentCount: number,
  takenAt?: Date,
  location?: string,
  thumbnailUrl?: string,
  videoUrl?: string,
  media: MediaResource[],
  paidPartnership: boolean,
  sponsors: Sponsor[],
  hasAudio?: boolean,
  filterType?: number,

  comments?: Comment[],
  downloadedFiles?: string[]
}

export type Comment = {
  handle: string,
  text: string,
  likes?: number,
  createdAt?: Date
}

/**
 * Opaque continuation token; only the remote client knows what's inside.
 */
export type Cursor = string;

export type FeedPage = {
  items: Post[],
  nextCursor?: Cursor
}

export type ValidationResult =
  | { status: 'valid', handle?: string }
  | { status: 'invalid', reason: string }
  | { status: 'transport-error', error: TransportError };

/**
 * The slice of the remote service the archiver actually uses once a session
 * is up and running.
 */
export interface FeedClient {
  /**
   * Requests one page of the timeline. Omitting the cursor starts from the top
   * of the feed; passing the cursor from the previous page continues it.
   */
  fetchTimelinePage(cursor?: Cursor): Promise<FeedPage>;
  fetchComments(postKey: string, limit: number): Promise<Comment[]>;
}

export type SessionData = Record<string, unknown>;

export type Credentials = {
  username: string,
  password: string
}

export type TwoFactorChallenge = {
  username: string,
  identifier: string,
  method: 'totp' | 'sms'
}

export type LoginResult =
  | { status: 'authenticated' }
  | { status: 'two-factor', challenge: TwoFactorChallenge };

/**
 * Everything needed to get from "nothing" to a usable FeedClient.
 */
export interface SessionClient extends FeedClient {
  restoreSession(data: SessionData): Promise<void>;
  exportSession(): Promise<SessionData>;
  validateIdentity(): Promise<ValidationResult>;
  login(credentials: Credentials): Promise<LoginResult>;
  completeTwoFactor(challenge: TwoFactorChallenge, code: string): Promise<void>;
}

export type StoredSession = {
  username?: string,
  state: SessionData
}

/**
 * Persistence for session tokens; the archiver never touches session files directly.
 */
export interface SessionStore {
  load(): Promise<StoredSession | undefined>;
  save(session: StoredSession): Promise<void>;
}

export interface CredentialPrompt {
  credentials(suggestedUsername?: string): Promise<Credentials>;

  /**
   * Asks for a second-factor code. `attempt` starts at 1; the policy never asks
   * more than twice.
   */
  verificationCode(challenge: TwoFactorChallenge, attempt: number): Promise<string>;
}

export type SessionState =
  | 'no-session'
  | 'session-loaded'
  | 'session-validated'
  | 'session-invalid'
  | 'authenticated';

export type StopReason =
  | 'target-reached'
  | 'exhausted'
  | 'stalled'
  | 'end-of-feed'
  | 'page-budget';

export type Logger = (...data: unknown[]) => void;

/**
 * Options for a single archiving run.
 */
export interface FeedArchiveOptions extends BaseArchiveOptions {
  /**
   * Number of unique posts to collect.
   *
   * @defaultValue 20
   */
  amount?: number,

  /**
   * Hard limit on timeline requests per run.
   *
   * @defaultValue 5
   */
  maxPages?: number,

  /**
   * Randomized pause between timeline requests, in milliseconds.
   *
   * @defaultValue `[1000, 3000]`
   */
  delay?: [number, number],

  /**
   * Fetch up to this many comments per post; `false` or 0 skips comments.
   */
  comments?: number | false,
  media?: boolean,
  skipSponsored?: boolean,
  skipArchived?: boolean,
  chronological?: boolean,

  /**
   * How many posts may have their comments and media fetched at once.
   *
   * @defaultValue 1
   */
  concurrency?: number,

  /**
   * Download timeout in milliseconds.
   */
  timeout?: number,

  /**
   * HTTP client for media downloads; mostly useful for tests.
   */
  http?: KyInstance,
  sleep?: (ms: number) => Promise<void>,
  now?: () => Date
}

export type ArchiveProgress = {
  collected: number,
  processed: number,
  saved: number,
  skippedArchived: number,
  skippedSponsored: number,
  commentsFetched: number,
  filesDownloaded: number
}

export type ArchiveSummary = ArchiveProgress & {
  file: string,
  pages: number,
  stopReason: StopReason,
  photos: number,
  videos: number,
  albums: number,
  sponsored: number,
  includedComments: boolean,
  includedMedia: boolean
}
