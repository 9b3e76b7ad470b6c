import instagram from 'instagram-private-api';
import * as ss from 'superstruct';
import { normalizeComment, normalizePost } from './normalize.js';
import type {
  Comment,
  Credentials,
  Cursor,
  FeedPage,
  LoginResult,
  SessionClient,
  SessionData,
  TwoFactorChallenge,
  ValidationResult,
} from './types.js';
import { ArchiveError, AuthenticationError, ResponseShapeError, TransportError } from './errors.js';

const {
  IgApiClient: Client,
  IgCheckpointError,
  IgLoginBadPasswordError,
  IgLoginInvalidUserError,
  IgLoginRequiredError,
  IgLoginTwoFactorRequiredError,
  IgNetworkError,
  IgResponseError,
} = instagram;

/**
 * The parts of `IgApiClient` this archiver talks to.
 */
export interface IgApi {
  feed: {
    timeline(): { request(): Promise<unknown> },
    mediaComments(id: string): { items(): Promise<unknown[]> },
  },
  account: {
    currentUser(): Promise<unknown>,
    login(username: string, password: string): Promise<unknown>,
    twoFactorLogin(options: {
      username: string,
      verificationCode: string,
      twoFactorIdentifier: string,
      verificationMethod: string,
      trustThisDevice: '1' | '0',
    }): Promise<unknown>,
  },
  state: {
    generateDevice(seed: string): void,
    serialize(): Promise<unknown>,
    deserialize(state: unknown): Promise<void>,
  },
}

type Timeline = ReturnType<IgApi['feed']['timeline']>;

const TimelineResponseSchema = ss.type({
  feed_items: ss.optional(ss.array(ss.type({ media_or_ad: ss.optional(ss.unknown()) }))),
  next_max_id: ss.optional(ss.nullable(ss.string())),
  more_available: ss.optional(ss.boolean()),
});

const TwoFactorSchema = ss.type({
  response: ss.type({
    body: ss.type({
      two_factor_info: ss.type({
        two_factor_identifier: ss.string(),
        totp_two_factor_on: ss.optional(ss.boolean()),
      })
    })
  })
});

const StatusSchema = ss.type({
  response: ss.type({ statusCode: ss.number() })
});

const UserSchema = ss.type({ username: ss.string() });

const SerializedStateSchema = ss.record(ss.string(), ss.unknown());

function statusOf(err: unknown): number | undefined {
  return ss.is(err, StatusSchema) ? err.response.statusCode : undefined;
}

// Throttling and server trouble say nothing about whether the session is still good.
function isTransient(err: unknown): boolean {
  if (err instanceof IgNetworkError) return true;
  const status = statusOf(err);
  return status === 429 || (status !== undefined && status >= 500);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Converts whatever the API library threw into one of our own error types.
 */
export function translateError(err: unknown): Error {
  if (err instanceof ArchiveError) return err;
  if (
    err instanceof IgLoginBadPasswordError ||
    err instanceof IgLoginInvalidUserError ||
    err instanceof IgLoginRequiredError
  ) {
    return new AuthenticationError(messageOf(err), { cause: err });
  }
  if (err instanceof IgCheckpointError) {
    return new AuthenticationError('Instagram wants a security checkpoint; confirm the login in the app and try again', { cause: err });
  }
  if (err instanceof IgNetworkError || err instanceof IgResponseError) {
    return new TransportError(messageOf(err), { cause: err, status: statusOf(err) });
  }
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * FeedClient and SessionClient backed by the `instagram-private-api` library.
 *
 * The timeline feed object keeps its own position, so continuation requests
 * must hand back the cursor from the page before; anything else is an error
 * rather than a silent restart from the top.
 */
export class InstagramClient implements SessionClient {
  ig: IgApi;
  protected timeline?: Timeline;
  protected lastCursor?: Cursor;

  constructor(ig?: IgApi) {
    this.ig = ig ?? new Client();
  }

  async fetchTimelinePage(cursor?: Cursor): Promise<FeedPage> {
    if (cursor === undefined || !this.timeline) {
      if (cursor !== undefined) {
        throw new ArchiveError('Cannot continue a timeline that was never started');
      }
      this.timeline = this.ig.feed.timeline();
      this.lastCursor = undefined;
    } else if (cursor !== this.lastCursor) {
      throw new ArchiveError(`Timeline cursor ${cursor} is out of sequence`);
    }

    let body: unknown;
    try {
      body = await this.timeline.request();
    } catch (err: unknown) {
      throw translateError(err);
    }

    if (!ss.is(body, TimelineResponseSchema)) {
      throw new ResponseShapeError('Timeline response has an unexpected shape');
    }

    const items = (body.feed_items ?? [])
      .filter(item => item.media_or_ad !== undefined && item.media_or_ad !== null)
      .map(item => normalizePost(item.media_or_ad));

    const nextCursor = body.more_available === false ? undefined : body.next_max_id ?? undefined;
    this.lastCursor = nextCursor;
    return { items, nextCursor };
  }

  async fetchComments(postKey: string, limit: number): Promise<Comment[]> {
    let items: unknown[];
    try {
      items = await this.ig.feed.mediaComments(postKey).items();
    } catch (err: unknown) {
      throw translateError(err);
    }
    return items.slice(0, limit).map(normalizeComment);
  }

  async validateIdentity(): Promise<ValidationResult> {
    try {
      const user: unknown = await this.ig.account.currentUser();
      return { status: 'valid', handle: ss.is(user, UserSchema) ? user.username : undefined };
    } catch (err: unknown) {
      const translated = translateError(err);
      if (translated instanceof TransportError && isTransient(err)) {
        return { status: 'transport-error', error: translated };
      }
      return { status: 'invalid', reason: translated.message };
    }
  }

  async restoreSession(data: SessionData): Promise<void> {
    await this.ig.state.deserialize(data);
  }

  async exportSession(): Promise<SessionData> {
    const state: unknown = await this.ig.state.serialize();
    if (!ss.is(state, SerializedStateSchema)) {
      throw new ResponseShapeError('Session state could not be serialized');
    }
    // Device constants belong to the library release, not the account.
    const { constants: _constants, ...rest } = state;
    return rest;
  }

  async login(credentials: Credentials): Promise<LoginResult> {
    this.ig.state.generateDevice(credentials.username);
    try {
      await this.ig.account.login(credentials.username, credentials.password);
      return { status: 'authenticated' };
    } catch (err: unknown) {
      if (err instanceof IgLoginTwoFactorRequiredError) {
        if (!ss.is(err, TwoFactorSchema)) {
          throw new ResponseShapeError('Two-factor challenge is missing its identifier', { cause: err });
        }
        const info = err.response.body.two_factor_info;
        return {
          status: 'two-factor',
          challenge: {
            username: credentials.username,
            identifier: info.two_factor_identifier,
            method: info.totp_two_factor_on ? 'totp' : 'sms',
          }
        };
      }
      throw translateError(err);
    }
  }

  async completeTwoFactor(challenge: TwoFactorChallenge, code: string): Promise<void> {
    try {
      await this.ig.account.twoFactorLogin({
        username: challenge.username,
        verificationCode: code,
        twoFactorIdentifier: challenge.identifier,
        verificationMethod: challenge.method === 'totp' ? '0' : '1',
        trustThisDevice: '1',
      });
    } catch (err: unknown) {
      if (err instanceof IgResponseError && statusOf(err) === 400) {
        throw new AuthenticationError(`Verification code rejected: ${messageOf(err)}`, { cause: err });
      }
      throw translateError(err);
    }
  }
}
