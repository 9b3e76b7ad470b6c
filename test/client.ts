import test from 'ava';
import instagram from 'instagram-private-api';
import { InstagramClient } from '../src/archives/instagram/client.js';
import type { IgApi } from '../src/archives/instagram/client.js';
import { ArchiveError, AuthenticationError, ResponseShapeError, TransportError } from '../src/archives/instagram/errors.js';

const {
  IgLoginBadPasswordError,
  IgLoginRequiredError,
  IgLoginTwoFactorRequiredError,
  IgNetworkError,
  IgResponseError,
} = instagram;

/**
 * Builds one of the library's error types without going through its
 * constructor, which wants a full HTTP response.
 */
function libraryError<T extends object>(type: { prototype: T }, fields: object): T {
  const err: T = Object.create(type.prototype);
  return Object.assign(err, fields);
}

function responseError(statusCode: number, message = `${statusCode}`) {
  return libraryError(IgResponseError, { message, response: { statusCode } });
}

function media(id: string) {
  return { id, media_type: 1, user: { username: 'tester' } };
}

class StubInstagram implements IgApi {
  pages: unknown[] = [];
  comments: unknown[] = [];
  user: unknown = { username: 'tester' };
  loginError?: Error;
  twoFactorError?: Error;
  savedState: unknown = {};

  timelinesStarted = 0;
  devices: string[] = [];
  restored: unknown[] = [];
  twoFactorLogins: unknown[] = [];

  feed = {
    timeline: () => {
      this.timelinesStarted++;
      return {
        request: async () => {
          const page = this.pages.shift();
          if (page instanceof Error) throw page;
          return page;
        },
      };
    },
    mediaComments: () => ({ items: async () => this.comments }),
  };

  account = {
    currentUser: async () => {
      if (this.user instanceof Error) throw this.user;
      return this.user;
    },
    login: async () => {
      if (this.loginError) throw this.loginError;
      return {};
    },
    twoFactorLogin: async (options: unknown) => {
      this.twoFactorLogins.push(options);
      if (this.twoFactorError) throw this.twoFactorError;
      return {};
    },
  };

  state = {
    generateDevice: (seed: string) => {
      this.devices.push(seed);
    },
    serialize: async () => this.savedState,
    deserialize: async (state: unknown) => {
      this.restored.push(state);
    },
  };
}

test('timeline cursors must follow the previous page', async t => {
  const ig = new StubInstagram();
  ig.pages = [
    { feed_items: [{ media_or_ad: media('1') }], next_max_id: 'c1', more_available: true },
    { feed_items: [{ media_or_ad: media('2') }], next_max_id: 'c2', more_available: true },
  ];
  const client = new InstagramClient(ig);

  const first = await client.fetchTimelinePage();
  t.deepEqual(first.items.map(post => post.key), ['1']);
  t.is(first.nextCursor, 'c1');

  await t.throwsAsync(client.fetchTimelinePage('c0'), { instanceOf: ArchiveError, message: 'Timeline cursor c0 is out of sequence' });

  const second = await client.fetchTimelinePage('c1');
  t.deepEqual(second.items.map(post => post.key), ['2']);
  t.is(second.nextCursor, 'c2');
  t.is(ig.timelinesStarted, 1);
});

test('a timeline cannot be continued before it starts', async t => {
  const client = new InstagramClient(new StubInstagram());
  await t.throwsAsync(client.fetchTimelinePage('c1'), {
    instanceOf: ArchiveError,
    message: 'Cannot continue a timeline that was never started',
  });
});

test('asking without a cursor starts a fresh timeline', async t => {
  const ig = new StubInstagram();
  ig.pages = [
    { feed_items: [], next_max_id: 'c1' },
    { feed_items: [], next_max_id: 'c1' },
  ];
  const client = new InstagramClient(ig);

  await client.fetchTimelinePage();
  await client.fetchTimelinePage();
  t.is(ig.timelinesStarted, 2);
});

test('no cursor once the service says there is nothing more', async t => {
  const ig = new StubInstagram();
  ig.pages = [{ feed_items: [{ media_or_ad: media('1') }], next_max_id: 'c9', more_available: false }];

  const page = await new InstagramClient(ig).fetchTimelinePage();
  t.is(page.items.length, 1);
  t.is(page.nextCursor, undefined);
});

test('feed entries without media are dropped', async t => {
  const ig = new StubInstagram();
  ig.pages = [{
    feed_items: [
      { end_of_feed_demarcator: { title: "You're all caught up" } },
      { media_or_ad: media('1') },
      { media_or_ad: null },
      { suggested_users: {} },
      { media_or_ad: media('2') },
    ],
  }];

  const page = await new InstagramClient(ig).fetchTimelinePage();
  t.deepEqual(page.items.map(post => post.key), ['1', '2']);
});

test('timeline responses of the wrong shape are refused', async t => {
  const ig = new StubInstagram();
  ig.pages = [{ feed_items: 'nope' }];

  await t.throwsAsync(new InstagramClient(ig).fetchTimelinePage(), { instanceOf: ResponseShapeError });
});

test('timeline failures become transport errors', async t => {
  const ig = new StubInstagram();
  ig.pages = [responseError(429, 'Too Many Requests')];

  const err = await t.throwsAsync(new InstagramClient(ig).fetchTimelinePage(), { instanceOf: TransportError });
  t.is(err?.message, 'Too Many Requests');
  t.is(err?.status, 429);
  t.true(err?.retryable);
});

test('comments are capped at the limit', async t => {
  const ig = new StubInstagram();
  ig.comments = [
    { text: 'one', user: { username: 'a' } },
    { text: 'two', user: { username: 'b' } },
    { text: 'three', user: { username: 'c' } },
  ];

  const comments = await new InstagramClient(ig).fetchComments('p1', 2);
  t.deepEqual(comments.map(comment => comment.text), ['one', 'two']);
});

test('current user confirms the session', async t => {
  const result = await new InstagramClient(new StubInstagram()).validateIdentity();
  t.deepEqual(result, { status: 'valid', handle: 'tester' });
});

test('network failure while validating is reported as transport trouble', async t => {
  const ig = new StubInstagram();
  ig.user = libraryError(IgNetworkError, { message: 'socket hang up' });

  const result = await new InstagramClient(ig).validateIdentity();
  t.is(result.status, 'transport-error');
  if (result.status === 'transport-error') {
    t.is(result.error.message, 'socket hang up');
  }
});

test('login required while validating means the session is invalid', async t => {
  const ig = new StubInstagram();
  ig.user = libraryError(IgLoginRequiredError, { message: 'login_required', response: { statusCode: 403 } });

  const result = await new InstagramClient(ig).validateIdentity();
  t.deepEqual(result, { status: 'invalid', reason: 'login_required' });
});

test('throttling and server errors while validating are transport trouble', async t => {
  for (const status of [429, 500, 503]) {
    const ig = new StubInstagram();
    ig.user = responseError(status);

    const result = await new InstagramClient(ig).validateIdentity();
    t.is(result.status, 'transport-error', `status ${status}`);
    if (result.status === 'transport-error') {
      t.is(result.error.status, status);
    }
  }
});

test('other response errors while validating mean the session is invalid', async t => {
  const ig = new StubInstagram();
  ig.user = responseError(404, 'Not Found');

  const result = await new InstagramClient(ig).validateIdentity();
  t.deepEqual(result, { status: 'invalid', reason: 'Not Found' });
});

test('login without a second factor', async t => {
  const ig = new StubInstagram();

  const result = await new InstagramClient(ig).login({ username: 'tester', password: 'test-password' });
  t.deepEqual(result, { status: 'authenticated' });
  t.deepEqual(ig.devices, ['tester']);
});

test('second factor challenge comes from the login error', async t => {
  const ig = new StubInstagram();
  ig.loginError = libraryError(IgLoginTwoFactorRequiredError, {
    message: 'two_factor_required',
    response: {
      statusCode: 400,
      body: { two_factor_info: { two_factor_identifier: 'abc123', totp_two_factor_on: true } },
    },
  });

  const result = await new InstagramClient(ig).login({ username: 'tester', password: 'test-password' });
  t.deepEqual(result, {
    status: 'two-factor',
    challenge: { username: 'tester', identifier: 'abc123', method: 'totp' },
  });
});

test('text message challenge without authenticator app', async t => {
  const ig = new StubInstagram();
  ig.loginError = libraryError(IgLoginTwoFactorRequiredError, {
    message: 'two_factor_required',
    response: { statusCode: 400, body: { two_factor_info: { two_factor_identifier: 'abc123' } } },
  });

  const result = await new InstagramClient(ig).login({ username: 'tester', password: 'test-password' });
  t.deepEqual(result, {
    status: 'two-factor',
    challenge: { username: 'tester', identifier: 'abc123', method: 'sms' },
  });
});

test('second factor challenge without an identifier is refused', async t => {
  const ig = new StubInstagram();
  ig.loginError = libraryError(IgLoginTwoFactorRequiredError, {
    message: 'two_factor_required',
    response: { statusCode: 400, body: {} },
  });

  await t.throwsAsync(
    new InstagramClient(ig).login({ username: 'tester', password: 'test-password' }),
    { instanceOf: ResponseShapeError, message: 'Two-factor challenge is missing its identifier' }
  );
});

test('wrong password is an authentication error', async t => {
  const ig = new StubInstagram();
  ig.loginError = libraryError(IgLoginBadPasswordError, {
    message: 'The password you entered is incorrect.',
    response: { statusCode: 400 },
  });

  await t.throwsAsync(
    new InstagramClient(ig).login({ username: 'tester', password: 'test-password' }),
    { instanceOf: AuthenticationError, message: 'The password you entered is incorrect.' }
  );
});

test('verification code is sent with the challenge details', async t => {
  const ig = new StubInstagram();

  await new InstagramClient(ig).completeTwoFactor({ username: 'tester', identifier: 'abc123', method: 'sms' }, '123456');
  t.deepEqual(ig.twoFactorLogins, [{
    username: 'tester',
    verificationCode: '123456',
    twoFactorIdentifier: 'abc123',
    verificationMethod: '1',
    trustThisDevice: '1',
  }]);
});

test('rejected verification code is an authentication error', async t => {
  const ig = new StubInstagram();
  ig.twoFactorError = responseError(400, 'Invalid code');

  await t.throwsAsync(
    new InstagramClient(ig).completeTwoFactor({ username: 'tester', identifier: 'abc123', method: 'totp' }, '123456'),
    { instanceOf: AuthenticationError, message: 'Verification code rejected: Invalid code' }
  );
});

test('server trouble during verification is a transport error', async t => {
  const ig = new StubInstagram();
  ig.twoFactorError = responseError(502, 'Bad Gateway');

  await t.throwsAsync(
    new InstagramClient(ig).completeTwoFactor({ username: 'tester', identifier: 'abc123', method: 'totp' }, '123456'),
    { instanceOf: TransportError, message: 'Bad Gateway' }
  );
});

test('exported sessions leave out device constants', async t => {
  const ig = new StubInstagram();
  ig.savedState = { constants: { APP_VERSION: '1.0' }, cookies: 'test-cookie', deviceString: 'test-device' };
  const client = new InstagramClient(ig);

  t.deepEqual(await client.exportSession(), { cookies: 'test-cookie', deviceString: 'test-device' });

  await client.restoreSession({ cookies: 'test-cookie' });
  t.deepEqual(ig.restored, [{ cookies: 'test-cookie' }]);
});
