import type {
  CredentialPrompt,
  Logger,
  SessionClient,
  SessionState,
  SessionStore,
  StoredSession,
  TwoFactorChallenge,
} from './types.js';
import { AuthenticationError } from './errors.js';

export type SessionPolicyOptions = {
  client: SessionClient,
  store: SessionStore,
  prompt: CredentialPrompt,

  /**
   * Account to use. A saved session for a different account is ignored and a
   * fresh login is made for this one; without it, the saved session's account
   * is used.
   */
  username?: string,
  log?: Logger
}

export type OpenSession = {
  client: SessionClient,
  state: 'session-validated' | 'authenticated',
  username?: string
}

const codePattern = /^\d{6}$/;

/**
 * Decides whether a saved session can be reused, and logs in from scratch when
 * it can't.
 *
 * A saved session gets exactly one cheap identity lookup to prove it still
 * works; anything short of a clean answer sends us to an interactive login.
 * That login happens at most once per `open()`, and a second-factor code gets
 * one re-prompt before we give up.
 */
export class SessionPolicy {
  state: SessionState = 'no-session';
  readonly transitions: SessionState[] = ['no-session'];

  constructor(protected options: SessionPolicyOptions) {}

  protected log(...data: unknown[]) {
    this.options.log?.(...data);
  }

  protected transition(state: SessionState) {
    this.state = state;
    this.transitions.push(state);
  }

  async open(): Promise<OpenSession> {
    const { client, store } = this.options;
    const requested = this.options.username;
    let username = requested;

    let stored: StoredSession | undefined;
    try {
      stored = await store.load();
    } catch (err: unknown) {
      this.log(`Could not read saved session: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (stored && requested && stored.username && stored.username !== requested) {
      this.log(`Saved session belongs to @${stored.username}; logging in as @${requested}`);
      stored = undefined;
    }

    if (stored) {
      username = requested ?? stored.username;
      try {
        await client.restoreSession(stored.state);
        this.transition('session-loaded');
      } catch (err: unknown) {
        this.log(`Could not load saved session: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    if (this.state === 'session-loaded') {
      const result = await client.validateIdentity();
      if (result.status === 'valid' && requested && result.handle && result.handle !== requested) {
        this.log(`Saved session is for @${result.handle}, not @${requested}`);
      } else if (result.status === 'valid') {
        this.transition('session-validated');
        this.log(`Session reused${result.handle ? ` for @${result.handle}` : ''}`);
        return { client, state: 'session-validated', username: result.handle ?? username };
      } else if (result.status === 'invalid') {
        this.log(`Saved session is no longer valid: ${result.reason}`);
      } else {
        this.log(`Could not confirm saved session: ${result.error.message}`);
      }
    }

    this.transition('session-invalid');
    return this.login(username);
  }

  protected async login(suggested?: string): Promise<OpenSession> {
    const { client, store, prompt } = this.options;
    const credentials = await prompt.credentials(suggested);
    if (!credentials.username || !credentials.password) {
      throw new AuthenticationError('Username and password are required for a fresh login');
    }

    this.log(`Logging in as @${credentials.username}`);
    const result = await client.login(credentials);
    if (result.status === 'two-factor') {
      this.log('Two-factor authentication required');
      await this.verify(result.challenge);
    }

    const state = await client.exportSession();
    await store.save({ username: credentials.username, state });
    this.transition('authenticated');
    this.log('Session saved');

    return { client, state: 'authenticated', username: credentials.username };
  }

  protected async verify(challenge: TwoFactorChallenge) {
    const { client, prompt } = this.options;

    for (const attempt of [1, 2]) {
      const code = (await prompt.verificationCode(challenge, attempt)).trim();
      const last = attempt === 2;

      if (!codePattern.test(code)) {
        if (last) throw new AuthenticationError('Verification code must be 6 digits');
        this.log('Verification code must be 6 digits');
        continue;
      }

      try {
        await client.completeTwoFactor(challenge, code);
        this.log('Two-factor verification successful');
        return;
      } catch (err: unknown) {
        if (last || !(err instanceof AuthenticationError)) throw err;
        this.log(`Verification code rejected: ${err.message}`);
      }
    }
  }
}
