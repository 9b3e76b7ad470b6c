import * as ss from 'superstruct';
import { Filestore } from '../../util/index.js';
import type { SessionStore, StoredSession } from './types.js';

const StoredSessionSchema = ss.type({
  username: ss.optional(ss.string()),
  state: ss.record(ss.string(), ss.unknown()),
});

/**
 * Keeps the session token (and the username it belongs to) in a JSON file in
 * the Filestore's cache directory. Saving overwrites whatever was there.
 */
export class FileSessionStore implements SessionStore {
  constructor(protected files: Filestore, protected file = 'session.json') {}

  get path() {
    return this.files.getCachePath(this.file);
  }

  async load(): Promise<StoredSession | undefined> {
    if (!this.files.existsCache(this.file)) return undefined;
    const data = await this.files.readCache(this.file, { throw: true });
    if (!ss.is(data, StoredSessionSchema)) {
      throw new Error(`${this.path} is not a saved session`);
    }
    return data;
  }

  async save(session: StoredSession): Promise<void> {
    await this.files.writeCache(this.file, session);
  }
}
