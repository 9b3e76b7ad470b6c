import * as ss from 'superstruct';
import { Filestore } from '../../util/index.js';
import type { Logger } from './types.js';

export const archivePattern = 'feed_*.json';

export type ArchivedPost = {
  file: string,
  user?: string,
  timestamp?: string
}

const RecordSchema = ss.type({
  id: ss.optional(ss.nullable(ss.union([ss.string(), ss.number()]))),
  user: ss.optional(ss.nullable(ss.string())),
  timestamp_human: ss.optional(ss.nullable(ss.string())),
});

const ArchiveSchema = ss.union([
  ss.array(ss.unknown()),
  ss.type({ posts: ss.array(ss.unknown()) }),
]);

/**
 * Builds an index of every post already saved by earlier runs, keyed by post id,
 * so a new run can skip them. Files that can't be read or parsed are reported
 * and ignored.
 */
export async function loadArchivedPosts(files: Filestore, log: Logger = () => {}): Promise<Map<string, ArchivedPost>> {
  const archived = new Map<string, ArchivedPost>();
  const archives = (await files.findOutput(archivePattern)).sort();
  if (archives.length === 0) return archived;

  log(`Checking ${archives.length} existing feed file(s) for duplicates`);

  for (const file of archives) {
    let data: unknown;
    try {
      data = await files.readOutput(file, { throw: true });
    } catch (err: unknown) {
      log(`Could not read ${file}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    if (!ss.is(data, ArchiveSchema)) {
      log(`Could not read ${file}: not a feed archive`);
      continue;
    }

    const records = Array.isArray(data) ? data : data.posts;
    for (const record of records) {
      if (!ss.is(record, RecordSchema)) continue;
      if (record.id === undefined || record.id === null || record.id === '') continue;
      archived.set(String(record.id), {
        file,
        user: record.user ?? undefined,
        timestamp: record.timestamp_human ?? undefined,
      });
    }
  }

  if (archived.size) {
    log(`Found ${archived.size} existing posts across all files`);
  }

  return archived;
}
