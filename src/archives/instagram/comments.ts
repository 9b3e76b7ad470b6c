import type { Comment, FeedClient, Logger } from './types.js';

export const defaultCommentLimit = 50;

/**
 * One request for up to `limit` comments. If the service caps the response
 * below the limit we take what it gave us rather than paging for more.
 *
 * A failure here never stops the rest of the archive; it's logged and the
 * post simply gets no comments.
 */
export async function fetchComments(
  client: FeedClient,
  postKey: string,
  limit = defaultCommentLimit,
  log: Logger = () => {}
): Promise<Comment[]> {
  if (limit < 1) return [];
  try {
    const comments = await client.fetchComments(postKey, limit);
    return comments.slice(0, limit);
  } catch (err: unknown) {
    log(`Could not fetch comments for ${postKey}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}
