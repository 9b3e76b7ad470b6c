import path from 'path';
import ky, { type KyInstance } from 'ky';
import { Filestore } from '../../util/index.js';
import type { Logger, MediaResource, Post } from './types.js';

export type MediaDownloaderOptions = {
  /**
   * Directory inside the Filestore's output directory.
   *
   * @defaultValue 'downloads'
   */
  directory?: string,

  /**
   * Extra attempts for a file after a transient HTTP failure.
   *
   * @defaultValue 2
   */
  retries?: number,
  timeout?: number,
  http?: KyInstance,
  log?: Logger
}

const extensions: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/heic': '.heic',
  'image/gif': '.gif',
  'video/mp4': '.mp4',
  'video/quicktime': '.mov',
};

/**
 * Base filename for a post's media: `<handle>_<key>` for single photos and
 * videos, with a 1-based `_<n>` suffix for each album item.
 */
export function mediaFilename(post: Post, index?: number): string {
  const handle = post.author.handle.replace(/[^\w.-]/g, '_');
  const key = post.key.replace(/[^\w.-]/g, '_');
  return index === undefined ? `${handle}_${key}` : `${handle}_${key}_${index}`;
}

/**
 * Works out a file extension from the URL path, falling back to the response's
 * content type and finally to the resource kind.
 */
export function mediaExtension(resource: MediaResource, contentType?: string | null): string {
  let fromUrl = '';
  try {
    fromUrl = path.extname(new URL(resource.url).pathname).toLocaleLowerCase();
  } catch {
    fromUrl = '';
  }
  if (/^\.[a-z0-9]{2,4}$/.test(fromUrl)) return fromUrl;

  const type = contentType?.split(';')[0].trim().toLocaleLowerCase();
  if (type && extensions[type]) return extensions[type];

  return resource.kind === 'video' ? '.mp4' : '.jpg';
}

/**
 * Saves a post's photos and videos to disk. Each file is independent: one
 * failed download is logged and skipped without affecting the others.
 */
export class MediaDownloader {
  http: KyInstance;

  constructor(protected files: Filestore, protected options: MediaDownloaderOptions = {}) {
    this.http = options.http ?? ky.create({
      timeout: options.timeout ?? 30_000,
      retry: { limit: options.retries ?? 2, methods: ['get'] },
    });
  }

  get directory() {
    return this.options.directory ?? 'downloads';
  }

  protected log(...data: unknown[]) {
    this.options.log?.(...data);
  }

  /**
   * Downloads everything attached to a post and resolves to the saved paths,
   * relative to the output directory.
   */
  async download(post: Post): Promise<string[]> {
    const saved: string[] = [];
    const album = post.kind === 'album';

    for (const [i, resource] of post.media.entries()) {
      const base = mediaFilename(post, album ? i + 1 : undefined);
      try {
        const response = await this.http.get(resource.url);
        if (!response.body) throw new Error('Response has no body');
        const file = path.join(this.directory, base + mediaExtension(resource, response.headers.get('content-type')));
        await this.files.writeOutputStream(file, response.body);
        saved.push(file);
        this.log(`Downloaded ${resource.kind}: ${file}`);
      } catch (err: unknown) {
        this.log(`Could not download ${resource.kind} for ${post.key}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    if (album) {
      this.log(`Downloaded album: ${saved.length}/${post.media.length} files`);
    }
    return saved;
  }
}
