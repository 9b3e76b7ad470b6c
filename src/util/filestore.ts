import path from 'path';
import { pipeline } from 'stream/promises';

import gpkg from 'fast-glob';
const { async: glob } = gpkg;
type GlobOptions = Parameters<typeof glob>[1];

import fpkg from 'fs-extra';
const {
  readFile,
  readJson,
  writeFile,
  writeJson,
  existsSync,
  ensureDirSync,
  createWriteStream,
  remove
} = fpkg;

import is from '@sindresorhus/is';

export interface FilestoreOptions extends Record<string, unknown> {
  base?: string;
  output?: string;
  cache?: string;
  bucket?: string;
}

export interface FilestoreReadOptions {
  [key: string]: unknown;
  parse?: boolean;
  throw?: boolean;
}

export interface FilestoreWriteOptions {
  [key: string]: unknown;
  autoSerialize?: boolean;
  ensurePath?: boolean;
}

/**
 * A light wrapper for the file system tasks we do while archiving.
 *
 * It wraps the 'correct' directories for files to live in: session data goes
 * in `cache`, run output and downloaded media in `output`. Everything can be
 * moved under a shared base directory, and optionally split into buckets.
 */
export class Filestore {
  static cache = 'cache';
  static output = 'output';

  _base?: string;
  _bucket?: string;
  _output?: string;
  _cache?: string;

  get cache(): string {
    if (this._cache) return this._cache;
    if (this._bucket) return path.join(Filestore.cache, this._bucket);
    return Filestore.cache;
  }

  get output(): string {
    if (this._output) return this._output;
    if (this._bucket) return path.join(Filestore.output, this._bucket);
    return Filestore.output;
  }

  constructor(options?: FilestoreOptions) {
    this._base = options?.base;
    this._cache = options?.cache;
    this._output = options?.output;
    this._bucket = options?.bucket;
  }

  /**
   * Creates a full directory path if it doesn't already exist.
   */
  ensure(path: string) {
    ensureDirSync(path);
  }

  /**
   * Checks whether a file or directory exists; returns TRUE or FALSE.
   */
  exists(path: string): boolean {
    return existsSync(path);
  }

  /**
   * Checks whether a file or directory exists in the current `cache` directory;
   * returns TRUE or FALSE.
   */
  existsCache(path: string) {
    return this.exists(this.prefix(path, 'cache'));
  }

  /**
   * Finds files and directories matching a particular glob string.
   */
  async find(
    input: string | string[],
    options?: GlobOptions,
    prefix?: string
  ): Promise<string[]> {
    let globs: string | string[] = input;
    if (prefix) {
      globs =
        typeof input === 'string'
          ? this.prefix(input, prefix)
          : input.map((i) => this.prefix(i, prefix));
    }
    return glob(globs, options);
  }

  /**
   * Wrapper for the `find` function that works inside the current output directory;
   * returned paths are relative to it.
   */
  async findOutput(
    globs: string | string[],
    options: GlobOptions = {}
  ): Promise<string[]> {
    const root = this.prefix('', 'output');
    return this.find(globs, options, 'output').then((paths) =>
      paths.map((p) => path.relative(root, p))
    );
  }

  /**
   * Reads a file from the filesystem; if the name ends with 'json' the data
   * is automatically deserialized.
   *
   * By default, it will swallow read errors and simply return `undefined` if
   * files don't exist.
   */
  async read(file: string, options?: FilestoreReadOptions): Promise<unknown> {
    const errorHandler = (err: unknown) => {
      if (options?.throw === true) {
        throw err;
      } else {
        return undefined;
      }
    };

    if (options?.parse !== false) {
      const extension = path.parse(file).ext.toLocaleLowerCase();
      if (extension === '.json') {
        return readJson(file).then((data: unknown) => data).catch(errorHandler);
      }
    }

    return readFile(file)
      .then((buffer) => (options?.parse !== false ? buffer.toString() : buffer))
      .catch(errorHandler);
  }

  /**
   * Prefixed version of `read` that looks in the current cache directory.
   */
  async readCache(file: string, options?: FilestoreReadOptions) {
    return this.read(this.prefix(file, 'cache'), options);
  }

  /**
   * Prefixed version of `read` that looks in the current output directory.
   */
  async readOutput(file: string, options?: FilestoreReadOptions) {
    return this.read(this.prefix(file, 'output'), options);
  }

  /**
   * Writes a file to the filesystem; if the name ends with 'json' the data
   * is automatically serialized.
   */
  async write(
    file: string,
    data: unknown,
    options?: FilestoreWriteOptions
  ): Promise<void> {
    if (options?.ensurePath !== false && path.parse(file).dir !== '') {
      this.ensure(path.parse(file).dir);
    }

    if (is.string(data) || Buffer.isBuffer(data)) {
      return writeFile(file, data);
    }

    if (options?.autoSerialize !== false) {
      const extension = path.parse(file).ext.toLocaleLowerCase();
      if (extension === '.json') {
        return writeJson(file, data, { spaces: 2 });
      }
    }

    throw new Error(`${file} couldn't be written.`);
  }

  /**
   * Prefixed version of `write` that directs output to the current cache directory.
   *
   * Returns a promise that resolves to the fully prefixed filename that was generated.
   */
  async writeCache(
    file: string,
    data: unknown,
    options?: FilestoreWriteOptions
  ): Promise<string> {
    const path = this.prefix(file, 'cache');
    return this.write(path, data, options).then(() => path);
  }

  /**
   * Prefixed version of `write` that directs output to the current output directory.
   *
   * Returns a promise that resolves to the fully prefixed filename that was generated.
   */
  async writeOutput(
    file: string,
    data: unknown,
    options?: FilestoreWriteOptions
  ): Promise<string> {
    const path = this.prefix(file, 'output');
    return this.write(path, data, options).then(() => path);
  }

  /**
   * Writes a web stream (a fetch response body, say) to disk chunk by chunk.
   * A partly written file is removed if the stream fails.
   */
  async writeStream(
    file: string,
    body: ReadableStream<Uint8Array>,
    options?: FilestoreWriteOptions
  ): Promise<void> {
    if (options?.ensurePath !== false && path.parse(file).dir !== '') {
      this.ensure(path.parse(file).dir);
    }

    try {
      await pipeline(chunks(body), createWriteStream(file));
    } catch (err: unknown) {
      await this.delete(file);
      throw err;
    }
  }

  /**
   * Prefixed version of `writeStream` that directs output to the current output
   * directory; resolves to the fully prefixed filename.
   */
  async writeOutputStream(
    file: string,
    body: ReadableStream<Uint8Array>,
    options?: FilestoreWriteOptions
  ): Promise<string> {
    const path = this.prefix(file, 'output');
    return this.writeStream(path, body, options).then(() => path);
  }

  async delete(fileOrDirectory: string | string[]) {
    const files = Array.isArray(fileOrDirectory)
      ? fileOrDirectory
      : [fileOrDirectory];
    return Promise.allSettled(files.map((f) => remove(f)));
  }

  getPath(fileOrDirectory: string, prefix?: string) {
    return this.prefix(fileOrDirectory, prefix);
  }

  getCachePath(fileOrDirectory: string) {
    return this.getPath(fileOrDirectory, 'cache');
  }

  getOutputPath(fileOrDirectory: string) {
    return this.getPath(fileOrDirectory, 'output');
  }

  /**
   * Internal utility function for prefixing a path; attempts to be smart about a lot
   * of potential weird scenarios but can be faked out.
   *
   * - Absolute paths are not prefixed
   * - `cache` and `output` are expanded to the current Filestore directories
   * - If the input already lives under the prefix directory, it won't be added a second time.
   * - If a class-wide alternate base directory has been created, all non-absolute
   *   paths will live under it.
   */
  prefix(input: string, prefix?: string) {
    if (path.isAbsolute(input)) return input;
    const base = this._base;

    let fullPrefix: string | undefined = prefix;

    switch (prefix) {
      case Filestore.cache:
        fullPrefix = this.cache;
        break;
      case Filestore.output:
        fullPrefix = this.output;
        break;
    }

    if (base) {
      if (fullPrefix) {
        if (fullPrefix !== base && !fullPrefix.startsWith(base + path.sep))
          fullPrefix = path.join(base, fullPrefix);
      } else {
        fullPrefix = base;
      }
    }

    if (fullPrefix && input !== fullPrefix && !input.startsWith(fullPrefix + path.sep)) {
      return path.join(fullPrefix, input);
    } else {
      return input;
    }
  }
}

async function* chunks(body: ReadableStream<Uint8Array>) {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
