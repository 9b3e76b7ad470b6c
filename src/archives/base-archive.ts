import { Filestore, type FilestoreOptions } from '../util/index.js';
import chalk from 'chalk';
import slugify from '@sindresorhus/slugify';

/**
 * Core options supported by most archivers
 */
export interface BaseArchiveOptions extends Record<string, unknown> {
  name?: string,
  files?: Filestore | FilestoreOptions;
  logger?: (...data: unknown[]) => void;
}

/**
 * Skeleton for archivers; it takes care of the naming, file locations, and logging
 * boilerplate so subclasses can get on with pulling data down.
 */
export abstract class BaseArchive<ResultType = unknown> {
  constructor(protected options: BaseArchiveOptions = {}) {};

  get name(): string {
    return this.options.name ?? slugify(this.constructor.name);
  }

  get files(): Filestore {
    if (this.options.files instanceof Filestore) {
      return this.options.files;
    } else {
      this.options.files = new Filestore({
        ...this.options.files
      });
      return this.options.files;
    }
  }

  log(...data: unknown[]) {
    if (this.options.logger) {
      this.options.logger(...data)
    } else {
      if (typeof(data[0]) === 'string') {
        data[0] = `${chalk.bold(this.name)}: ` + data[0];
        console.log(...data);
      } else {
        console.log(`${chalk.bold(this.name)}:`, ...data);
      }
    }
  }

  /**
   * Every archiver must implement doArchive(); that's just the law.
   */
  abstract doArchive(): Promise<ResultType>;
}
