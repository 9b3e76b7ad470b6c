#!/usr/bin/env node
import 'dotenv/config';
import { Writable } from 'node:stream';
import { createInterface } from 'node:readline/promises';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  ArchiveAbortedError,
  FileSessionStore,
  Filestore,
  InstagramClient,
  InstagramFeed,
  SessionPolicy,
  loadConfig,
  type CredentialPrompt,
  type TwoFactorChallenge,
} from './index.js';

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Reads a line from the terminal; with `hidden` set, keystrokes aren't echoed.
 */
async function ask(question: string, hidden = false): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) process.stdout.write(chunk, encoding);
      callback();
    }
  });

  const rl = createInterface({ input: process.stdin, output, terminal: true });
  try {
    const answer = rl.question(question);
    muted = hidden;
    return (await answer).trim();
  } finally {
    rl.close();
    if (hidden) process.stdout.write('\n');
  }
}

class TerminalPrompt implements CredentialPrompt {
  constructor(protected password?: string) {}

  async credentials(suggestedUsername?: string) {
    const username = suggestedUsername || await ask('Username: ');
    const password = this.password ?? await ask(`Password for @${username}: `, true);
    return { username, password };
  }

  async verificationCode(challenge: TwoFactorChallenge, attempt: number) {
    if (attempt === 1) {
      console.log(chalk.bold('Two-factor authentication required.'));
      console.log(challenge.method === 'totp'
        ? 'Use the code from your authentication app.'
        : 'Instagram sent a code by SMS.');
    }
    return ask('Enter the 6-digit verification code: ');
  }
}

const config = loadConfig();
const program = new Command();

program
  .name('feed-archive')
  .description('Save posts from your Instagram home timeline to a JSON file')
  .option('-n, --amount <count>', 'number of posts to fetch', positiveInt, config.amount)
  .option('--max-pages <count>', 'most timeline requests to make', positiveInt, config.maxPages)
  .option('-c, --comments [limit]', 'fetch comments for each post', positiveInt)
  .option('-m, --media', 'download photos and videos', false)
  .option('--skip-sponsored', 'leave out paid partnerships', false)
  .option('--no-skip-archived', 'keep posts that earlier runs already saved')
  .option('--chronological', 'sort posts newest first', false)
  .option('--concurrency <count>', 'posts to enrich in parallel', positiveInt, config.concurrency)
  .option('-u, --username <name>', 'account to log in as', config.username)
  .option('--base <dir>', 'directory for the session cache and output', config.base);

program.parse();

const opts = program.opts<{
  amount: number,
  maxPages: number,
  comments?: number | true,
  media: boolean,
  skipSponsored: boolean,
  skipArchived: boolean,
  chronological: boolean,
  concurrency: number,
  username?: string,
  base?: string,
}>();

const files = new Filestore({ base: opts.base });
const client = new InstagramClient();
const log = (...data: unknown[]) => console.log(...data);

try {
  const policy = new SessionPolicy({
    client,
    store: new FileSessionStore(files),
    prompt: new TerminalPrompt(config.password),
    username: opts.username,
    log,
  });
  const session = await policy.open();

  const archive = new InstagramFeed(session.client, {
    files,
    amount: opts.amount,
    maxPages: opts.maxPages,
    delay: config.delay,
    comments: opts.comments === true ? config.commentLimit : opts.comments ?? false,
    media: opts.media,
    skipSponsored: opts.skipSponsored,
    skipArchived: opts.skipArchived,
    chronological: opts.chronological,
    concurrency: opts.concurrency,
    timeout: config.timeout,
  });
  await archive.doArchive();
} catch (err: unknown) {
  if (err instanceof ArchiveAbortedError) {
    const p = err.progress;
    console.error(chalk.red(`Stopped: ${err.cause instanceof Error ? err.cause.message : err.message}`));
    console.error(`Collected ${p.collected} posts, processed ${p.processed}, downloaded ${p.filesDownloaded} files; nothing was saved for this run.`);
  } else {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  }
  process.exitCode = 1;
}
