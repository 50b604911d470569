#!/usr/bin/env node
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fetchMailboxSnapshot } from '../src/core/snapshot';
import { getAuthClient } from '../src/gmail/auth';
import { GmailApiClient } from '../src/gmail/client';
import { CredentialsError, requiresReconsent } from '../src/gmail/errors';
import { FetchTransport } from '../src/gmail/transport';
import { isValidTimeZone, loadConfig } from '../src/lib/config';
import { formatOutput } from '../src/lib/format';

async function main(): Promise<void> {
  const cfg = loadConfig();

  const argv = await yargs(hideBin(process.argv))
    .option('limit', {
      type: 'number',
      default: cfg.messageLimit,
      description: 'Number of most recent messages to fetch',
    })
    .option('timezone', {
      type: 'string',
      default: cfg.timeZone,
      description: 'IANA time zone for message timestamps, or "local"',
    })
    .option('json', {
      type: 'boolean',
      default: false,
      description: 'Print the raw snapshot as JSON',
    })
    .option('reauth', {
      type: 'boolean',
      default: false,
      description: 'Force re-authorization by deleting the saved token',
    })
    .check(args => {
      if (!Number.isInteger(args.limit) || args.limit < 1) {
        throw new Error('--limit must be a positive integer');
      }
      if (!isValidTimeZone(args.timezone)) {
        throw new Error(`--timezone: unknown time zone "${args.timezone}"`);
      }
      return true;
    })
    .strict()
    .parse();

  const auth = await getAuthClient({
    credentialsPath: cfg.credentialsPath,
    tokenPath: cfg.tokenPath,
    scopes: cfg.scopes,
    reauth: argv.reauth,
  });

  const transport = new FetchTransport(auth, {
    baseUrl: cfg.apiBaseUrl,
    timeoutMs: cfg.requestTimeoutMs,
  });
  const client = new GmailApiClient(transport, { userId: cfg.userId });

  console.log('🚀 Fetching Gmail data asynchronously...');
  const started = performance.now();

  const result = await fetchMailboxSnapshot(client, {
    messageLimit: argv.limit,
    timeZone: argv.timezone,
  });

  const seconds = (performance.now() - started) / 1000;
  console.log(`✅ Data fetched in ${seconds.toFixed(2)} seconds`);

  if (argv.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log('\n' + formatOutput(result));
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (requiresReconsent(error)) {
      console.error('❌ Auth requires re-consent. Re-run with --reauth.');
    } else if (error instanceof CredentialsError) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('❌ An error occurred:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  });
}
