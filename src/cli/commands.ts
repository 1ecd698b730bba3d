import fs from 'fs-extra';
import { GmailClient } from '../gmail/client';
import { reauthorize } from '../gmail/auth';
import { buildMailQueries } from '../gmail/query';
import { AppConfig, createSettingsTemplate, loadAppConfig, loadGmailConfig } from '../config/app';
import { NotionRecordStore } from '../notion/store';
import { TelegramNotifier } from '../telegram/notifier';
import { processMessages } from '../dispatch/processor';
import { normalizeDate } from '../parsers/date';
import { parserRegistry } from '../parsers/registry';
import { EMPTY_KNOWN_RECORDS } from '../dispatch/dedup';
import { KnownRecordSet, Notifier, RawMessage, RecordStore } from '../types';
import { classifyError, formatError } from '../utils/errors';
import { printRunSummary } from '../utils/notifications';

interface FetchOptions {
  newerThan?: string;
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadAppConfig();
  } catch (error) {
    console.error('Failed to load configuration:', formatError(classifyError(error)));
    console.log('\nRun "npm start setup" to create settings.json, or set the variables in .env');
    process.exit(1);
  }
}

async function fetchAlerts(config: AppConfig, options: FetchOptions): Promise<RawMessage[]> {
  const gmail = new GmailClient(config.gmail);
  const queries = buildMailQueries({
    ...config.gmail,
    newerThan: options.newerThan ?? config.gmail.newerThan,
  });

  // Results are concatenated in query order; a message matching both queries is handled twice
  const messages: RawMessage[] = [];
  for (const query of queries) {
    console.log(`Searching for emails with query: ${query}`);
    const found = await gmail.listMessages(query);
    console.log(`Found ${found.length} messages.`);
    messages.push(...found);
  }
  return messages;
}

export async function sync(options: FetchOptions = {}) {
  const config = loadConfigOrExit();
  const store: RecordStore = new NotionRecordStore(config.notion);
  const notifier: Notifier = new TelegramNotifier(config.telegram);

  let known: KnownRecordSet;
  let messages: RawMessage[];
  try {
    known = await store.loadKnownRecords(config.notion.recordLimit);
    messages = await fetchAlerts(config, options);
  } catch (error) {
    console.error('Failed to start sync:', formatError(classifyError(error)));
    process.exit(1);
  }

  console.log(`OK. Messages fetched: ${messages.length}`);

  const summary = await processMessages(messages, known, { notifier, store }, {
    dedupeWithinRun: config.dedupeWithinRun,
  });

  printRunSummary(summary, 'Sync complete.');
  if (summary.failures > 0) {
    process.exitCode = 1;
  }
}

export async function dryRun(options: FetchOptions & { offline?: boolean } = {}) {
  const config = loadConfigOrExit();
  const store = new NotionRecordStore(config.notion);

  let known: KnownRecordSet = EMPTY_KNOWN_RECORDS;
  let messages: RawMessage[];
  try {
    if (!options.offline) {
      known = await store.loadKnownRecords(config.notion.recordLimit);
    }
    messages = await fetchAlerts(config, options);
  } catch (error) {
    console.error('Failed to start dry run:', formatError(classifyError(error)));
    process.exit(1);
  }

  const readOnly: Notifier = {
    sendMessage: async () => {
      throw new Error('dry run must not send messages');
    },
  };

  console.log(`[Dry Run] ${messages.length} messages`);
  const summary = await processMessages(messages, known, { notifier: readOnly, store }, {
    dryRun: true,
    dedupeWithinRun: config.dedupeWithinRun,
  });
  printRunSummary(summary, '[Dry Run] complete.');
}

export async function parseFile(file: string) {
  let html: string;
  try {
    html = await fs.readFile(file, 'utf-8');
  } catch (error) {
    console.error(`Failed to read ${file}:`, formatError(classifyError(error)));
    process.exitCode = 1;
    return;
  }

  const match = parserRegistry.classify(html);
  if (!match) {
    console.log(`[SKIP] No template matched ${file}`);
    return;
  }

  const { parser, transaction } = match;
  console.log(`[MATCH] ${parser.name} (${transaction.kind})`);
  console.log(JSON.stringify(transaction, null, 2));
  if (transaction.kind !== 'income') {
    console.log(`Canonical date: ${normalizeDate(transaction.dateTime) || '(unparseable)'}`);
  }
}

export async function setup() {
  createSettingsTemplate();
}

export async function reauth() {
  try {
    await reauthorize(loadGmailConfig());
  } catch (error) {
    console.error('Failed to authorize Gmail:', formatError(classifyError(error)));
    process.exitCode = 1;
  }
}
