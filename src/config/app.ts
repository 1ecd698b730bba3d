import fs from 'fs-extra';
import path from 'path';

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface NotionConfig {
  token: string;
  databaseId: string;
  titleProperty: string;
  amountProperty: string;
  dateProperty: string;
  recordLimit: number;
}

export interface GmailConfig {
  credentialsPath: string;
  tokenPath: string;
  newerThan: string;
  olderThan: string;
  senders: string[];
  subjectFilters: string[]; // one search query per entry
}

export interface AppConfig {
  telegram: TelegramConfig;
  notion: NotionConfig;
  gmail: GmailConfig;
  dedupeWithinRun: boolean;
}

export const SETTINGS_PATH = path.join(process.cwd(), 'settings.json');

const DEFAULT_SENDERS = 'paylah.alert@dbs.com,ibanking.alert@dbs.com';
const DEFAULT_SUBJECTS = 'card transaction alert,alerts';

type Settings = Record<string, string | undefined>;

/**
 * Read settings.json as a flat map of setting name to value
 */
function readSettingsFile(settingsPath: string): Settings {
  if (!fs.existsSync(settingsPath)) return {};

  const raw: unknown = fs.readJsonSync(settingsPath);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`settings.json at ${settingsPath} must contain a JSON object`);
  }

  const settings: Settings = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      settings[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      settings[key] = String(value);
    } else if (Array.isArray(value)) {
      settings[key] = value.filter((item): item is string => typeof item === 'string').join(',');
    }
  }
  return settings;
}

function required(settings: Settings, key: string): string {
  const value = settings[key]?.trim();
  if (!value) {
    throw new Error(`${key} is required (set it in .env or settings.json)`);
  }
  return value;
}

function list(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

function positiveInt(settings: Settings, key: string, fallback: number): number {
  const raw = settings[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`invalid ${key}: ${raw}`);
  }
  return parsed;
}

function flag(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

interface LoadOptions {
  env?: NodeJS.ProcessEnv;
  settingsPath?: string;
}

function readSettings(options: LoadOptions): Settings {
  const env = options.env ?? process.env;
  return { ...env, ...readSettingsFile(options.settingsPath ?? SETTINGS_PATH) };
}

function gmailConfigFrom(settings: Settings): GmailConfig {
  return {
    credentialsPath: path.resolve(settings.GMAIL_CREDENTIALS_PATH || 'credentials.json'),
    tokenPath: path.resolve(settings.GMAIL_TOKEN_PATH || 'token.json'),
    newerThan: settings.MAIL_NEWER_THAN || '2d',
    olderThan: settings.MAIL_OLDER_THAN || '0d',
    senders: list(settings.ALERT_SENDERS || DEFAULT_SENDERS),
    subjectFilters: list(settings.ALERT_SUBJECTS || DEFAULT_SUBJECTS),
  };
}

/**
 * Gmail settings only (used by reauth, which needs no Telegram or Notion keys)
 */
export function loadGmailConfig(options: LoadOptions = {}): GmailConfig {
  return gmailConfigFrom(readSettings(options));
}

/**
 * Load configuration. Priority: settings.json > environment variables > defaults
 */
export function loadAppConfig(options: LoadOptions = {}): AppConfig {
  const settings = readSettings(options);

  return {
    telegram: {
      botToken: required(settings, 'TELEGRAM_BOT_TOKEN'),
      chatId: required(settings, 'CHAT_ID'),
    },
    notion: {
      token: required(settings, 'NOTION_API_TOKEN'),
      databaseId: required(settings, 'NOTION_DB_ID'),
      titleProperty: settings.NOTION_TITLE_PROPERTY || 'Expense Record',
      amountProperty: settings.NOTION_AMOUNT_PROPERTY || 'Amount',
      dateProperty: settings.NOTION_DATE_PROPERTY || 'Date',
      recordLimit: positiveInt(settings, 'NOTION_RECORD_LIMIT', 20),
    },
    gmail: gmailConfigFrom(settings),
    dedupeWithinRun: flag(settings.DEDUPE_WITHIN_RUN),
  };
}

/**
 * Create a template settings.json config file
 */
export function createSettingsTemplate(settingsPath: string = SETTINGS_PATH): void {
  if (fs.existsSync(settingsPath)) {
    console.warn(`${settingsPath} already exists, leaving it untouched.`);
    return;
  }

  const template = {
    TELEGRAM_BOT_TOKEN: 'YOUR_TELEGRAM_BOT_TOKEN',
    CHAT_ID: 'YOUR_CHAT_ID',
    NOTION_API_TOKEN: 'YOUR_NOTION_INTEGRATION_TOKEN',
    NOTION_DB_ID: 'YOUR_NOTION_DATABASE_ID',
    NOTION_TITLE_PROPERTY: 'Expense Record',
    NOTION_AMOUNT_PROPERTY: 'Amount',
    NOTION_DATE_PROPERTY: 'Date',
    NOTION_RECORD_LIMIT: 20,
    GMAIL_CREDENTIALS_PATH: 'credentials.json',
    GMAIL_TOKEN_PATH: 'token.json',
    MAIL_NEWER_THAN: '2d',
    MAIL_OLDER_THAN: '0d',
    ALERT_SENDERS: list(DEFAULT_SENDERS),
    ALERT_SUBJECTS: list(DEFAULT_SUBJECTS),
    DEDUPE_WITHIN_RUN: false,
  };

  fs.writeJsonSync(settingsPath, template, { spaces: 2 });
  console.log(`Created template config at ${settingsPath}`);
  console.log('Please update it with your Telegram, Notion and Gmail settings.');
}
