import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createSettingsTemplate, loadAppConfig, loadGmailConfig } from '../config/app';

const baseEnv = {
  TELEGRAM_BOT_TOKEN: 'test-secret',
  CHAT_ID: '12345',
  NOTION_API_TOKEN: 'test-secret',
  NOTION_DB_ID: 'test-database',
};

describe('loadAppConfig', () => {
  let dir: string;
  let settingsPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'alert-relay-'));
    settingsPath = path.join(dir, 'settings.json');
  });

  afterEach(() => {
    fs.removeSync(dir);
    vi.restoreAllMocks();
  });

  it('fills in defaults', () => {
    const config = loadAppConfig({ env: baseEnv, settingsPath });

    expect(config.telegram).toEqual({ botToken: 'test-secret', chatId: '12345' });
    expect(config.notion).toEqual({
      token: 'test-secret',
      databaseId: 'test-database',
      titleProperty: 'Expense Record',
      amountProperty: 'Amount',
      dateProperty: 'Date',
      recordLimit: 20,
    });
    expect(config.gmail).toEqual({
      credentialsPath: path.resolve('credentials.json'),
      tokenPath: path.resolve('token.json'),
      newerThan: '2d',
      olderThan: '0d',
      senders: ['paylah.alert@dbs.com', 'ibanking.alert@dbs.com'],
      subjectFilters: ['card transaction alert', 'alerts'],
    });
    expect(config.dedupeWithinRun).toBe(false);
  });

  it('requires the chat and store credentials', () => {
    const { CHAT_ID: _chatId, ...env } = baseEnv;
    expect(() => loadAppConfig({ env, settingsPath })).toThrow('CHAT_ID is required');
  });

  it('rejects a record limit that is not a positive number', () => {
    expect(() => loadAppConfig({ env: { ...baseEnv, NOTION_RECORD_LIMIT: 'abc' }, settingsPath }))
      .toThrow('invalid NOTION_RECORD_LIMIT: abc');
  });

  it('reads flags and lists from the environment', () => {
    const config = loadAppConfig({
      env: { ...baseEnv, DEDUPE_WITHIN_RUN: 'true', ALERT_SENDERS: ' a@bank.test , b@bank.test ,', NOTION_RECORD_LIMIT: '5' },
      settingsPath,
    });
    expect(config.dedupeWithinRun).toBe(true);
    expect(config.gmail.senders).toEqual(['a@bank.test', 'b@bank.test']);
    expect(config.notion.recordLimit).toBe(5);
  });

  it('lets settings.json override the environment', () => {
    fs.writeJsonSync(settingsPath, { CHAT_ID: 999, ALERT_SUBJECTS: ['alerts'], DEDUPE_WITHIN_RUN: true });

    const config = loadAppConfig({ env: baseEnv, settingsPath });
    expect(config.telegram.chatId).toBe('999');
    expect(config.gmail.subjectFilters).toEqual(['alerts']);
    expect(config.dedupeWithinRun).toBe(true);
  });

  it('rejects a settings file that is not an object', () => {
    fs.writeJsonSync(settingsPath, ['nope']);
    expect(() => loadAppConfig({ env: baseEnv, settingsPath })).toThrow('must contain a JSON object');
  });

  it('loads Gmail settings without the other credentials', () => {
    const gmail = loadGmailConfig({ env: { MAIL_NEWER_THAN: '12h' }, settingsPath });
    expect(gmail.newerThan).toBe('12h');
    expect(gmail.tokenPath).toBe(path.resolve('token.json'));
  });

  it('writes a template once and leaves an existing file alone', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createSettingsTemplate(settingsPath);
    const template: unknown = fs.readJsonSync(settingsPath);
    expect(template).toMatchObject({ NOTION_RECORD_LIMIT: 20, MAIL_NEWER_THAN: '2d' });

    fs.writeJsonSync(settingsPath, { CHAT_ID: 'kept' });
    createSettingsTemplate(settingsPath);
    expect(fs.readJsonSync(settingsPath)).toEqual({ CHAT_ID: 'kept' });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
