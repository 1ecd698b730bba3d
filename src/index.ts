export * from './types';
export * from './utils/text';
export * from './utils/errors';
export * from './parsers/amount';
export * from './parsers/date';
export * from './parsers/paylah';
export * from './parsers/received';
export * from './parsers/card';
export * from './parsers/registry';
export * from './dispatch/dedup';
export * from './dispatch/processor';
export * from './gmail/client';
export * from './gmail/query';
export * from './notion/store';
export * from './telegram/notifier';
export {
  formatTransactionMessage,
  type RunSummary,
} from './utils/notifications';
export {
  loadAppConfig,
  loadGmailConfig,
  createSettingsTemplate,
  type AppConfig,
  type GmailConfig,
  type NotionConfig,
  type TelegramConfig,
} from './config/app';
