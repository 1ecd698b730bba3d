import { GmailConfig } from '../config/app';

/**
 * One Gmail search per subject filter, e.g.
 * `newer_than:2d older_than:0d from:(a@bank.com OR b@bank.com) subject:(alerts)`
 */
export function buildMailQueries(config: Pick<GmailConfig, 'newerThan' | 'olderThan' | 'senders' | 'subjectFilters'>): string[] {
  const window = `newer_than:${config.newerThan} older_than:${config.olderThan}`;
  const senders = config.senders.length > 0 ? `from:(${config.senders.join(' OR ')})` : '';

  return config.subjectFilters.map(subject =>
    [window, senders, `subject:(${subject})`].filter(Boolean).join(' ')
  );
}
