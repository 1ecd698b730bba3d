import { describe, it, expect } from 'vitest';
import { buildMailQueries } from '../gmail/query';

describe('buildMailQueries', () => {
  it('builds one query per subject filter', () => {
    expect(buildMailQueries({
      newerThan: '2d',
      olderThan: '0d',
      senders: ['paylah.alert@dbs.com', 'ibanking.alert@dbs.com'],
      subjectFilters: ['card transaction alert', 'alerts'],
    })).toEqual([
      'newer_than:2d older_than:0d from:(paylah.alert@dbs.com OR ibanking.alert@dbs.com) subject:(card transaction alert)',
      'newer_than:2d older_than:0d from:(paylah.alert@dbs.com OR ibanking.alert@dbs.com) subject:(alerts)',
    ]);
  });

  it('omits the sender clause when no senders are configured', () => {
    expect(buildMailQueries({
      newerThan: '7d',
      olderThan: '0d',
      senders: [],
      subjectFilters: ['alerts'],
    })).toEqual(['newer_than:7d older_than:0d subject:(alerts)']);
  });
});
