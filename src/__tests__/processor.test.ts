import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { decide, processMessages } from '../dispatch/processor';
import { createKnownRecordSet, EMPTY_KNOWN_RECORDS } from '../dispatch/dedup';
import { KnownRecordSet, Notifier, ParsedTransaction, RawMessage, RecordStore } from '../types';
import { CARD_HTML, PAYMENT_HTML, RECEIVED_HTML, UNRELATED_HTML } from './fixtures';

const now = new Date(2026, 2, 15, 9, 0);

class FakeNotifier implements Notifier {
  sent: string[] = [];
  failuresLeft = 0;

  async sendMessage(text: string): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('chat unavailable');
    }
    this.sent.push(text);
  }
}

interface StoredRow {
  name: string;
  amount: number | null;
  date: string;
}

class FakeStore implements RecordStore {
  rows: StoredRow[] = [];

  async loadKnownRecords(): Promise<KnownRecordSet> {
    return EMPTY_KNOWN_RECORDS;
  }

  async appendRecord(name: string, amount: number | null, date: string): Promise<string> {
    this.rows.push({ name, amount, date });
    return `row-${this.rows.length}`;
  }
}

function message(id: string, html: string): RawMessage {
  return { id, threadId: id, subject: 'Alerts', from: 'alerts@bank.test', date: new Date(0), html };
}

function payment(overrides: Partial<ParsedTransaction> = {}): ParsedTransaction {
  return {
    kind: 'payment',
    dateTime: '26 Sep 2025 11:56',
    amountRaw: 'SGD 25.00',
    amountNum: 25,
    counterparty: 'NTUC FAIRPRICE',
    counterpartyConfidence: 'high',
    ...overrides,
  };
}

describe('decide', () => {
  const known = createKnownRecordSet({
    dates: ['2025-09-26'],
    amounts: [25],
    names: ['NTUC FAIRPRICE'],
  });

  it('skips a payment whose fields are all known', () => {
    const decision = decide(payment(), known, now);
    expect(decision.canonicalDate).toBe('2025-09-26');
    expect(decision.isNew).toBe(false);
    expect(decision.persist).toBe(false);
  });

  it('persists a payment with one unseen field', () => {
    expect(decide(payment({ amountNum: 30, amountRaw: 'SGD 30.00' }), known, now).persist).toBe(true);
    expect(decide(payment({ amountNum: null }), known, now).persist).toBe(true);
  });

  it('never persists income', () => {
    const decision = decide(payment({ kind: 'income', counterparty: 'JOHN TAN' }), EMPTY_KNOWN_RECORDS, now);
    expect(decision.canonicalDate).toBeNull();
    expect(decision.persist).toBe(false);
    expect(decision.notification).toBe('⬆️ New INCOME:\n🗓️DATE: 26 Sep 2025 11:56\n💰AMOUNT: SGD 25.00\nPAYEE: JOHN TAN');
  });

  it('notifies but does not persist a record with an unparseable date', () => {
    const decision = decide(payment({ dateTime: 'yesterday' }), EMPTY_KNOWN_RECORDS, now);
    expect(decision.canonicalDate).toBe('');
    expect(decision.isNew).toBe(true);
    expect(decision.persist).toBe(false);
  });

  it('renders absent fields as N/A', () => {
    const decision = decide(payment({ kind: 'card', amountRaw: null, counterparty: null }), known, now);
    expect(decision.notification).toBe('💳️ New expense:\n🗓️DATE: 26 Sep 2025 11:56\n💵AMOUNT: N/A\n🧍RECIPIENT: N/A');
  });
});

describe('processMessages', () => {
  let notifier: FakeNotifier;
  let store: FakeStore;

  beforeEach(() => {
    notifier = new FakeNotifier();
    store = new FakeStore();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('notifies and saves a new payment', async () => {
    const known = createKnownRecordSet({
      dates: ['2025-09-24'],
      amounts: [25],
      names: ['NTUC FAIRPRICE'],
    });

    const summary = await processMessages([message('m1', PAYMENT_HTML)], known, { notifier, store }, { now });

    expect(notifier.sent).toEqual([
      '⬇️ New expense:\n🗓️DATE: 26 Sep 2025 11:56\n💵AMOUNT: SGD 25.00\n🧍RECIPIENT: NTUC FAIRPRICE',
    ]);
    expect(store.rows).toEqual([{ name: 'NTUC FAIRPRICE', amount: 25, date: '2025-09-26' }]);
    expect(summary.persisted).toBe(1);
  });

  it('handles every template and skips unrelated messages', async () => {
    const messages = [
      message('m1', PAYMENT_HTML),
      message('m2', RECEIVED_HTML),
      message('m3', CARD_HTML),
      message('m4', UNRELATED_HTML),
    ];

    const summary = await processMessages(messages, EMPTY_KNOWN_RECORDS, { notifier, store }, { now });

    expect(summary).toEqual({
      fetched: 4,
      matched: 3,
      skipped: 1,
      notified: 3,
      persisted: 2,
      unresolvedDates: 0,
      failures: 0,
      byKind: { payment: 1, income: 1, card: 1 },
    });
    expect(store.rows).toEqual([
      { name: 'NTUC FAIRPRICE', amount: 25, date: '2025-09-26' },
      { name: 'GRAB*RIDES', amount: 12.3, date: '2026-09-26' },
    ]);
    expect(notifier.sent[1]).toBe('⬆️ New INCOME:\n🗓️DATE: 24 Sep 2025 18:09 SGT\n💰AMOUNT: SGD 1,250.00\nPAYEE: JOHN TAN');
  });

  it('saves duplicates within one run unless asked to dedupe them', async () => {
    const messages = [message('m1', PAYMENT_HTML), message('m2', PAYMENT_HTML)];

    await processMessages(messages, EMPTY_KNOWN_RECORDS, { notifier, store }, { now });
    expect(store.rows).toHaveLength(2);

    const deduped = new FakeStore();
    const summary = await processMessages(messages, EMPTY_KNOWN_RECORDS, { notifier, store: deduped }, {
      now,
      dedupeWithinRun: true,
    });
    expect(deduped.rows).toHaveLength(1);
    expect(summary.notified).toBe(2);
    expect(EMPTY_KNOWN_RECORDS.dates).toHaveLength(0);
  });

  it('counts records whose date cannot be normalized', async () => {
    const html = '<table><tr><td>Date &amp; Time:</td><td>yesterday</td></tr><tr><td>To:</td><td>BAKERY</td></tr></table>';

    const summary = await processMessages([message('m1', html)], EMPTY_KNOWN_RECORDS, { notifier, store }, { now });

    expect(summary.unresolvedDates).toBe(1);
    expect(summary.notified).toBe(1);
    expect(store.rows).toEqual([]);
  });

  it('saves new records even when the chat message fails', async () => {
    notifier.failuresLeft = 1;

    const summary = await processMessages(
      [message('m1', PAYMENT_HTML), message('m2', CARD_HTML)],
      EMPTY_KNOWN_RECORDS,
      { notifier, store },
      { now }
    );

    expect(summary.failures).toBe(1);
    expect(summary.notified).toBe(1);
    expect(summary.persisted).toBe(2);
    expect(store.rows).toEqual([
      { name: 'NTUC FAIRPRICE', amount: 25, date: '2025-09-26' },
      { name: 'GRAB*RIDES', amount: 12.3, date: '2026-09-26' },
    ]);
  });

  it('keeps going after a failed save', async () => {
    const failing: RecordStore = {
      loadKnownRecords: async () => EMPTY_KNOWN_RECORDS,
      appendRecord: async () => {
        throw new Error('database unavailable');
      },
    };

    const summary = await processMessages(
      [message('m1', PAYMENT_HTML), message('m2', CARD_HTML)],
      EMPTY_KNOWN_RECORDS,
      { notifier, store: failing },
      { now }
    );

    expect(summary.failures).toBe(2);
    expect(summary.notified).toBe(2);
    expect(summary.persisted).toBe(0);
  });

  it('has no side effects in a dry run', async () => {
    const summary = await processMessages([message('m1', PAYMENT_HTML)], EMPTY_KNOWN_RECORDS, { notifier, store }, {
      now,
      dryRun: true,
    });

    expect(summary.matched).toBe(1);
    expect(summary.notified).toBe(0);
    expect(notifier.sent).toEqual([]);
    expect(store.rows).toEqual([]);
  });
});
