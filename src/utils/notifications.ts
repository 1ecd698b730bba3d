import { ParsedTransaction } from '../types';

export interface RunSummary {
  fetched: number;
  matched: number;
  skipped: number; // no template populated a record
  notified: number;
  persisted: number;
  unresolvedDates: number;
  failures: number;
  byKind: Record<ParsedTransaction['kind'], number>;
}

export function emptyRunSummary(): RunSummary {
  return {
    fetched: 0,
    matched: 0,
    skipped: 0,
    notified: 0,
    persisted: 0,
    unresolvedDates: 0,
    failures: 0,
    byKind: { payment: 0, income: 0, card: 0 },
  };
}

function display(value: string | null): string {
  return value || 'N/A';
}

/**
 * Chat message announcing a parsed transaction
 */
export function formatTransactionMessage(transaction: ParsedTransaction): string {
  const date = display(transaction.dateTime);
  const amount = display(transaction.amountRaw);
  const counterparty = display(transaction.counterparty);

  switch (transaction.kind) {
    case 'payment':
      return `⬇️ New expense:\n🗓️DATE: ${date}\n💵AMOUNT: ${amount}\n🧍RECIPIENT: ${counterparty}`;
    case 'income':
      return `⬆️ New INCOME:\n🗓️DATE: ${date}\n💰AMOUNT: ${amount}\nPAYEE: ${counterparty}`;
    case 'card':
      return `💳️ New expense:\n🗓️DATE: ${date}\n💵AMOUNT: ${amount}\n🧍RECIPIENT: ${counterparty}`;
  }
}

export function printRunSummary(summary: RunSummary, label = 'Run complete.') {
  console.log(label);
  console.log(`  Messages fetched: ${summary.fetched}`);
  console.log(`  Matched: ${summary.matched} (payment ${summary.byKind.payment}, income ${summary.byKind.income}, card ${summary.byKind.card})`);
  console.log(`  Skipped (no template): ${summary.skipped}`);
  console.log(`  Notified: ${summary.notified}`);
  console.log(`  New records saved: ${summary.persisted}`);
  if (summary.unresolvedDates > 0) {
    console.log(`  Unparseable dates (not saved): ${summary.unresolvedDates}`);
  }
  if (summary.failures > 0) {
    console.log(`  Failures: ${summary.failures}`);
  }
}
