import { KnownRecordSet, Notifier, ParsedTransaction, RawMessage, RecordStore } from '../types';
import { normalizeDate, UNPARSEABLE_DATE } from '../parsers/date';
import { ParserRegistry, parserRegistry } from '../parsers/registry';
import { classifyError, formatError } from '../utils/errors';
import { RunSummary, emptyRunSummary, formatTransactionMessage } from '../utils/notifications';
import { isNewRecord, withRecord } from './dedup';

export interface DispatchDecision {
  transaction: ParsedTransaction;
  canonicalDate: string | null; // null for kinds that are not tracked
  isNew: boolean;
  persist: boolean;
  notification: string;
}

export interface ProcessOptions {
  // Records saved earlier in the run count as known for later messages
  dedupeWithinRun?: boolean;
  // Log decisions only, no notifications or writes
  dryRun?: boolean;
  now?: Date;
  registry?: ParserRegistry;
}

export interface RunCollaborators {
  notifier: Notifier;
  store: RecordStore;
}

/**
 * Decide whether a parsed transaction is new and what to announce.
 * Only payment and card records are tracked in the store.
 */
export function decide(
  transaction: ParsedTransaction,
  known: KnownRecordSet,
  now: Date = new Date()
): DispatchDecision {
  const notification = formatTransactionMessage(transaction);

  if (transaction.kind === 'income') {
    return { transaction, canonicalDate: null, isNew: false, persist: false, notification };
  }

  const canonicalDate = normalizeDate(transaction.dateTime, now);
  const isNew = isNewRecord(known, {
    date: canonicalDate,
    amount: transaction.amountNum,
    name: transaction.counterparty,
  });

  return {
    transaction,
    canonicalDate,
    isNew,
    persist: isNew && canonicalDate !== UNPARSEABLE_DATE,
    notification,
  };
}

/**
 * Run every message through the templates in fetch order, announce each
 * populated record and save the new ones.
 */
export async function processMessages(
  messages: RawMessage[],
  known: KnownRecordSet,
  collaborators: RunCollaborators,
  options: ProcessOptions = {}
): Promise<RunSummary> {
  const registry = options.registry ?? parserRegistry;
  const summary = emptyRunSummary();
  let view = known;

  for (const message of messages) {
    summary.fetched++;

    const match = registry.classify(message.html);
    if (!match) {
      summary.skipped++;
      continue;
    }

    summary.matched++;
    summary.byKind[match.transaction.kind]++;

    const decision = decide(match.transaction, view, options.now);
    const { transaction, canonicalDate } = decision;

    if (canonicalDate === UNPARSEABLE_DATE) {
      summary.unresolvedDates++;
      console.warn(`${match.parser.name}: could not normalize date "${transaction.dateTime}" (message ${message.id}), record will not be saved`);
    }

    if (options.dryRun) {
      const status = decision.persist ? 'NEW' : decision.canonicalDate === null ? 'NOTIFY' : 'KNOWN';
      console.log(`[${status}] ${match.parser.name}: ${canonicalDate ?? transaction.dateTime} - ${transaction.counterparty ?? 'N/A'} - ${transaction.amountRaw ?? 'N/A'}`);
      continue;
    }

    const context = { messageId: message.id, kind: transaction.kind, counterparty: transaction.counterparty };

    // Delivery and saving fail independently; a lost chat message does not drop the record
    try {
      await collaborators.notifier.sendMessage(decision.notification);
      summary.notified++;
    } catch (error) {
      console.error(`Failed to notify message ${message.id}:`, formatError(classifyError(error, context)));
      summary.failures++;
    }

    if (decision.persist && canonicalDate) {
      const key = { date: canonicalDate, amount: transaction.amountNum, name: transaction.counterparty };
      try {
        const recordId = await collaborators.store.appendRecord(key.name ?? '', key.amount, key.date);
        summary.persisted++;
        console.log(`Saved ${transaction.kind} record ${recordId}: ${key.date} ${key.name ?? ''} ${key.amount ?? ''}`);

        if (options.dedupeWithinRun) {
          view = withRecord(view, key);
        }
      } catch (error) {
        console.error(`Failed to save message ${message.id}:`, formatError(classifyError(error, context)));
        summary.failures++;
      }
    }
  }

  return summary;
}
