import { KnownRecordSet } from '../types';

export const EMPTY_KNOWN_RECORDS: KnownRecordSet = Object.freeze({
  dates: Object.freeze([]),
  amounts: Object.freeze([]),
  names: Object.freeze([]),
});

export function createKnownRecordSet(values: Partial<KnownRecordSet> = {}): KnownRecordSet {
  return Object.freeze({
    dates: Object.freeze([...(values.dates ?? [])]),
    amounts: Object.freeze([...(values.amounts ?? [])]),
    names: Object.freeze([...(values.names ?? [])]),
  });
}

export interface RecordKey {
  date: string;
  amount: number | null;
  name: string | null;
}

/**
 * A record is new when ANY of its fields is unseen. An absent amount or name
 * counts as unseen.
 */
export function isNewRecord(known: KnownRecordSet, key: RecordKey): boolean {
  return (
    !known.dates.includes(key.date) ||
    key.amount === null ||
    !known.amounts.includes(key.amount) ||
    key.name === null ||
    !known.names.includes(key.name)
  );
}

/**
 * A new set with the record's values appended; the original is left untouched
 */
export function withRecord(known: KnownRecordSet, key: RecordKey): KnownRecordSet {
  return createKnownRecordSet({
    dates: [...known.dates, key.date],
    amounts: key.amount === null ? known.amounts : [...known.amounts, key.amount],
    names: key.name === null ? known.names : [...known.names, key.name],
  });
}
