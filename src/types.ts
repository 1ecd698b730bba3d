export type TransactionKind = 'payment' | 'income' | 'card';

export interface RawMessage {
  id: string;
  threadId: string;
  subject: string;
  from: string;
  date: Date;
  html: string; // decoded HTML body
}

// Template-specific extractor results. Every key is always present; null means
// the template did not yield that field.

export interface PaylahFields {
  dateTime: string | null;
  amount: string | null;
  amountNum: number | null;
  to: string | null;
}

export interface AmountReceivedFields {
  amountRaw: string | null;
  amount: number | null;
  dateTime: string | null;
  from: string | null;
  to: string | null;
}

export type CounterpartySource = 'structure' | 'pattern';

export interface CardTransactionFields {
  dateTime: string | null;
  amountRaw: string | null;
  amount: number | null;
  to: string | null;
  toSource: CounterpartySource | null;
}

export interface ParsedTransaction {
  kind: TransactionKind;
  dateTime: string;
  amountRaw: string | null;
  amountNum: number | null;
  counterparty: string | null; // recipient for payment/card, payer for income
  counterpartyConfidence: 'high' | 'low';
}

export interface KnownRecordSet {
  readonly dates: readonly string[]; // YYYY-MM-DD
  readonly amounts: readonly number[];
  readonly names: readonly string[];
}

export interface TemplateParser {
  name: string;
  kind: TransactionKind;
  // Returns null when the template did not populate a record
  parse(html: string): ParsedTransaction | null;
}

export interface MailSource {
  listMessages(query: string): Promise<RawMessage[]>;
}

export interface RecordStore {
  loadKnownRecords(limit: number): Promise<KnownRecordSet>;
  // Returns the id of the created record
  appendRecord(name: string, amount: number | null, date: string): Promise<string>;
}

export interface Notifier {
  sendMessage(text: string): Promise<void>;
}
