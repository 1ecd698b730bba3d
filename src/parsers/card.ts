import * as cheerio from 'cheerio';
import { Text } from 'domhandler';
import { CardTransactionFields, ParsedTransaction, TemplateParser } from '../types';
import { contentTextNodes, decodeFragment, flattenText, loadDocument } from '../utils/html';
import { clean } from '../utils/text';
import { parseAmount } from './amount';

// "Date & Time: 26 Sep 11:56 (SGT)", the ampersand is optional
const TRANSACTION_TIME_PATTERN = /Date\s*&?\s*Time:\s*([0-9]{1,2}\s+[A-Za-z]{3}\s+\d{2}:\d{2}\s*\([A-Z]+\))/;
const AMOUNT_PATTERN = /Amount:(\s*[A-Z]{3}\s*-?\d[\d,]*(?:\.\d+)?)/;

// Case-sensitive on purpose: "to:" inside sentences must not match
const RECIPIENT_LABEL = /To\s*:\s*([\s\S]*)$/;
const RECIPIENT_MARKUP_PATTERN = /To\s*:\s*([^<]+?)\s*(?=<)/;

/**
 * Recipient from the tree: the rest of the "To:" text node, else the next
 * sibling's text, else the text of the label's parent's next sibling.
 */
function recipientFromStructure($: cheerio.CheerioAPI): string | null {
  for (const node of contentTextNodes($)) {
    const match = node.data.match(RECIPIENT_LABEL);
    if (!match) continue;

    const inline = clean(match[1]);
    if (inline) return inline;

    const sibling = siblingText($, node);
    if (sibling) return sibling;

    const parent = node.parent;
    if (parent) {
      const parentSibling = clean($(parent).next().text());
      if (parentSibling) return parentSibling;
    }
  }
  return null;
}

function siblingText($: cheerio.CheerioAPI, node: Text): string | null {
  let next = node.nextSibling;
  while (next) {
    const text = clean($(next).text());
    if (text) return text;
    next = next.nextSibling;
  }
  return null;
}

/**
 * Low-confidence fallback: scan the raw markup up to the next tag boundary
 */
function recipientFromMarkup(html: string): string | null {
  const match = html.match(RECIPIENT_MARKUP_PATTERN);
  if (!match) return null;
  return clean(decodeFragment(match[1])) || null;
}

/**
 * Extract date/time, amount and recipient from the card transaction template
 */
export function extractCardTransaction(html: string | null | undefined): CardTransactionFields {
  const $ = loadDocument(html);
  const result: CardTransactionFields = {
    dateTime: null,
    amountRaw: null,
    amount: null,
    to: null,
    toSource: null,
  };

  const text = flattenText($);

  const transactionTime = text.match(TRANSACTION_TIME_PATTERN);
  if (transactionTime) {
    result.dateTime = clean(transactionTime[1]);
  }

  const amount = text.match(AMOUNT_PATTERN);
  if (amount) {
    const parsed = parseAmount(amount[1]);
    result.amountRaw = parsed.amountRaw;
    result.amount = parsed.amountNum;
  }

  const structural = recipientFromStructure($);
  if (structural) {
    result.to = structural;
    result.toSource = 'structure';
  } else {
    const fromMarkup = recipientFromMarkup(html ?? '');
    if (fromMarkup) {
      result.to = fromMarkup;
      result.toSource = 'pattern';
    }
  }

  return result;
}

export class CardTransactionParser implements TemplateParser {
  name = 'CARD';
  kind = 'card' as const;

  parse(html: string): ParsedTransaction | null {
    const fields = extractCardTransaction(html);
    if (!fields.dateTime) return null;

    return {
      kind: this.kind,
      dateTime: fields.dateTime,
      amountRaw: fields.amountRaw,
      amountNum: fields.amount,
      counterparty: fields.to,
      counterpartyConfidence: fields.toSource === 'pattern' ? 'low' : 'high',
    };
  }
}
