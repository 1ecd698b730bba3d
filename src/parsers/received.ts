import * as cheerio from 'cheerio';
import { isText } from 'domhandler';
import { AmountReceivedFields, ParsedTransaction, TemplateParser } from '../types';
import { flattenText, loadDocument } from '../utils/html';
import { clean } from '../utils/text';
import { parseAmount } from './amount';

// "Amount: SGD 10.00" is preferred over "received SGD 10.00"
const AMOUNT_PATTERNS = [
  /Amount:(\s*[A-Z]{3}\s*-?\d[\d,]*(?:\.\d+)?)/,
  /received(\s*[A-Z]{3}\s*-?\d[\d,]*(?:\.\d+)?)/,
];

// "... on 24 Sep 2025 18:09 SGT"
const RECEIVED_AT_PATTERN = /\bon\s+(\d{1,2}\s+\w{3}\s+\d{4}\s+\d{2}:\d{2}\s+SGT)\b/i;

/**
 * First text node following any bold label such as <strong>From:</strong>
 */
function textAfterLabel($: cheerio.CheerioAPI, label: string): string | null {
  const labels = $('strong, b').filter((_, el) => clean($(el).text()) === label).toArray();

  for (const el of labels) {
    let node = el.nextSibling;
    while (node) {
      if (isText(node)) return clean(node.data);
      node = node.nextSibling;
    }
  }
  return null;
}

/**
 * Extract amount, date/time, payer and payee from the "funds received" template
 */
export function extractAmountReceived(html: string | null | undefined): AmountReceivedFields {
  const $ = loadDocument(html);
  const result: AmountReceivedFields = {
    amountRaw: null,
    amount: null,
    dateTime: null,
    from: textAfterLabel($, 'From:'),
    to: textAfterLabel($, 'To:'),
  };

  const text = flattenText($);

  for (const pattern of AMOUNT_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      const parsed = parseAmount(match[1]);
      result.amountRaw = parsed.amountRaw;
      result.amount = parsed.amountNum;
      break;
    }
  }

  const receivedAt = text.match(RECEIVED_AT_PATTERN);
  if (receivedAt) {
    result.dateTime = receivedAt[1];
  }

  return result;
}

export class AmountReceivedParser implements TemplateParser {
  name = 'FUNDS_RECEIVED';
  kind = 'income' as const;

  parse(html: string): ParsedTransaction | null {
    const fields = extractAmountReceived(html);
    if (!fields.dateTime) return null;

    return {
      kind: this.kind,
      dateTime: fields.dateTime,
      amountRaw: fields.amountRaw,
      amountNum: fields.amount,
      counterparty: fields.from,
      counterpartyConfidence: 'high',
    };
  }
}
