import { PaylahFields, ParsedTransaction, TemplateParser } from '../types';
import { loadDocument } from '../utils/html';
import { clean, normalizeLabel } from '../utils/text';
import { parseAmount } from './amount';

/**
 * Extract Date & Time, Amount and To from the tabular payment template.
 *
 * Every row with at least one cell is read as `label | value`; unknown labels
 * are ignored and a repeated label overwrites the earlier value.
 */
export function extractPaylahFields(html: string | null | undefined): PaylahFields {
  const $ = loadDocument(html);
  const result: PaylahFields = { dateTime: null, amount: null, amountNum: null, to: null };

  $('tr').each((_, row) => {
    const cells = $(row).children('td');
    if (cells.length === 0) return;

    const label = normalizeLabel(cells.first().text());
    // Full text of the value cell, nested markup included
    const value = cells.length > 1 ? clean(cells.eq(1).text()) : '';

    switch (label) {
      case 'date & time':
        result.dateTime = value;
        break;
      case 'amount':
        result.amount = value;
        result.amountNum = parseAmount(value).amountNum;
        break;
      case 'to':
        result.to = value;
        break;
    }
  });

  return result;
}

export class PaylahParser implements TemplateParser {
  name = 'PAYLAH';
  kind = 'payment' as const;

  parse(html: string): ParsedTransaction | null {
    const fields = extractPaylahFields(html);
    if (!fields.dateTime) return null;

    return {
      kind: this.kind,
      dateTime: fields.dateTime,
      amountRaw: fields.amount,
      amountNum: fields.amountNum,
      counterparty: fields.to,
      counterpartyConfidence: 'high',
    };
  }
}
