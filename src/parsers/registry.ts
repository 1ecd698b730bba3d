import { ParsedTransaction, TemplateParser } from '../types';
import { PaylahParser } from './paylah';
import { AmountReceivedParser } from './received';
import { CardTransactionParser } from './card';

export class ParserRegistry {
  private parsers: TemplateParser[] = [];

  constructor() {
    // Precedence matters: a tabular alert can also carry From:/To: labels
    this.register(new PaylahParser());
    this.register(new AmountReceivedParser());
    this.register(new CardTransactionParser());
  }

  register(parser: TemplateParser) {
    this.parsers.push(parser);
  }

  /**
   * First populated record in precedence order, or null when no template matched
   */
  classify(html: string): { parser: TemplateParser; transaction: ParsedTransaction } | null {
    for (const parser of this.parsers) {
      const transaction = parser.parse(html);
      if (transaction) {
        return { parser, transaction };
      }
    }
    return null;
  }

  getAllParsers(): TemplateParser[] {
    return this.parsers;
  }
}

export const parserRegistry = new ParserRegistry();
