import { Client } from '@notionhq/client';
import type { QueryDatabaseResponse } from '@notionhq/client/build/src/api-endpoints';
import { NotionConfig } from '../config/app';
import { KnownRecordSet, RecordStore } from '../types';
import { createKnownRecordSet } from '../dispatch/dedup';
import { classifyError, formatError, retryWithBackoff } from '../utils/errors';

const PAGE_SIZE = 50; // Notion's page size ceiling is 100; 50 keeps responses small

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function plainText(parts: unknown): string {
  if (!Array.isArray(parts)) return '';
  return parts
    .map(part => (isRecord(part) && typeof part.plain_text === 'string' ? part.plain_text : ''))
    .join('');
}

/**
 * Fold the properties of database rows into a KnownRecordSet: every date
 * property feeds `dates`, title feeds `names`, number feeds `amounts`.
 */
export function collectKnownRecords(rows: Array<Record<string, unknown>>): KnownRecordSet {
  const dates: string[] = [];
  const amounts: number[] = [];
  const names: string[] = [];

  for (const properties of rows) {
    for (const property of Object.values(properties)) {
      if (!isRecord(property)) continue;

      switch (property.type) {
        case 'date': {
          const start = isRecord(property.date) ? property.date.start : undefined;
          // Date-only string; datetime values are cut down to YYYY-MM-DD
          if (typeof start === 'string' && start) dates.push(start.slice(0, 10));
          break;
        }
        case 'title':
          names.push(plainText(property.title));
          break;
        case 'number':
          if (typeof property.number === 'number') amounts.push(property.number);
          break;
      }
    }
  }

  return createKnownRecordSet({ dates, amounts, names });
}

export class NotionRecordStore implements RecordStore {
  private client: Client;

  constructor(private config: NotionConfig, client?: Client) {
    this.client = client ?? new Client({ auth: config.token });
  }

  /**
   * Newest rows with a date, up to `limit`
   */
  async loadKnownRecords(limit: number = this.config.recordLimit): Promise<KnownRecordSet> {
    const rows: Array<Record<string, unknown>> = [];
    let cursor: string | undefined = undefined;

    while (rows.length < limit) {
      const startCursor: string | undefined = cursor;
      const response: QueryDatabaseResponse = await retryWithBackoff(
        () => this.client.databases.query({
          database_id: this.config.databaseId,
          page_size: Math.min(PAGE_SIZE, limit - rows.length),
          start_cursor: startCursor,
          filter: { property: this.config.dateProperty, date: { is_not_empty: true } },
          sorts: [{ property: this.config.dateProperty, direction: 'descending' }],
        }),
        {
          onRetry: (error, attempt) => {
            console.warn(`Retrying Notion query (attempt ${attempt}): ${error.message}`);
          },
        }
      );

      for (const page of response.results) {
        if (page.object !== 'page' || !('properties' in page)) continue;
        rows.push(page.properties);
        if (rows.length >= limit) break;
      }

      if (!response.has_more || !response.next_cursor) break;
      cursor = response.next_cursor;
    }

    const known = collectKnownRecords(rows);
    console.log(`Loaded ${rows.length} known records (${known.dates.length} dates, ${known.amounts.length} amounts, ${known.names.length} names)`);
    return known;
  }

  /**
   * Create a row; `date` must be YYYY-MM-DD
   */
  async appendRecord(name: string, amount: number | null, date: string): Promise<string> {
    try {
      const response = await retryWithBackoff(
        () => this.client.pages.create({
          parent: { database_id: this.config.databaseId },
          properties: {
            [this.config.titleProperty]: { title: [{ text: { content: name } }] },
            [this.config.amountProperty]: { number: amount },
            [this.config.dateProperty]: { date: { start: date } },
          },
        }),
        {
          onRetry: (error, attempt) => {
            console.warn(`Retrying Notion row for ${name} (attempt ${attempt}): ${error.message}`);
          },
        }
      );
      return response.id;
    } catch (error) {
      const appError = classifyError(error, { name, amount, date });
      console.error(`Failed to create Notion row for ${name}:`, formatError(appError));
      throw appError;
    }
  }
}
