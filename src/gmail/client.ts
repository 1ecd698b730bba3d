import { google, gmail_v1 } from 'googleapis';
import * as cheerio from 'cheerio';
import { authorize } from './auth';
import { GmailConfig } from '../config/app';
import { MailSource, RawMessage } from '../types';

function decodeBody(data: string): string {
  return Buffer.from(data, 'base64').toString('utf-8');
}

/**
 * Wrap a plain-text body so the HTML templates can still be tried on it
 */
function wrapPlainText(text: string): string {
  const $ = cheerio.load('<pre></pre>', null, false);
  $('pre').text(text);
  return $.html();
}

/**
 * HTML body of a message payload; falls back to an escaped <pre> of the
 * text/plain part when there is no HTML part.
 */
export function extractHtmlBody(payload: gmail_v1.Schema$MessagePart | undefined): string {
  if (!payload) return '';

  const findPart = (part: gmail_v1.Schema$MessagePart, mimeType: string): string => {
    if (part.mimeType?.toLowerCase() === mimeType && part.body?.data) {
      return decodeBody(part.body.data);
    }
    for (const child of part.parts ?? []) {
      const found = findPart(child, mimeType);
      if (found) return found;
    }
    return '';
  };

  const html = findPart(payload, 'text/html');
  if (html) return html;

  const plain = findPart(payload, 'text/plain');
  return plain ? wrapPlainText(plain) : '';
}

export class GmailClient implements MailSource {
  private gmail: gmail_v1.Gmail | null = null;

  constructor(private config: Pick<GmailConfig, 'credentialsPath' | 'tokenPath'>) {}

  async init(): Promise<gmail_v1.Gmail> {
    if (!this.gmail) {
      const auth = await authorize(this.config);
      this.gmail = google.gmail({ version: 'v1', auth });
    }
    return this.gmail;
  }

  async listMessageIds(query: string): Promise<string[]> {
    const gmail = await this.init();

    const ids: string[] = [];
    let nextPageToken: string | undefined = undefined;

    do {
      const { data }: { data: gmail_v1.Schema$ListMessagesResponse } = await gmail.users.messages.list({
        userId: 'me',
        q: query,
        pageToken: nextPageToken,
        maxResults: 100,
      });

      for (const message of data.messages ?? []) {
        if (message.id) ids.push(message.id);
      }
      nextPageToken = data.nextPageToken || undefined;
    } while (nextPageToken);

    return ids;
  }

  /**
   * Full messages matching a search query, in the order Gmail lists them
   */
  async listMessages(query: string): Promise<RawMessage[]> {
    const ids = await this.listMessageIds(query);

    const messages: RawMessage[] = [];
    for (const id of ids) {
      const message = await this.getMessage(id);
      if (message) messages.push(message);
    }
    return messages;
  }

  async getMessage(id: string): Promise<RawMessage | null> {
    const gmail = await this.init();

    try {
      const res = await gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'full',
      });

      const payload = res.data.payload;
      if (!payload) return null;

      const headers = payload.headers || [];
      const header = (name: string) => headers.find(h => h.name === name)?.value || '';

      return {
        id: res.data.id || id,
        threadId: res.data.threadId || '',
        subject: header('Subject'),
        from: header('From'),
        date: new Date(header('Date')),
        html: extractHtmlBody(payload),
      };
    } catch (error) {
      console.error(`Failed to fetch message ${id}`, error);
      return null;
    }
  }
}
