import * as cheerio from 'cheerio';
import { AnyNode, Text, hasChildren, isTag, isText } from 'domhandler';
import { clean } from './text';

const NON_CONTENT_TAGS = new Set(['script', 'style', 'head', 'title']);

/**
 * Parse HTML into a tolerant tree. Unclosed tags, stray entities and broken
 * nesting are repaired by the parser instead of raising.
 * htmlparser2 in HTML mode keeps table rows found outside a <table>.
 */
export function loadDocument(html: string | null | undefined): cheerio.CheerioAPI {
  return cheerio.load(html ?? '', { xml: { xmlMode: false } });
}

/**
 * The whole document as one whitespace-normalized string
 */
export function flattenText($: cheerio.CheerioAPI): string {
  return clean($.root().text());
}

/**
 * Text nodes of the rendered content, in document order
 */
export function contentTextNodes($: cheerio.CheerioAPI): Text[] {
  const out: Text[] = [];
  collectTextNodes($.root().toArray(), out);
  return out;
}

function collectTextNodes(nodes: AnyNode[], out: Text[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node);
    } else if (isTag(node) && NON_CONTENT_TAGS.has(node.name)) {
      continue;
    } else if (hasChildren(node)) {
      collectTextNodes(node.children, out);
    }
  }
}

/**
 * Decode entities in a markup fragment and return its text
 */
export function decodeFragment(fragment: string): string {
  return cheerio.load(fragment, null, false).root().text();
}
