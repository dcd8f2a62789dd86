import type { Cheerio, CheerioAPI } from 'cheerio';
import { isText, type AnyNode } from 'domhandler';
import { extractMediaName } from '../utils/url.js';
import type { FieldExtractor, FieldName } from './types.js';

const TITLE_SEPARATOR = ' - ';
const DATE_CLASS_PATTERN = /date|calendar|published/i;
const DATE_PATTERN = /\d{2}\s+[A-Za-z]{3}\s+\d{4}/;

const AUTHOR_META_SELECTORS = [
  'meta[name="author"]',
  'meta[property="article:author"]',
  'meta[property="content:author"]',
] as const;

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, ' ').trim();

const cutAtSeparator = (value: string): string => {
  const index = value.indexOf(TITLE_SEPARATOR);
  return index === -1 ? value : value.slice(0, index);
};

const emptyToUndefined = (value: string): string | undefined =>
  value.length > 0 ? value : undefined;

/** Text nodes below `nodes`, in document order. */
function textNodes($: CheerioAPI, nodes: Cheerio<AnyNode>): string[] {
  return nodes
    .toArray()
    .flatMap((node) => (isText(node) ? [node.data] : textNodes($, $(node).contents())));
}

/**
 * Every non-empty paragraph in document order. Text nodes inside a paragraph
 * are joined by a single space; paragraphs are joined without separators.
 */
export function extractContent($: CheerioAPI): string | undefined {
  const paragraphs = $('p')
    .map((_, el) =>
      textNodes($, $(el).contents())
        .map(collapseWhitespace)
        .filter((text) => text.length > 0)
        .join(' '),
    )
    .get()
    .filter((text) => text.length > 0);

  return emptyToUndefined(paragraphs.join(''));
}

export function extractTitle($: CheerioAPI): string | undefined {
  const title = $('title').first();
  if (title.length === 0) {
    return undefined;
  }

  return emptyToUndefined(cutAtSeparator(collapseWhitespace(title.text())).trim());
}

/**
 * First element whose class mentions a date, then the first `DD Mon YYYY`
 * inside its text. Anything after a ` - ` separator is ignored.
 */
export function extractDate($: CheerioAPI): string | undefined {
  const element = $('[class]')
    .filter((_, el) => DATE_CLASS_PATTERN.test($(el).attr('class') ?? ''))
    .first();

  if (element.length === 0) {
    return undefined;
  }

  const text = cutAtSeparator(element.text().trim());
  return DATE_PATTERN.exec(text)?.[0];
}

export function extractJournalistName($: CheerioAPI): string | undefined {
  for (const selector of AUTHOR_META_SELECTORS) {
    const content = $(selector).first().attr('content')?.trim();
    if (content) {
      return content;
    }
  }

  return undefined;
}

export const fieldExtractors: Record<FieldName, FieldExtractor> = {
  content: {
    source: 'document',
    label: 'Getting article content',
    extract: extractContent,
  },
  title: {
    source: 'document',
    label: 'Getting article title',
    extract: extractTitle,
  },
  date: {
    source: 'document',
    label: 'Getting article date',
    extract: extractDate,
  },
  media_name: {
    source: 'url',
    label: 'Getting article media name',
    extract: extractMediaName,
  },
  journalist_name: {
    source: 'document',
    label: 'Getting article journalist name',
    extract: extractJournalistName,
  },
};
