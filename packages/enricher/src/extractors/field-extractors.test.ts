import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import {
  extractContent,
  extractDate,
  extractJournalistName,
  extractTitle,
  fieldExtractors,
} from './field-extractors.js';
import { FIELD_NAMES } from './types.js';

const page = (head: string, body = ''): cheerio.CheerioAPI =>
  cheerio.load(`<html><head>${head}</head><body>${body}</body></html>`);

describe('extractContent', () => {
  it('joins non-empty paragraphs in document order without separators', () => {
    const $ = page(
      '',
      '<p>First paragraph.</p><p>   </p><div><p>Second\n  paragraph.</p></div><p>Third.</p>',
    );

    expect(extractContent($)).toBe('First paragraph.Second paragraph.Third.');
  });

  it('includes text of nested inline elements', () => {
    const $ = page('', '<p>Hello <strong>bold</strong> world</p>');

    expect(extractContent($)).toBe('Hello bold world');
  });

  it('separates text split by line breaks or adjacent inline elements', () => {
    const $ = page(
      '',
      '<p>Line one<br>Line two</p><p><span>Jakarta</span><span>Reuters</span></p>',
    );

    expect(extractContent($)).toBe('Line one Line twoJakarta Reuters');
  });

  it('skips comments and whitespace-only text nodes inside a paragraph', () => {
    const $ = page('', '<p>Before<!-- note -->  <em> </em>After</p>');

    expect(extractContent($)).toBe('Before After');
  });

  it('returns undefined when the page has no paragraph text', () => {
    expect(extractContent(page('', '<div>Not a paragraph</div><p></p>'))).toBeUndefined();
  });
});

describe('extractTitle', () => {
  it('drops the site-name suffix after the first separator', () => {
    const $ = page('<title>Breaking News - Example Times</title>');

    expect(extractTitle($)).toBe('Breaking News');
  });

  it('collapses whitespace and line breaks', () => {
    const $ = page('<title>\n  Markets   rally\n  again - Daily - Edition </title>');

    expect(extractTitle($)).toBe('Markets rally again');
  });

  it('keeps hyphenated words intact', () => {
    const $ = page('<title>COVID-19 update</title>');

    expect(extractTitle($)).toBe('COVID-19 update');
  });

  it('returns undefined for a missing or blank title', () => {
    expect(extractTitle(page(''))).toBeUndefined();
    expect(extractTitle(page('<title>   </title>'))).toBeUndefined();
  });
});

describe('extractDate', () => {
  it('extracts DD Mon YYYY from the first date-like element', () => {
    const $ = page(
      '',
      '<span class="post-date">Published: 05 Mar 2023 - Staff Writer</span>',
    );

    expect(extractDate($)).toBe('05 Mar 2023');
  });

  it('matches class names case-insensitively', () => {
    const $ = page('', '<time class="Article-Calendar">On 17 Jan 2024</time>');

    expect(extractDate($)).toBe('17 Jan 2024');
  });

  it('uses only the first matching element', () => {
    const $ = page(
      '',
      '<div class="published-at">yesterday</div><span class="date">01 Feb 2022</span>',
    );

    expect(extractDate($)).toBeUndefined();
  });

  it('ignores dates after the separator', () => {
    const $ = page('', '<div class="date">Updated - 09 Sep 2021</div>');

    expect(extractDate($)).toBeUndefined();
  });

  it('returns undefined when no element has a date-like class', () => {
    const $ = page('', '<div class="footer">Copyright 2023</div>');

    expect(extractDate($)).toBeUndefined();
  });
});

describe('extractJournalistName', () => {
  it('prefers meta[name=author] over article:author', () => {
    const $ = page(
      '<meta property="article:author" content="Second Choice"><meta name="author" content=" Jane Reporter ">',
    );

    expect(extractJournalistName($)).toBe('Jane Reporter');
  });

  it('falls back to article:author and then content:author', () => {
    expect(
      extractJournalistName(page('<meta property="article:author" content="A. Writer">')),
    ).toBe('A. Writer');
    expect(
      extractJournalistName(page('<meta property="content:author" content="C. Author">')),
    ).toBe('C. Author');
  });

  it('skips a match whose content is empty', () => {
    const $ = page(
      '<meta name="author" content="  "><meta property="content:author" content="Fallback Name">',
    );

    expect(extractJournalistName($)).toBe('Fallback Name');
  });

  it('returns undefined when no author meta tag exists', () => {
    expect(extractJournalistName(page('<meta name="description" content="x">'))).toBeUndefined();
  });
});

describe('fieldExtractors', () => {
  it('registers one extractor per derived field', () => {
    expect(Object.keys(fieldExtractors)).toEqual([...FIELD_NAMES]);
  });

  it('derives media name from the URL without a document', () => {
    const extractor = fieldExtractors.media_name;

    expect(extractor.source).toBe('url');
    if (extractor.source === 'url') {
      expect(extractor.extract('https://www.example.com/a/b')).toBe('example.com');
    }
  });

  it('reads every other field from the document', () => {
    const documentFields = FIELD_NAMES.filter(
      (field) => fieldExtractors[field].source === 'document',
    );

    expect(documentFields).toEqual(['content', 'title', 'date', 'journalist_name']);
  });
});
