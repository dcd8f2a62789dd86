import type { CheerioAPI } from 'cheerio';

const FIELD_NAMES = [
  'content',
  'title',
  'date',
  'media_name',
  'journalist_name',
] as const;

type FieldName = (typeof FIELD_NAMES)[number];

type DocumentFieldExtractor = {
  source: 'document';
  label: string;
  extract: ($: CheerioAPI) => string | undefined;
};

/** Works on the resolved URL alone; no page fetch is made. */
type UrlFieldExtractor = {
  source: 'url';
  label: string;
  extract: (resolvedUrl: string) => string | undefined;
};

type FieldExtractor = DocumentFieldExtractor | UrlFieldExtractor;

/** Absent values are `null` so they land as empty cells in the output. */
type EnrichmentResult = Record<FieldName, string | null>;

export { FIELD_NAMES };
export type {
  DocumentFieldExtractor,
  EnrichmentResult,
  FieldExtractor,
  FieldName,
  UrlFieldExtractor,
};
