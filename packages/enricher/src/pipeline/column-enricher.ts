import { createLogger } from '@workspace/logger';
import { fieldExtractors } from '../extractors/field-extractors.js';
import type { FieldName } from '../extractors/types.js';
import type { EnrichmentMetrics } from '../observability/metrics.js';
import type { Cell, Table } from '../table/types.js';
import type { WebEngine } from '../web-engine/types.js';
import { ProgressTracker } from './progress-tracker.js';

const log = createLogger('Column Enricher');

type ColumnEnricherContext = {
  engine: WebEngine;
  urlColumn: string;
  progressStep: number;
  metrics?: EnrichmentMetrics;
};

/**
 * Resolve, fetch and extract one field for one URL. Every failure along the
 * way ends as `null`; nothing is thrown.
 */
export async function extractField(
  url: Cell | undefined,
  field: FieldName,
  engine: WebEngine,
  metrics?: EnrichmentMetrics,
): Promise<Cell> {
  const extractor = fieldExtractors[field];

  try {
    const resolution = await engine.resolveUrl(url ?? '');
    if (!resolution.success) {
      log.debug(`${field}: unresolvable URL "${url ?? ''}"`);
      return null;
    }

    let value: string | undefined;
    if (extractor.source === 'url') {
      value = extractor.extract(resolution.url);
    } else {
      const page = await engine.fetchDocument(resolution.url);
      if (!page.success) {
        log.debug(`${field}: no document for ${resolution.url}`, page.error);
        return null;
      }
      value = extractor.extract(page.content);
    }

    metrics?.increment(`extract.${value === undefined ? 'miss' : 'hit'}.${field}`);
    return value ?? null;
  } catch (error) {
    metrics?.increment(`extract.error.${field}`);
    log.error(`${field}: extraction failed for "${url ?? ''}":`, error);
    return null;
  }
}

/**
 * Apply one field extractor to every row, strictly in row order, one row at
 * a time. The input table is only read.
 */
export async function enrichColumn(
  table: Table,
  field: FieldName,
  context: ColumnEnricherContext,
): Promise<Cell[]> {
  const progress = new ProgressTracker(
    fieldExtractors[field].label,
    table.rows.length,
    context.progressStep,
    log,
  );

  const values: Cell[] = [];
  for (const row of table.rows) {
    values.push(
      await extractField(row[context.urlColumn], field, context.engine, context.metrics),
    );
    progress.advance();
  }

  return values;
}

export type { ColumnEnricherContext };
