import { log } from '@workspace/logger';
import type { EnrichmentConfig } from '../config/enrichment-config.js';
import { FIELD_NAMES, type EnrichmentResult, type FieldName } from '../extractors/types.js';
import { EnrichmentMetrics } from '../observability/metrics.js';
import { enrichColumn, extractField } from '../pipeline/column-enricher.js';
import { appendColumns, assertUrlColumn } from '../table/table.js';
import type { Cell, Table } from '../table/types.js';
import type { WebEngine } from '../web-engine/types.js';

type OrchestratorConfig = Pick<EnrichmentConfig, 'urlColumn' | 'progressStep'>;

/**
 * Runs the five column enrichers concurrently over one read-only table.
 * Each task owns its result array; the arrays are merged only after every
 * task has settled, and a failure in any task fails the whole run.
 *
 * No page cache is shared between tasks: the same URL is fetched once per
 * document-based field.
 */
export class EnrichmentOrchestrator {
  private readonly engine: WebEngine;
  private readonly config: OrchestratorConfig;
  private readonly metrics: EnrichmentMetrics;

  constructor(
    engine: WebEngine,
    config: OrchestratorConfig,
    metrics: EnrichmentMetrics = new EnrichmentMetrics(),
  ) {
    this.engine = engine;
    this.config = config;
    this.metrics = metrics;
  }

  async run(table: Table): Promise<Table> {
    assertUrlColumn(table, this.config.urlColumn);

    const rowCount = table.rows.length;
    this.metrics.gauge('rows.total', rowCount);
    log.info(`Enriching ${rowCount} news articles across ${FIELD_NAMES.length} fields`);

    // A failure is reported only once all five tasks have settled
    const settled = await Promise.allSettled(
      FIELD_NAMES.map((field) => this.runColumn(table, field)),
    );

    const results: Array<readonly [FieldName, Cell[]]> = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }

    return appendColumns(table, results);
  }

  /** All five fields for a single URL, with the same per-field independence as `run`. */
  async enrichUrl(url: string): Promise<EnrichmentResult> {
    const extract = (field: FieldName): Promise<Cell> =>
      extractField(url, field, this.engine, this.metrics);

    const [content, title, date, mediaName, journalistName] = await Promise.all([
      extract('content'),
      extract('title'),
      extract('date'),
      extract('media_name'),
      extract('journalist_name'),
    ]);

    return {
      content,
      title,
      date,
      media_name: mediaName,
      journalist_name: journalistName,
    };
  }

  getMetrics(): EnrichmentMetrics {
    return this.metrics;
  }

  private async runColumn(
    table: Table,
    field: FieldName,
  ): Promise<readonly [FieldName, Cell[]]> {
    const values = await enrichColumn(table, field, {
      engine: this.engine,
      urlColumn: this.config.urlColumn,
      progressStep: this.config.progressStep,
      metrics: this.metrics,
    });

    this.metrics.increment('columns.completed');
    log.debug(`Column "${field}" finished (${values.length} rows)`);

    return [field, values] as const;
  }
}

export type { OrchestratorConfig };
