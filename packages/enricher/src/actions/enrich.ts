import { join } from 'node:path';
import { attachLogFile, log, setLogLevel } from '@workspace/logger';
import { z } from 'zod';
import { resolveEnrichmentConfig } from '../config/enrichment-config.js';
import { EnrichmentMetrics } from '../observability/metrics.js';
import { EnrichmentOrchestrator } from '../orchestrator/enrichment-orchestrator.js';
import { RetryStrategy } from '../retry/retry-strategy.js';
import { readInputTables, writeEnrichedTable } from '../table/csv-table.js';
import { formatElapsed, formatRunTimestamp } from '../utils/timestamp.js';
import { AxiosWebEngine } from '../web-engine/axios-engine.js';
import {
  integerOption,
  logLevelOption,
  networkOptionsSchema,
  pathOption,
} from './cli-options.js';

const enrichArgsSchema = z.object({
  inputDir: z.string().trim().min(1, 'Missing required option: --inputDir'),
  outputDir: z.string().trim().min(1, 'Missing required option: --outputDir'),
  logDir: pathOption('logs', 'Invalid --logDir path'),
  urlColumn: z.string().trim().min(1, 'Invalid --urlColumn').default('page_link'),
  progressStep: integerOption(
    10,
    1,
    'Invalid --progressStep. Provide a positive integer.',
  ),
  logLevel: logLevelOption(),
  ...networkOptionsSchema.shape,
});

type EnrichArgs = z.infer<typeof enrichArgsSchema>;

export async function runEnrichAction(args: EnrichArgs): Promise<number> {
  const startTime = Date.now();
  const runStamp = formatRunTimestamp(new Date(startTime));
  if (args.logLevel) {
    setLogLevel(args.logLevel);
  }

  let engine: AxiosWebEngine | undefined;

  try {
    const logPath = attachLogFile(join(args.logDir, `enrichment_${runStamp}.log`));
    log.info(
      'Starting enrichment',
      JSON.stringify({ inputDir: args.inputDir, outputDir: args.outputDir, logPath }),
    );

    const config = resolveEnrichmentConfig({
      urlColumn: args.urlColumn,
      probeTimeoutMs: args.probeTimeoutMs,
      fetchTimeoutMs: args.fetchTimeoutMs,
      maxAttempts: args.maxAttempts,
      retryDelayMs: args.retryDelayMs,
      progressStep: args.progressStep,
      userAgent: args.userAgent,
    });

    const metrics = new EnrichmentMetrics();
    engine = new AxiosWebEngine({
      probeTimeoutMs: config.probeTimeoutMs,
      fetchTimeoutMs: config.fetchTimeoutMs,
      userAgent: config.userAgent,
      retryStrategy: new RetryStrategy({
        maxAttempts: config.maxAttempts,
        delayMs: config.retryDelayMs,
      }),
      metrics,
    });

    const table = await readInputTables(args.inputDir);
    const enriched = await new EnrichmentOrchestrator(engine, config, metrics).run(table);
    const outputPath = await writeEnrichedTable(enriched, args.outputDir);

    log.info('Enrichment complete. Enriched news article file saved to', outputPath);
    log.info(`Time elapsed: ${formatElapsed(Date.now() - startTime)}`);
    log.info(`No. of news articles: ${enriched.rows.length}`);
    metrics.log(log);

    return 0;
  } catch (error) {
    log.fatal('Enrichment aborted:', error);
    return 1;
  } finally {
    await engine?.cleanup();
  }
}

export { enrichArgsSchema };
export type { EnrichArgs };
