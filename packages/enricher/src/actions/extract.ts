import { log, setLogLevel } from '@workspace/logger';
import { z } from 'zod';
import { FIELD_NAMES } from '../extractors/types.js';
import { EnrichmentOrchestrator } from '../orchestrator/enrichment-orchestrator.js';
import { RetryStrategy } from '../retry/retry-strategy.js';
import { AxiosWebEngine } from '../web-engine/axios-engine.js';
import { booleanOption, logLevelOption, networkOptionsSchema } from './cli-options.js';

const extractArgsSchema = z.object({
  url: z.string().trim().min(1, 'Missing required option: --url'),
  pretty: booleanOption(),
  logLevel: logLevelOption(),
  ...networkOptionsSchema.shape,
});

type ExtractArgs = z.infer<typeof extractArgsSchema>;

export async function runExtractAction(args: ExtractArgs): Promise<number> {
  if (args.logLevel) {
    setLogLevel(args.logLevel);
  }
  log.info('Starting extract action', JSON.stringify({ url: args.url }));

  const engine = new AxiosWebEngine({
    probeTimeoutMs: args.probeTimeoutMs,
    fetchTimeoutMs: args.fetchTimeoutMs,
    userAgent: args.userAgent,
    retryStrategy: new RetryStrategy({
      maxAttempts: args.maxAttempts,
      delayMs: args.retryDelayMs,
    }),
  });

  const orchestrator = new EnrichmentOrchestrator(engine, {
    urlColumn: 'page_link',
    progressStep: 100,
  });
  const result = await orchestrator.enrichUrl(args.url).finally(() => engine.cleanup());

  console.log(args.pretty ? JSON.stringify(result, null, 2) : JSON.stringify(result));

  const found = Object.values(result).filter((value) => value !== null).length;
  log.info(`Extract action finished (${found}/${FIELD_NAMES.length} fields found)`);

  return found === 0 ? 1 : 0;
}

export { extractArgsSchema };
export type { ExtractArgs };
