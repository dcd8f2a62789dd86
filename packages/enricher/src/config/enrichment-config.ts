import { z } from 'zod';

const enrichmentConfigSchema = z.object({
  urlColumn: z.string().trim().min(1).default('page_link'),
  probeTimeoutMs: z.number().int().positive().default(5000),
  fetchTimeoutMs: z.number().int().positive().default(6000),
  maxAttempts: z.number().int().min(1).default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
  progressStep: z.number().int().min(1).max(100).default(10),
  userAgent: z.string().min(1).optional(),
});

type EnrichmentConfig = z.infer<typeof enrichmentConfigSchema>;
type EnrichmentConfigInput = z.input<typeof enrichmentConfigSchema>;

function resolveEnrichmentConfig(
  input: EnrichmentConfigInput = {},
): EnrichmentConfig {
  return enrichmentConfigSchema.parse(input);
}

export { enrichmentConfigSchema, resolveEnrichmentConfig };
export type { EnrichmentConfig, EnrichmentConfigInput };
