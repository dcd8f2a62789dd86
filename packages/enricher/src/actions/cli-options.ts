import { z } from 'zod';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

function booleanOption() {
  return z
    .preprocess((value) => {
      if (value === undefined) {
        return 'false';
      }

      if (typeof value === 'string') {
        return value.toLowerCase();
      }

      return value;
    }, booleanFromCliSchema)
    .default(false);
}

function integerOption(defaultValue: number, min: number, message: string) {
  return z
    .preprocess(
      (value) => {
        if (value === undefined) {
          return defaultValue;
        }

        if (typeof value === 'string') {
          const parsedValue = Number(value);
          return Number.isFinite(parsedValue) ? parsedValue : value;
        }

        return value;
      },
      z.number({ invalid_type_error: message }).int(message).min(min, message),
    )
    .default(defaultValue);
}

function pathOption(defaultValue: string, message: string) {
  return z
    .preprocess((value) => {
      if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.length ? trimmed : undefined;
      }

      return value;
    }, z.string().min(1, message).optional())
    .transform((value) => value ?? defaultValue);
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Overrides LOG_LEVEL for one command. */
function logLevelOption() {
  return z
    .enum(LOG_LEVELS, {
      errorMap: () => ({ message: `Invalid --logLevel. Use one of: ${LOG_LEVELS.join(', ')}.` }),
    })
    .optional();
}

/** Network tuning shared by every command that touches the web. */
const networkOptionsSchema = z.object({
  probeTimeoutMs: integerOption(
    5000,
    1,
    'Invalid --probeTimeoutMs. Provide a positive integer.',
  ),
  fetchTimeoutMs: integerOption(
    6000,
    1,
    'Invalid --fetchTimeoutMs. Provide a positive integer.',
  ),
  maxAttempts: integerOption(
    3,
    1,
    'Invalid --maxAttempts. Provide a positive integer.',
  ),
  retryDelayMs: integerOption(
    1000,
    0,
    'Invalid --retryDelayMs. Provide an integer >= 0.',
  ),
  userAgent: z.string().trim().min(1, 'Invalid --userAgent').optional(),
});

export { booleanOption, integerOption, logLevelOption, networkOptionsSchema, pathOption };
