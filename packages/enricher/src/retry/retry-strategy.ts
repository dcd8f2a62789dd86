import type { ErrorClass, RetryDecision, RetryStrategyConfig } from './types.js';

const DEFAULT_CONFIG: RetryStrategyConfig = {
  maxAttempts: 3,
  delayMs: 1000,
};

const TRANSIENT_CLASSES: ReadonlySet<ErrorClass> = new Set<ErrorClass>([
  'timeout',
  'connection',
  'tls',
  'encoding',
]);

const SCHEMA_CODES = new Set(['ERR_INVALID_URL', 'ERR_INVALID_PROTOCOL']);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

const CONNECTION_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK',
  'ERR_SOCKET_CLOSED',
]);

const TLS_CODES = new Set([
  'EPROTO',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
]);

function readErrorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }

  return undefined;
}

function readErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RetryStrategy {
  private readonly config: RetryStrategyConfig;

  constructor(config?: Partial<RetryStrategyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  classify(error: unknown): ErrorClass {
    const code = readErrorCode(error)?.toUpperCase() ?? '';
    const message = readErrorMessage(error).toLowerCase();

    if (
      SCHEMA_CODES.has(code) ||
      message.includes('invalid url') ||
      message.includes('unsupported protocol')
    ) {
      return 'schema';
    }

    if (TIMEOUT_CODES.has(code) || message.includes('timeout')) {
      return 'timeout';
    }

    if (
      TLS_CODES.has(code) ||
      code.startsWith('ERR_TLS_') ||
      code.startsWith('ERR_SSL_') ||
      code.startsWith('CERT_') ||
      message.includes('certificate')
    ) {
      return 'tls';
    }

    if (
      code.startsWith('Z_') ||
      code.startsWith('ERR_ENCODING_') ||
      message.includes('incorrect header check') ||
      message.includes('unexpected end of file')
    ) {
      return 'encoding';
    }

    if (
      CONNECTION_CODES.has(code) ||
      message.includes('socket hang up') ||
      message.includes('network error')
    ) {
      return 'connection';
    }

    return 'system';
  }

  isTransient(errorClass: ErrorClass): boolean {
    return TRANSIENT_CLASSES.has(errorClass);
  }

  /**
   * @param attempt - 1-based number of the attempt that just failed
   */
  decide(errorClass: ErrorClass, attempt: number): RetryDecision {
    if (!this.isTransient(errorClass)) {
      return { shouldRetry: false, delayMs: 0, errorClass };
    }

    return {
      shouldRetry: attempt < this.config.maxAttempts,
      delayMs: this.config.delayMs,
      errorClass,
    };
  }
}

export { readErrorMessage };
