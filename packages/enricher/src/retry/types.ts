type TransientErrorClass = 'timeout' | 'connection' | 'tls' | 'encoding';
type TerminalErrorClass = 'schema' | 'system';
type ErrorClass = TransientErrorClass | TerminalErrorClass;

type RetryDecision = {
  shouldRetry: boolean;
  delayMs: number;
  errorClass: ErrorClass;
};

type RetryStrategyConfig = {
  maxAttempts: number;
  delayMs: number;
};

export type {
  ErrorClass,
  RetryDecision,
  RetryStrategyConfig,
  TerminalErrorClass,
  TransientErrorClass,
};
