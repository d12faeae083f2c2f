export const RETRY = {
  BASE_DELAY: 500,
  MAX_DELAY: 30_000,
  BACKOFF_MULTIPLIER: 2
} as const;

export interface RetryOptions {
  baseDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
}

// Exponential backoff delay before retry number `attempt` (0-based)
export function calculateBackoff(attempt: number, options: RetryOptions = {}): number {
  const baseDelay = options.baseDelay ?? RETRY.BASE_DELAY;
  const maxDelay = options.maxDelay ?? RETRY.MAX_DELAY;
  const multiplier = options.backoffMultiplier ?? RETRY.BACKOFF_MULTIPLIER;
  return Math.min(baseDelay * Math.pow(multiplier, attempt), maxDelay);
}
