import type { RetryConfig } from '../types'

/**
 * Delay before the attempt that follows `attempt` (1-based):
 * min(maxBackoffMs, backoffMs * factor^(attempt - 1))
 */
export function backoffDelay(attempt: number, retry: RetryConfig): number {
  const delay = retry.backoffMs * Math.pow(retry.factor, Math.max(0, attempt - 1))
  return Math.min(retry.maxBackoffMs, delay)
}
