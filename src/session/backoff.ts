export interface ReconnectPolicy {
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Retries before giving up */
  maxAttempts: number;
  factor: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  maxAttempts: 8,
  factor: 2,
};

/**
 * Delay before retry number `attempt` (0-based): initialDelayMs × factor^attempt, capped.
 */
export function backoffDelay(attempt: number, policy: Pick<ReconnectPolicy, 'initialDelayMs' | 'maxDelayMs' | 'factor'>): number {
  return Math.min(policy.initialDelayMs * Math.pow(policy.factor, attempt), policy.maxDelayMs);
}
