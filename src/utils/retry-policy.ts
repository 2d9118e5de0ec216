/**
 * Reconnect policy for long-running streams.
 * Tracks consecutive failures and yields the exponential backoff delay
 * before the next attempt.
 */

export interface RetryPolicyConfig {
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	backoffMultiplier: number;
	onRetry?: (attempt: number, error: unknown, delayMs: number, remainingAttempts: number) => void;
	onFailure?: (error: unknown, totalAttempts: number) => void;
}

export interface RetryableError {
	isRetryable: (error: unknown) => boolean;
}

export class RetryPolicy {
	private consecutiveFailures: number = 0;

	constructor(
		private config: RetryPolicyConfig,
		private errorClassifier: RetryableError
	) {}

	/**
	 * Record a failed attempt
	 * @returns Delay before the next attempt, or null when the caller should give up
	 */
	recordFailure(error: unknown): number | null {
		this.consecutiveFailures++;

		if (!this.errorClassifier.isRetryable(error) || this.hasExhaustedRetries()) {
			this.config.onFailure?.(error, this.consecutiveFailures);
			return null;
		}

		const delay = this.calculateBackoff(this.consecutiveFailures);
		this.config.onRetry?.(this.consecutiveFailures, error, delay, this.getRemainingAttempts());
		return delay;
	}

	getConsecutiveFailures(): number {
		return this.consecutiveFailures;
	}

	/**
	 * Get remaining attempts before giving up
	 */
	getRemainingAttempts(): number {
		return Math.max(0, this.config.maxAttempts - this.consecutiveFailures);
	}

	hasExhaustedRetries(): boolean {
		return this.consecutiveFailures >= this.config.maxAttempts;
	}

	/**
	 * Reset failure counter (after a successful attempt)
	 */
	reset(): void {
		this.consecutiveFailures = 0;
	}

	/**
	 * Calculate exponential backoff delay (attempt is 1-based)
	 */
	calculateBackoff(attempt: number): number {
		const delay = this.config.baseDelayMs *
			Math.pow(this.config.backoffMultiplier, attempt - 1);
		return Math.min(delay, this.config.maxDelayMs);
	}
}

/**
 * Transport failures are retried; input and configuration errors are not
 */
export const streamErrorClassifier: RetryableError = {
	isRetryable(error: unknown): boolean {
		if (error && typeof error === 'object' && 'code' in error) {
			const code = error.code;
			return code !== 'INVALID_CONFIG' && code !== 'ENGINE_CLOSED';
		}
		return true;
	},
};
