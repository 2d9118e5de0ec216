/**
 * RECONNECTING LIVE STREAM
 * =========================
 *
 * Wraps a LiveSource so transport loss is retried with bounded exponential
 * backoff. Records replayed after a reconnect are passed through unchanged;
 * the fusion buffer collapses the overlap.
 */

import type { LiveSource } from './types';
import type { LiveConfig } from '../config/schema';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/components';
import { LiveStreamUnavailableError } from '../engine/errors';
import { RetryPolicy, streamErrorClassifier } from '../utils/retry-policy';
import { sleep } from '../utils/time';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export class ReconnectingLiveStream implements LiveSource {
	readonly name: string;
	private reconnects = 0;
	private receivedData = false;

	constructor(
		private readonly source: LiveSource,
		private readonly options: LiveConfig,
		private readonly logger?: Logger,
		private readonly wait: SleepFn = sleep
	) {
		this.name = source.name;
	}

	getReconnectCount(): number {
		return this.reconnects;
	}

	hasReceivedData(): boolean {
		return this.receivedData;
	}

	async *connect(signal: AbortSignal): AsyncGenerator<unknown> {
		const policy = new RetryPolicy(
			{
				maxAttempts: this.options.maxReconnects + 1,
				baseDelayMs: this.options.reconnectBaseDelayMs,
				maxDelayMs: this.options.reconnectMaxDelayMs,
				backoffMultiplier: this.options.backoffMultiplier,
				onRetry: (attempt, error, delayMs, remaining) => {
					this.logger?.warn('Live stream lost, reconnecting', {
						component: LogComponents.LIVE_SOURCE,
						source: this.name,
						attempt,
						delayMs,
						remaining,
						error: error instanceof Error ? error.message : String(error),
					});
				},
				onFailure: (error, totalAttempts) => {
					this.logger?.error('Live stream unavailable, giving up', {
						component: LogComponents.LIVE_SOURCE,
						source: this.name,
						totalAttempts,
						error: error instanceof Error ? error.message : String(error),
					});
				},
			},
			streamErrorClassifier
		);

		while (!signal.aborted) {
			try {
				let sessionHasData = false;
				for await (const record of this.source.connect(signal)) {
					if (signal.aborted) return;
					if (!sessionHasData) {
						sessionHasData = true;
						this.receivedData = true;
						policy.reset();
					}
					yield record;
				}

				this.logger?.info('Live stream ended', {
					component: LogComponents.LIVE_SOURCE,
					source: this.name,
					reconnects: this.reconnects,
				});
				return;
			} catch (error) {
				if (signal.aborted) return;

				const delay = policy.recordFailure(error);
				if (delay === null) {
					throw new LiveStreamUnavailableError(
						this.name,
						policy.getConsecutiveFailures(),
						error,
						this.receivedData
					);
				}

				this.reconnects++;
				await this.wait(delay, signal);
			}
		}
	}
}
