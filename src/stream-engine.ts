/**
 * STREAM ENGINE
 * ==============
 *
 * Runs a historical and a live source concurrently into one coordinator.
 * Neither source blocks the other; a periodic sweep releases live readings
 * whose hold timeout elapsed. Subscribe to `engine.coordinator` for output.
 */

import type { EngineConfig } from './config/schema';
import type { Logger } from './logging/types';
import { LogComponents } from './logging/components';
import { EngineCoordinator, type EngineStats } from './engine/coordinator';
import { SourcesUnavailableError } from './engine/errors';
import type { HistoricalPage, HistoricalSource, LiveSource } from './sources/types';
import { ReconnectingLiveStream, type SleepFn } from './sources/live-session';
import { systemClock, type Clock } from './utils/time';

export type SourceStatus = 'NOT_CONFIGURED' | 'COMPLETED' | 'FAILED' | 'STOPPED';

export interface SourceOutcome {
	status: SourceStatus;
	delivered: number;
	error?: unknown;
}

export interface RunSummary extends EngineStats {
	historical: SourceOutcome;
	live: SourceOutcome;
	reconnects: number;
}

export interface StreamEngineOptions {
	config: EngineConfig;
	historical?: HistoricalSource;
	live?: LiveSource;
	clock?: Clock;
	logger?: Logger;
	// Reconnect backoff wait (overridable for tests)
	sleep?: SleepFn;
}

export class StreamEngine {
	readonly coordinator: EngineCoordinator;
	private readonly live?: ReconnectingLiveStream;
	private readonly abort = new AbortController();
	private runPromise: Promise<RunSummary> | null = null;

	constructor(private readonly options: StreamEngineOptions) {
		this.coordinator = new EngineCoordinator(options.config, {
			clock: options.clock ?? systemClock,
			logger: options.logger,
		});
		if (options.live) {
			this.live = new ReconnectingLiveStream(options.live, options.config.live, options.logger, options.sleep);
		}
	}

	/**
	 * Consume both sources until they end (or stop() is called) and shut
	 * the coordinator down. Rejects with SourcesUnavailableError when every
	 * configured source failed without delivering data.
	 */
	run(): Promise<RunSummary> {
		if (!this.runPromise) {
			this.runPromise = this.execute();
		}
		return this.runPromise;
	}

	/**
	 * Abort both sources and wait for the clean shutdown
	 */
	async stop(): Promise<RunSummary | null> {
		this.abort.abort();
		return this.runPromise;
	}

	private async execute(): Promise<RunSummary> {
		const { config, historical } = this.options;
		const logger = this.options.logger;
		const signal = this.abort.signal;

		logger?.info('Stream engine starting', {
			component: LogComponents.STREAM_ENGINE,
			historical: historical?.name ?? null,
			live: this.live?.name ?? null,
		});

		if (!historical) {
			this.coordinator.completeBackfill();
		}

		const sweep = setInterval(() => {
			this.coordinator.releaseExpired();
		}, config.sweepIntervalMs);
		sweep.unref();

		let settled: PromiseSettledResult<SourceOutcome>[];
		try {
			settled = await Promise.allSettled([
				this.abortOnFailure(this.consumeHistorical(signal)),
				this.abortOnFailure(this.consumeLive(signal)),
			]);
		} finally {
			clearInterval(sweep);
		}

		const outcomes: SourceOutcome[] = [];
		for (const result of settled) {
			if (result.status === 'rejected') {
				this.coordinator.shutdown();
				throw result.reason;
			}
			outcomes.push(result.value);
		}

		const [historicalOutcome, liveOutcome] = outcomes;
		const configured = outcomes.filter(outcome => outcome.status !== 'NOT_CONFIGURED');

		if (
			configured.length > 0 &&
			configured.every(outcome => outcome.status === 'FAILED' && outcome.delivered === 0)
		) {
			this.coordinator.shutdown();
			logger?.error('No data source available', {
				component: LogComponents.STREAM_ENGINE,
				sources: configured.length,
			});
			throw new SourcesUnavailableError(configured.map(outcome => outcome.error));
		}

		this.coordinator.shutdown();

		const summary: RunSummary = {
			...this.coordinator.getStats(),
			historical: historicalOutcome,
			live: liveOutcome,
			reconnects: this.live?.getReconnectCount() ?? 0,
		};

		logger?.info('Stream engine stopped', {
			component: LogComponents.STREAM_ENGINE,
			historical: historicalOutcome.status,
			live: liveOutcome.status,
			fused: summary.fused,
			anomaliesOpened: summary.anomaliesOpened,
		});

		return summary;
	}

	/**
	 * An internal error in one consumer stops the other, so run() settles
	 */
	private async abortOnFailure(consumer: Promise<SourceOutcome>): Promise<SourceOutcome> {
		try {
			return await consumer;
		} catch (error) {
			this.abort.abort();
			throw error;
		}
	}

	/**
	 * Page through history. Source failures degrade to live-only operation;
	 * errors raised while ingesting propagate.
	 */
	private async consumeHistorical(signal: AbortSignal): Promise<SourceOutcome> {
		const source = this.options.historical;
		if (!source) {
			return { status: 'NOT_CONFIGURED', delivered: 0 };
		}

		const pages = source.pages(signal)[Symbol.asyncIterator]();
		let delivered = 0;

		while (true) {
			let next: IteratorResult<HistoricalPage>;
			try {
				next = await pages.next();
			} catch (error) {
				if (signal.aborted) {
					return { status: 'STOPPED', delivered };
				}
				this.coordinator.failBackfill(error);
				return { status: 'FAILED', delivered, error };
			}

			if (signal.aborted) {
				return { status: 'STOPPED', delivered };
			}
			if (next.done) break;

			for (const record of next.value.records) {
				this.coordinator.ingestHistorical(record);
				delivered++;
			}
			if (next.value.completedSensorIds) {
				this.coordinator.completeBackfill(next.value.completedSensorIds);
			}
		}

		this.coordinator.completeBackfill();
		this.options.logger?.info('Historical backfill complete', {
			component: LogComponents.HISTORICAL_SOURCE,
			source: source.name,
			records: delivered,
		});
		return { status: 'COMPLETED', delivered };
	}

	private async consumeLive(signal: AbortSignal): Promise<SourceOutcome> {
		const live = this.live;
		if (!live) {
			return { status: 'NOT_CONFIGURED', delivered: 0 };
		}

		const records = live.connect(signal)[Symbol.asyncIterator]();
		let delivered = 0;

		while (true) {
			let next: IteratorResult<unknown>;
			try {
				next = await records.next();
			} catch (error) {
				if (signal.aborted) {
					return { status: 'STOPPED', delivered };
				}
				this.options.logger?.error('Live source failed', {
					component: LogComponents.LIVE_SOURCE,
					source: live.name,
					delivered,
					error: error instanceof Error ? error.message : String(error),
				});
				return { status: 'FAILED', delivered, error };
			}

			if (signal.aborted) {
				return { status: 'STOPPED', delivered };
			}
			if (next.done) break;

			this.coordinator.ingestLive(next.value);
			delivered++;
		}

		return { status: 'COMPLETED', delivered };
	}
}
