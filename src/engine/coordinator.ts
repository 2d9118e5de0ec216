/**
 * ENGINE COORDINATOR
 * ===================
 *
 * Owns one pipeline (fusion buffer + statistics tracker + classifier) per
 * sensor and multiplexes their output.
 *
 * Events emitted:
 * - 'reading': (FusedReading, ClassificationResult) - Reading released and classified
 * - 'gap': DataGapMarker - Discontinuity detected in a sensor's sequence
 * - 'transition': StateTransition - Classifier state changed
 * - 'anomaly': AnomalyEvent - Event opened or closed
 * - 'stats': StatsTrace - Window statistics (debugTrace only)
 * - 'malformed': MalformedRecordError - Record dropped by the normalizer
 * - 'shutdown': EngineStats - Engine shut down, all input flushed
 */

import { EventEmitter } from 'events';
import type {
	AnomalyEvent,
	AnomalyState,
	BackfillStatus,
	PipelineStep,
	Reading,
	ReadingSource,
	RollingStats,
	StateTransition,
} from './types';
import type { EngineConfig } from '../config/schema';
import { resolveThresholds } from '../config';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/components';
import { systemClock, type Clock } from '../utils/time';
import { normalizeRecord } from './normalizer';
import { EngineClosedError } from './errors';
import { SensorPipeline } from './pipeline';
import type { FusionCounters } from './fusion-buffer';

export interface SensorStatus {
	sensorId: string;
	state: AnomalyState;
	backfill: BackfillStatus;
	lastFusedTimestamp: number | null;
	pendingHistorical: number;
	pendingLive: number;
	expectedIntervalMs: number | null;
	stats: RollingStats | null;
	openEvent: AnomalyEvent | null;
	counters: FusionCounters;
}

export interface EngineStats {
	sensors: number;
	received: Record<ReadingSource, number>;
	malformed: number;
	ignored: number;
	fused: number;
	duplicates: number;
	late: number;
	gaps: number;
	tolerated: number;
	anomaliesOpened: number;
	anomaliesClosed: number;
	openAnomalies: number;
}

export interface CoordinatorOptions {
	clock?: Clock;
	logger?: Logger;
}

export class EngineCoordinator extends EventEmitter {
	private readonly pipelines = new Map<string, SensorPipeline>();
	private readonly completedSensors = new Set<string>();
	private readonly clock: Clock;
	private readonly logger?: Logger;
	private backfillDefault: BackfillStatus = 'PENDING';
	private accepting = true;

	private received: Record<ReadingSource, number> = { HISTORICAL: 0, LIVE: 0 };
	private malformed = 0;
	private ignored = 0;
	private anomaliesOpened = 0;
	private anomaliesClosed = 0;

	constructor(
		private readonly config: EngineConfig,
		options: CoordinatorOptions = {}
	) {
		super();
		this.clock = options.clock ?? systemClock;
		this.logger = options.logger;
	}

	/**
	 * Normalize and route a raw historical record
	 */
	ingestHistorical(raw: unknown): PipelineStep[] {
		return this.ingestRaw(raw, 'HISTORICAL');
	}

	/**
	 * Normalize and route a raw live record
	 */
	ingestLive(raw: unknown): PipelineStep[] {
		return this.ingestRaw(raw, 'LIVE');
	}

	/**
	 * Route an already-normalized reading
	 */
	ingestReading(reading: Reading): PipelineStep[] {
		this.assertAccepting();
		this.received[reading.source]++;

		const pipeline = this.getPipeline(reading.sensorId);
		const steps = reading.source === 'HISTORICAL'
			? pipeline.pushHistorical(reading)
			: pipeline.pushLive(reading);
		return this.publish(steps);
	}

	/**
	 * Mark backfill finished for the given sensors, or for every sensor
	 * (including ones not seen yet) when none are given.
	 */
	completeBackfill(sensorIds?: readonly string[]): PipelineStep[] {
		if (!this.accepting) return [];

		const steps: PipelineStep[] = [];
		if (sensorIds === undefined) {
			if (this.backfillDefault === 'PENDING') {
				this.backfillDefault = 'COMPLETE';
			}
			for (const pipeline of this.pipelines.values()) {
				steps.push(...pipeline.completeBackfill());
			}
		} else {
			for (const sensorId of sensorIds) {
				this.completedSensors.add(sensorId);
				const pipeline = this.pipelines.get(sensorId);
				if (pipeline) {
					steps.push(...pipeline.completeBackfill());
				}
			}
		}

		return this.publish(steps);
	}

	/**
	 * Historical paging failed: every sensor still awaiting backfill
	 * continues live-only.
	 */
	failBackfill(error: unknown): PipelineStep[] {
		if (!this.accepting) return [];

		const reason = error instanceof Error ? error.message : String(error);
		this.logger?.warn('Historical backfill failed', {
			component: LogComponents.COORDINATOR,
			error: reason,
			sensors: this.pipelines.size,
		});

		if (this.backfillDefault === 'PENDING') {
			this.backfillDefault = 'INCOMPLETE';
		}

		const steps: PipelineStep[] = [];
		for (const pipeline of this.pipelines.values()) {
			steps.push(...pipeline.failBackfill(reason));
		}
		return this.publish(steps);
	}

	/**
	 * Release live readings whose hold timeout elapsed (periodic sweep)
	 */
	releaseExpired(): PipelineStep[] {
		if (!this.accepting) return [];

		const steps: PipelineStep[] = [];
		for (const pipeline of this.pipelines.values()) {
			steps.push(...pipeline.releaseExpired());
		}
		return this.publish(steps);
	}

	/**
	 * Stop accepting input, flush held readings and close open events as
	 * INTERRUPTED. Returns every anomaly event emitted during shutdown.
	 */
	shutdown(): AnomalyEvent[] {
		if (!this.accepting) return [];

		const emitted: AnomalyEvent[] = [];
		const collect = (event: AnomalyEvent) => emitted.push(event);
		this.on('anomaly', collect);

		try {
			for (const pipeline of this.pipelines.values()) {
				this.publish(pipeline.flush());
			}
			this.accepting = false;

			for (const pipeline of this.pipelines.values()) {
				const interrupted = pipeline.classifier.interrupt();
				if (interrupted) {
					this.anomaliesClosed++;
					this.emit('anomaly', interrupted);
				}
			}
		} finally {
			this.accepting = false;
			this.off('anomaly', collect);
		}

		const stats = this.getStats();
		this.logger?.info('Engine coordinator shut down', {
			component: LogComponents.COORDINATOR,
			...stats,
			interrupted: emitted.filter(event => event.closeReason === 'SHUTDOWN').length,
		});
		this.emit('shutdown', stats);

		return emitted;
	}

	isAccepting(): boolean {
		return this.accepting;
	}

	getSensorIds(): string[] {
		return Array.from(this.pipelines.keys());
	}

	getSensorStatus(sensorId: string): SensorStatus | undefined {
		const pipeline = this.pipelines.get(sensorId);
		if (!pipeline) return undefined;

		const cursor = pipeline.fusion.getCursor();
		return {
			sensorId,
			state: pipeline.classifier.getState(),
			backfill: pipeline.fusion.getBackfillStatus(),
			lastFusedTimestamp: cursor.lastFusedTimestamp,
			pendingHistorical: cursor.pendingHistoricalTail.length,
			pendingLive: cursor.pendingLiveBuffer.length,
			expectedIntervalMs: pipeline.fusion.getExpectedInterval(),
			stats: pipeline.tracker.snapshot(),
			openEvent: pipeline.classifier.getOpenEvent(),
			counters: pipeline.fusion.getCounters(),
		};
	}

	/**
	 * Get engine statistics
	 */
	getStats(): EngineStats {
		const totals = { fused: 0, duplicates: 0, late: 0, gaps: 0, tolerated: 0 };
		let openAnomalies = 0;

		for (const pipeline of this.pipelines.values()) {
			const counters = pipeline.fusion.getCounters();
			totals.fused += counters.fused;
			totals.duplicates += counters.duplicates;
			totals.late += counters.late;
			totals.gaps += counters.gaps;
			totals.tolerated += counters.tolerated;
			if (pipeline.classifier.getOpenEvent()) {
				openAnomalies++;
			}
		}

		return {
			sensors: this.pipelines.size,
			received: { ...this.received },
			malformed: this.malformed,
			ignored: this.ignored,
			...totals,
			anomaliesOpened: this.anomaliesOpened,
			anomaliesClosed: this.anomaliesClosed,
			openAnomalies,
		};
	}

	private ingestRaw(raw: unknown, source: ReadingSource): PipelineStep[] {
		this.assertAccepting();

		const normalized = normalizeRecord(raw, source);
		switch (normalized.status) {
			case 'ok':
				return this.ingestReading(normalized.reading);

			case 'ignored':
				this.ignored++;
				this.logger?.debug('Ignored non-temperature event', {
					component: LogComponents.NORMALIZER,
					sensorId: normalized.sensorId,
					eventType: normalized.eventType,
				});
				return [];

			case 'malformed':
				this.malformed++;
				this.logger?.warn('Dropped malformed record', {
					component: LogComponents.NORMALIZER,
					source,
					field: normalized.error.field,
					sensorId: normalized.error.sensorId,
					error: normalized.error.message,
				});
				this.emit('malformed', normalized.error);
				return [];
		}
	}

	private assertAccepting(): void {
		if (!this.accepting) {
			throw new EngineClosedError();
		}
	}

	private getPipeline(sensorId: string): SensorPipeline {
		let pipeline = this.pipelines.get(sensorId);
		if (!pipeline) {
			pipeline = new SensorPipeline(sensorId, {
				fusion: this.config.fusion,
				window: this.config.window,
				envelope: this.config.envelope,
				thresholds: resolveThresholds(this.config, sensorId),
				initialBackfill: this.completedSensors.has(sensorId) ? 'COMPLETE' : this.backfillDefault,
				clock: this.clock,
				debugTrace: this.config.debugTrace,
				logger: this.logger,
			});
			this.pipelines.set(sensorId, pipeline);

			this.logger?.debug('Sensor pipeline created', {
				component: LogComponents.COORDINATOR,
				sensorId,
				backfill: pipeline.fusion.getBackfillStatus(),
			});
		}
		return pipeline;
	}

	/**
	 * Emit pipeline output in sequence order
	 */
	private publish(steps: PipelineStep[]): PipelineStep[] {
		for (const step of steps) {
			const { entry, result } = step;

			if (entry.kind === 'gap') {
				this.emit('gap', entry);
			} else {
				this.emit('reading', entry, result);
			}

			if (result.state !== result.previousState) {
				const transition: StateTransition = {
					sensorId: result.sensorId,
					timestamp: result.timestamp,
					from: result.previousState,
					to: result.state,
					note: result.note,
				};
				this.emit('transition', transition);
			}

			for (const event of result.events) {
				if (event.closeReason === null) {
					this.anomaliesOpened++;
				} else {
					this.anomaliesClosed++;
				}
				this.emit('anomaly', event);
			}

			if (step.trace) {
				this.emit('stats', step.trace);
			}
		}
		return steps;
	}
}
