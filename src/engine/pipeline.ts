/**
 * Per-sensor pipeline: fusion buffer → rolling statistics → classifier.
 * Each sensor's state is owned by exactly one pipeline.
 */

import type { BackfillStatus, FusedEntry, FusedReading, PipelineStep, Reading, StatsTrace } from './types';
import type { EnvelopeConfig, FusionConfig, Thresholds, WindowConfig } from '../config/schema';
import type { Logger } from '../logging/types';
import type { Clock } from '../utils/time';
import { StreamFusionBuffer } from './fusion-buffer';
import { RollingStatsTracker } from './rolling-stats';
import { AnomalyClassifier } from './classifier';
import { RobustEnvelope } from './envelope';

export interface SensorPipelineOptions {
	fusion: FusionConfig;
	window: WindowConfig;
	envelope: EnvelopeConfig;
	thresholds: Thresholds;
	initialBackfill: BackfillStatus;
	clock: Clock;
	debugTrace?: boolean;
	logger?: Logger;
}

export class SensorPipeline {
	readonly fusion: StreamFusionBuffer;
	readonly tracker: RollingStatsTracker;
	readonly classifier: AnomalyClassifier;
	// Maintained only while tracing
	private readonly envelope: RobustEnvelope | null;

	constructor(readonly sensorId: string, options: SensorPipelineOptions) {
		this.envelope = options.debugTrace
			? new RobustEnvelope(options.envelope, options.thresholds.expectedMaxC)
			: null;
		this.fusion = new StreamFusionBuffer(
			sensorId,
			options.fusion,
			options.initialBackfill,
			options.clock,
			options.logger
		);
		this.tracker = new RollingStatsTracker(sensorId, options.window);
		this.classifier = new AnomalyClassifier(sensorId, options.thresholds, options.logger);
	}

	pushHistorical(reading: Reading): PipelineStep[] {
		return this.process(this.fusion.pushHistorical(reading));
	}

	pushLive(reading: Reading): PipelineStep[] {
		return this.process(this.fusion.pushLive(reading));
	}

	completeBackfill(): PipelineStep[] {
		return this.process(this.fusion.completeBackfill());
	}

	failBackfill(reason: string): PipelineStep[] {
		return this.process(this.fusion.failBackfill(reason));
	}

	releaseExpired(): PipelineStep[] {
		return this.process(this.fusion.releaseExpired());
	}

	flush(): PipelineStep[] {
		return this.process(this.fusion.flush());
	}

	private process(entries: FusedEntry[]): PipelineStep[] {
		return entries.map(entry => {
			if (entry.kind === 'gap') {
				this.tracker.markGap();
				return { entry, stats: null, trace: null, result: this.classifier.onGap(entry) };
			}

			const stats = this.tracker.update(entry);
			return { entry, stats, trace: this.trace(entry), result: this.classifier.classify(entry, stats) };
		});
	}

	private trace(reading: FusedReading): StatsTrace | null {
		if (!this.envelope) return null;

		const point = this.envelope.update(reading.timestamp, reading.temperatureCelsius);
		const window = this.tracker.trace();
		return window ? Object.freeze({ ...window, ...point }) : null;
	}
}
