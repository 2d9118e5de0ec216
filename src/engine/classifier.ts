/**
 * ANOMALY CLASSIFIER - PER-SENSOR STATE MACHINE
 * ===============================================
 *
 *   NORMAL ──soft threshold / k rising samples──▶ WARMING
 *   WARMING ──hard threshold after k samples / grace elapsed──▶ ANOMALOUS (event opens)
 *   WARMING ──conditions recede──▶ NORMAL (no event)
 *   ANOMALOUS ──below soft threshold──▶ RECOVERING
 *   RECOVERING ──above soft threshold──▶ ANOMALOUS (same event)
 *   RECOVERING ──recovery hold elapsed──▶ NORMAL (event closes)
 *
 * Soft threshold = expectedMaxC - marginC. Time is taken from reading
 * timestamps only, so bursty backfill and real-time input classify alike.
 */

import type {
	AnomalyClassification,
	AnomalyCloseReason,
	AnomalyEvent,
	AnomalyState,
	ClassificationNote,
	ClassificationResult,
	DataGapMarker,
	FusedReading,
	RollingStats,
} from './types';
import type { Thresholds } from '../config/schema';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/components';

interface OpenExcursion {
	id: string;
	startTime: number;
	peakTemperature: number;
	classification: AnomalyClassification;
}

export class AnomalyClassifier {
	private state: AnomalyState = 'NORMAL';
	private slopeStreak = 0;
	private warmingSince: number | null = null;
	private warmingSamples = 0;
	private softSince: number | null = null;
	private recoveringSince: number | null = null;
	private excursionPeak = Number.NEGATIVE_INFINITY;
	private openEvent: OpenExcursion | null = null;
	private lastSeen: number | null = null;
	private awaitingVerification = false;

	constructor(
		readonly sensorId: string,
		private readonly thresholds: Thresholds,
		private readonly logger?: Logger
	) {}

	/**
	 * Classify a fused reading given the tracker's statistics for it
	 */
	classify(reading: FusedReading, stats: RollingStats): ClassificationResult {
		const previousState = this.state;
		const temperature = reading.temperatureCelsius;
		const timestamp = reading.timestamp;
		this.lastSeen = timestamp;

		// Fused and tracked, but not yet classified
		if (stats.segmentCount < this.thresholds.minSamples) {
			const note = this.awaitingVerification ? 'UNVERIFIED_GAP' : 'INSUFFICIENT_SAMPLES';
			return this.result(timestamp, previousState, note, []);
		}
		this.awaitingVerification = false;

		const { expectedMinC, expectedMaxC, marginC, slopeThresholdCPerMin, debounceSamples } = this.thresholds;
		const aboveSoft = temperature > expectedMaxC - marginC;
		const aboveHard = temperature > expectedMaxC;
		const rising = (stats.shortTermSlope ?? 0) > slopeThresholdCPerMin;
		const events: AnomalyEvent[] = [];

		switch (this.state) {
			case 'NORMAL':
				this.slopeStreak = rising ? this.slopeStreak + 1 : 0;
				if (aboveSoft || this.slopeStreak >= debounceSamples) {
					this.enterWarming(timestamp, temperature, aboveSoft);
				}
				break;

			case 'WARMING':
				this.excursionPeak = Math.max(this.excursionPeak, temperature);
				this.slopeStreak = rising ? this.slopeStreak + 1 : 0;
				if (aboveSoft) {
					if (this.softSince === null) this.softSince = timestamp;
				} else {
					this.softSince = null;
				}

				if (aboveHard && this.warmingSamples >= debounceSamples) {
					events.push(this.openExcursion('THRESHOLD_BREACH'));
				} else if (
					this.softSince !== null &&
					timestamp - this.softSince > this.thresholds.warmingGracePeriodMs
				) {
					events.push(this.openExcursion('SUSTAINED_EXCURSION'));
				} else if (!aboveSoft && !rising) {
					this.resetToNormal();
				} else {
					this.warmingSamples++;
				}
				break;

			case 'ANOMALOUS':
				this.trackPeak(temperature);
				if (!aboveSoft) {
					this.state = 'RECOVERING';
					this.recoveringSince = timestamp;
				}
				break;

			case 'RECOVERING':
				this.trackPeak(temperature);
				if (aboveSoft) {
					// Oscillation near the threshold extends the open event
					this.state = 'ANOMALOUS';
					this.recoveringSince = null;
				} else if (
					this.recoveringSince !== null &&
					timestamp - this.recoveringSince >= this.thresholds.recoveryHoldPeriodMs
				) {
					const closed = this.closeExcursion(timestamp, 'RECOVERED');
					if (closed) events.push(closed);
					this.resetToNormal();
				}
				break;
		}

		const note: ClassificationNote | null = temperature < expectedMinC ? 'BELOW_RANGE' : null;
		return this.result(timestamp, previousState, note, events);
	}

	/**
	 * A DATA_GAP marker forces NORMAL; any open event ends at the last
	 * reading before the gap.
	 */
	onGap(marker: DataGapMarker): ClassificationResult {
		const previousState = this.state;
		const events: AnomalyEvent[] = [];

		const closed = this.closeExcursion(marker.gapStart, 'DATA_GAP');
		if (closed) {
			events.push(closed);
			this.logger?.warn('Anomaly event closed by data gap', {
				component: LogComponents.CLASSIFIER,
				sensorId: this.sensorId,
				eventId: closed.id,
				gapStart: marker.gapStart,
				gapEnd: marker.gapEnd,
			});
		}

		this.resetToNormal();
		this.awaitingVerification = true;
		return this.result(marker.timestamp, previousState, 'UNVERIFIED_GAP', events);
	}

	/**
	 * Close the open event at the last seen reading (engine shutdown)
	 */
	interrupt(): AnomalyEvent | null {
		if (!this.openEvent || this.lastSeen === null) {
			return null;
		}
		this.openEvent.classification = 'INTERRUPTED';
		return this.closeExcursion(this.lastSeen, 'SHUTDOWN');
	}

	getState(): AnomalyState {
		return this.state;
	}

	getOpenEvent(): AnomalyEvent | null {
		return this.openEvent ? this.snapshot(this.openEvent, null, null) : null;
	}

	private enterWarming(timestamp: number, temperature: number, aboveSoft: boolean): void {
		this.state = 'WARMING';
		this.warmingSince = timestamp;
		this.warmingSamples = 1;
		this.softSince = aboveSoft ? timestamp : null;
		this.excursionPeak = temperature;
	}

	private openExcursion(classification: AnomalyClassification): AnomalyEvent {
		const startTime = this.warmingSince ?? this.lastSeen ?? 0;
		this.state = 'ANOMALOUS';
		this.openEvent = {
			id: `${this.sensorId}:${startTime}`,
			startTime,
			peakTemperature: this.excursionPeak,
			classification,
		};

		this.logger?.info('Anomaly event opened', {
			component: LogComponents.CLASSIFIER,
			sensorId: this.sensorId,
			eventId: this.openEvent.id,
			classification,
			peakTemperature: this.excursionPeak,
		});

		return this.snapshot(this.openEvent, null, null);
	}

	private closeExcursion(endTime: number, reason: AnomalyCloseReason): AnomalyEvent | null {
		if (!this.openEvent) return null;

		const closed = this.snapshot(this.openEvent, endTime, reason);
		this.openEvent = null;

		this.logger?.info('Anomaly event closed', {
			component: LogComponents.CLASSIFIER,
			sensorId: this.sensorId,
			eventId: closed.id,
			reason,
			durationMs: endTime - closed.startTime,
			peakTemperature: closed.peakTemperature,
		});

		return closed;
	}

	private trackPeak(temperature: number): void {
		if (this.openEvent && temperature > this.openEvent.peakTemperature) {
			this.openEvent.peakTemperature = temperature;
		}
	}

	private resetToNormal(): void {
		this.state = 'NORMAL';
		this.slopeStreak = 0;
		this.warmingSince = null;
		this.warmingSamples = 0;
		this.softSince = null;
		this.recoveringSince = null;
		this.excursionPeak = Number.NEGATIVE_INFINITY;
	}

	private snapshot(
		excursion: OpenExcursion,
		endTime: number | null,
		closeReason: AnomalyCloseReason | null
	): AnomalyEvent {
		return Object.freeze({
			id: excursion.id,
			sensorId: this.sensorId,
			startTime: excursion.startTime,
			endTime,
			peakTemperature: excursion.peakTemperature,
			classification: excursion.classification,
			closeReason,
		});
	}

	private result(
		timestamp: number,
		previousState: AnomalyState,
		note: ClassificationNote | null,
		events: AnomalyEvent[]
	): ClassificationResult {
		return {
			sensorId: this.sensorId,
			timestamp,
			state: this.state,
			previousState,
			note,
			events,
		};
	}
}
