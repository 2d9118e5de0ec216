/**
 * STREAM FUSION ENGINE - TYPE DEFINITIONS
 * ========================================
 *
 * Canonical records shared by the fusion buffer, rolling statistics tracker,
 * anomaly classifier and coordinator. All timestamps are UTC epoch milliseconds.
 */

export type ReadingSource = 'HISTORICAL' | 'LIVE';

/**
 * Normalized temperature reading from either source
 */
export interface Reading {
	readonly sensorId: string;
	readonly timestamp: number;
	readonly temperatureCelsius: number;
	readonly source: ReadingSource;
}

export type SequenceAnnotation =
	| 'GAP_TOLERATED'         // Released by hold timeout before backfill caught up
	| 'BACKFILL_INCOMPLETE';  // Historical paging failed for this sensor

/**
 * Reading released by the fusion buffer
 */
export interface FusedReading extends Reading {
	readonly kind: 'reading';
	readonly annotations: readonly SequenceAnnotation[];
}

/**
 * Marker entry for a detected discontinuity (carries no temperature).
 * `timestamp` is the time the first missing sample was expected.
 */
export interface DataGapMarker {
	readonly kind: 'gap';
	readonly sensorId: string;
	readonly timestamp: number;
	readonly gapStart: number;
	readonly gapEnd: number;
	readonly expectedIntervalMs: number;
}

export type FusedEntry = FusedReading | DataGapMarker;

export type BackfillStatus = 'PENDING' | 'COMPLETE' | 'INCOMPLETE';

/**
 * Rolling statistics over a sensor window.
 * Slopes are in °C per minute and null until enough readings exist
 * since the last gap.
 */
export interface RollingStats {
	readonly sensorId: string;
	readonly count: number;
	readonly segmentCount: number;
	readonly mean: number;
	readonly variance: number;
	readonly stdDev: number;
	readonly lastValue: number;
	readonly lastTimestamp: number;
	readonly shortTermSlope: number | null;
	readonly longTermSlope: number | null;
}

/**
 * Window statistics with the robust spread measures
 */
export interface WindowTrace extends RollingStats {
	readonly min: number;
	readonly max: number;
	readonly median: number;
	readonly mad: number;
}

/**
 * Delayed baseline and the envelope around it
 */
export interface EnvelopePoint {
	readonly baseline: number;
	readonly baselineTimestamp: number;  // Newest reading minus the baseline delay
	readonly upperBound: number;
	readonly lowerBound: number;
	readonly robustWindows: number;      // Robust samples behind the bounds (0 = bounds follow the reading)
	readonly baselineAboveMax: boolean;  // Baseline above expectedMaxC
}

/**
 * Debug trace snapshot
 */
export type StatsTrace = WindowTrace & EnvelopePoint;

export type AnomalyState = 'NORMAL' | 'WARMING' | 'ANOMALOUS' | 'RECOVERING';

export type AnomalyClassification =
	| 'THRESHOLD_BREACH'     // Hard threshold crossed after the WARMING debounce
	| 'SUSTAINED_EXCURSION'  // Soft threshold held past the grace period
	| 'INTERRUPTED';         // Still open at shutdown

export type AnomalyCloseReason = 'RECOVERED' | 'DATA_GAP' | 'SHUTDOWN';

/**
 * Anomaly event snapshot. `endTime` is null while the event is open.
 */
export interface AnomalyEvent {
	readonly id: string;
	readonly sensorId: string;
	readonly startTime: number;
	readonly endTime: number | null;
	readonly peakTemperature: number;
	readonly classification: AnomalyClassification;
	readonly closeReason: AnomalyCloseReason | null;
}

export type ClassificationNote =
	| 'INSUFFICIENT_SAMPLES'  // Not enough readings yet for the window to be meaningful
	| 'UNVERIFIED_GAP'        // Forced NORMAL by a data gap, awaiting fresh samples
	| 'BELOW_RANGE';          // Temperature under expectedMinC

/**
 * Outcome of feeding one fused entry to the classifier
 */
export interface ClassificationResult {
	readonly sensorId: string;
	readonly timestamp: number;
	readonly state: AnomalyState;
	readonly previousState: AnomalyState;
	readonly note: ClassificationNote | null;
	readonly events: readonly AnomalyEvent[];
}

export interface StateTransition {
	readonly sensorId: string;
	readonly timestamp: number;
	readonly from: AnomalyState;
	readonly to: AnomalyState;
	readonly note: ClassificationNote | null;
}

/**
 * Per-entry output of a sensor pipeline
 */
export interface PipelineStep {
	readonly entry: FusedEntry;
	readonly stats: RollingStats | null;
	readonly trace: StatsTrace | null;  // Only when debug tracing is enabled
	readonly result: ClassificationResult;
}
