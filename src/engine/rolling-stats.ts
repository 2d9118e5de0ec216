/**
 * ROLLING STATISTICS TRACKER
 * ===========================
 *
 * Per-sensor incremental statistics over the fused sequence.
 * Gap markers carry no temperature; they start a new slope segment so
 * rates of change are never measured across a discontinuity.
 */

import type { FusedReading, RollingStats, WindowTrace } from './types';
import type { WindowConfig } from '../config/schema';
import { MS_PER_MINUTE } from '../utils/time';
import {
	createWindow,
	pushSample,
	getVariance,
	getStdDev,
	getValues,
	getMedian,
	getMAD,
	getOldest,
	sampleFromNewest,
	type SensorWindow,
} from './window';

const SHORT_TERM_SAMPLES = 3;

export class RollingStatsTracker {
	private readonly window: SensorWindow;
	private segmentCount = 0;
	private segmentStart: { value: number; timestamp: number } | null = null;
	private latest: RollingStats | null = null;

	constructor(
		readonly sensorId: string,
		options: WindowConfig
	) {
		this.window = createWindow(options.maxSamples, options.durationMs);
	}

	/**
	 * Fold a fused reading into the window
	 */
	update(reading: FusedReading): RollingStats {
		pushSample(this.window, reading.temperatureCelsius, reading.timestamp);

		this.segmentCount++;
		if (this.segmentStart === null) {
			this.segmentStart = { value: reading.temperatureCelsius, timestamp: reading.timestamp };
		}

		this.latest = Object.freeze({
			sensorId: this.sensorId,
			count: this.window.size,
			segmentCount: this.segmentCount,
			mean: this.window.mean,
			variance: getVariance(this.window),
			stdDev: getStdDev(this.window),
			lastValue: reading.temperatureCelsius,
			lastTimestamp: reading.timestamp,
			shortTermSlope: this.shortTermSlope(),
			longTermSlope: this.longTermSlope(reading),
		});
		return this.latest;
	}

	/**
	 * Start a new slope segment after a DATA_GAP marker
	 */
	markGap(): void {
		this.segmentCount = 0;
		this.segmentStart = null;
	}

	snapshot(): RollingStats | null {
		return this.latest;
	}

	/**
	 * Window spread for the debug trace (O(n log n), trace only)
	 */
	trace(): WindowTrace | null {
		if (!this.latest) return null;

		const values = getValues(this.window);
		return Object.freeze({
			...this.latest,
			min: Math.min(...values),
			max: Math.max(...values),
			median: getMedian(this.window),
			mad: getMAD(this.window),
		});
	}

	/**
	 * Average rate of change over the most recent readings of the segment
	 */
	private shortTermSlope(): number | null {
		if (this.segmentCount < SHORT_TERM_SAMPLES) return null;

		const newest = sampleFromNewest(this.window, 0);
		const first = sampleFromNewest(this.window, SHORT_TERM_SAMPLES - 1);
		if (!newest || !first) return null;

		return ratePerMinute(first, newest);
	}

	/**
	 * Average rate of change over the part of the window inside the segment
	 */
	private longTermSlope(reading: FusedReading): number | null {
		if (this.segmentCount < 2 || !this.segmentStart) return null;

		const oldest = getOldest(this.window);
		if (!oldest) return null;

		const anchor = oldest.timestamp >= this.segmentStart.timestamp ? oldest : this.segmentStart;
		if (anchor.timestamp >= reading.timestamp) return null;

		return ratePerMinute(anchor, { value: reading.temperatureCelsius, timestamp: reading.timestamp });
	}
}

function ratePerMinute(
	from: { value: number; timestamp: number },
	to: { value: number; timestamp: number }
): number {
	return (to.value - from.value) / ((to.timestamp - from.timestamp) / MS_PER_MINUTE);
}
