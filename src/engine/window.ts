/**
 * SENSOR WINDOW - CIRCULAR BUFFER WITH INCREMENTAL STATISTICS
 * =============================================================
 *
 * Bounded sliding window of the most recent readings of one sensor.
 * Bounded by age (relative to the newest reading) and by a count cap.
 * Uses Welford's online algorithm with removal so eviction keeps the
 * mean/variance exact without a full recompute.
 *
 * O(1) amortized per insert; median/MAD are computed lazily (debug trace only).
 */

import { median } from '../utils/time';

export interface SensorWindow {
	values: number[];                // Circular buffer of temperatures
	timestamps: number[];            // Corresponding timestamps
	size: number;                    // Current size (≤ capacity)
	capacity: number;                // Count cap
	maxAgeMs: number;                // Age bound
	head: number;                    // Index of next insertion

	// Welford state
	mean: number;
	m2: number;                      // Sum of squared deviations from the mean
}

/**
 * Create a new sensor window
 */
export function createWindow(capacity: number, maxAgeMs: number): SensorWindow {
	return {
		values: new Array<number>(capacity).fill(0),
		timestamps: new Array<number>(capacity).fill(0),
		size: 0,
		capacity,
		maxAgeMs,
		head: 0,
		mean: 0,
		m2: 0,
	};
}

/**
 * Append a sample, evicting entries that fall outside either bound.
 * Timestamps must be strictly increasing (guaranteed by the fusion buffer).
 *
 * @returns number of evicted samples
 */
export function pushSample(window: SensorWindow, value: number, timestamp: number): number {
	let evicted = 0;

	// Age bound is relative to the incoming sample
	while (window.size > 0 && window.timestamps[oldestIndex(window)] < timestamp - window.maxAgeMs) {
		evictOldest(window);
		evicted++;
	}

	// Count cap
	if (window.size === window.capacity) {
		evictOldest(window);
		evicted++;
	}

	window.values[window.head] = value;
	window.timestamps[window.head] = timestamp;
	window.head = (window.head + 1) % window.capacity;
	window.size++;

	const delta = value - window.mean;
	window.mean += delta / window.size;
	window.m2 += delta * (value - window.mean);

	return evicted;
}

function evictOldest(window: SensorWindow): void {
	const value = window.values[oldestIndex(window)];
	window.size--;

	if (window.size === 0) {
		window.mean = 0;
		window.m2 = 0;
		return;
	}

	// Reverse Welford step
	const previousMean = window.mean;
	window.mean = previousMean - (value - previousMean) / window.size;
	window.m2 = Math.max(0, window.m2 - (value - previousMean) * (value - window.mean));
}

function oldestIndex(window: SensorWindow): number {
	return (window.head - window.size + window.capacity) % window.capacity;
}

/**
 * Index of the sample `back` positions before the newest (0 = newest)
 */
function indexFromNewest(window: SensorWindow, back: number): number {
	return (window.head - 1 - back + window.capacity) % window.capacity;
}

/**
 * Sample variance (n - 1)
 */
export function getVariance(window: SensorWindow): number {
	return window.size > 1 ? window.m2 / (window.size - 1) : 0;
}

export function getStdDev(window: SensorWindow): number {
	return Math.sqrt(getVariance(window));
}

/**
 * Sample `back` positions before the newest, or undefined when out of range
 */
export function sampleFromNewest(
	window: SensorWindow,
	back: number
): { value: number; timestamp: number } | undefined {
	if (back < 0 || back >= window.size) return undefined;

	const index = indexFromNewest(window, back);
	return { value: window.values[index], timestamp: window.timestamps[index] };
}

export function getOldest(window: SensorWindow): { value: number; timestamp: number } | undefined {
	return sampleFromNewest(window, window.size - 1);
}

/**
 * Values in time order (oldest first)
 */
export function getValues(window: SensorWindow): number[] {
	const result: number[] = [];
	for (let back = window.size - 1; back >= 0; back--) {
		result.push(window.values[indexFromNewest(window, back)]);
	}
	return result;
}

/**
 * Get median value
 */
export function getMedian(window: SensorWindow): number {
	return median(getValues(window));
}

/**
 * Get MAD (Median Absolute Deviation)
 * MAD = median(|x - median(x)|)
 */
export function getMAD(window: SensorWindow): number {
	if (window.size === 0) return 0;

	const values = getValues(window);
	const center = median(values);
	return median(values.map(v => Math.abs(v - center)));
}
