/**
 * ROBUST ENVELOPE
 * ================
 *
 * Per-sensor baseline (rolling median centred baselineDelayMs behind the
 * newest reading) and upper/lower bounds built from periodic robust samples
 * of the deviation from that baseline:
 *
 *   upper = baseline + max(boundMinC,  median(maxDev) + median(MAD) × madMultiplier)
 *   lower = baseline + min(-boundMinC, median(minDev) - median(MAD) × madMultiplier)
 *
 * Memory is bounded by time: samples older than the widest lookback are
 * pruned, robust samples are capped at robustWindows.
 */

import type { EnvelopePoint } from './types';
import type { EnvelopeConfig } from '../config/schema';
import { median } from '../utils/time';

interface BaselineSample {
	timestamp: number;
	value: number;
	baseline: number;
}

interface RobustSample {
	maxDeviation: number;
	minDeviation: number;
	mad: number;
}

export class RobustEnvelope {
	private samples: BaselineSample[] = [];
	private robust: RobustSample[] = [];
	private lastRobustCycle: number | null = null;

	constructor(
		private readonly options: EnvelopeConfig,
		private readonly storageMaxC: number
	) {}

	/**
	 * Fold a reading (timestamps strictly increasing) and return the envelope at it
	 */
	update(timestamp: number, value: number): EnvelopePoint {
		const { baselineDelayMs, robustCycleMs, robustWindows } = this.options;
		this.prune(timestamp);

		const recent = this.samples
			.filter(sample => sample.timestamp > timestamp - 2 * baselineDelayMs)
			.map(sample => sample.value);
		const baseline = median([...recent, value]);
		this.samples.push({ timestamp, value, baseline });

		if (this.lastRobustCycle === null || timestamp - this.lastRobustCycle > robustCycleMs) {
			this.sampleRobust(timestamp);
		}

		const windows = Math.min(this.robust.length, robustWindows);
		let upperBound = value;
		let lowerBound = value;

		if (windows > 0) {
			const latest = this.robust.slice(-windows);
			const mad = median(latest.map(sample => sample.mad)) * this.options.madMultiplier;
			const maxDeviation = median(latest.map(sample => sample.maxDeviation));
			const minDeviation = median(latest.map(sample => sample.minDeviation));

			upperBound = baseline + Math.max(this.options.boundMinC, maxDeviation + mad);
			lowerBound = baseline + Math.min(-this.options.boundMinC, minDeviation - mad);
		}

		return Object.freeze({
			baseline,
			baselineTimestamp: timestamp - baselineDelayMs,
			upperBound,
			lowerBound,
			robustWindows: windows,
			baselineAboveMax: baseline > this.storageMaxC,
		});
	}

	getRobustSampleCount(): number {
		return this.robust.length;
	}

	/**
	 * Deviation spread over [now - delay - width, now - delay]
	 */
	private sampleRobust(now: number): void {
		const end = now - this.options.baselineDelayMs;
		const start = end - this.options.robustWidthMs;
		const deviations = this.samples
			.filter(sample => sample.timestamp >= start && sample.timestamp <= end)
			.map(sample => sample.value - sample.baseline);

		if (deviations.length > 0) {
			const center = median(deviations);
			this.robust.push({
				maxDeviation: deviations.reduce((a, b) => Math.max(a, b)),
				minDeviation: deviations.reduce((a, b) => Math.min(a, b)),
				mad: median(deviations.map(deviation => Math.abs(deviation - center))),
			});
			if (this.robust.length > this.options.robustWindows) {
				this.robust.shift();
			}
		}

		this.lastRobustCycle = now;
	}

	private prune(now: number): void {
		const { baselineDelayMs, robustWidthMs } = this.options;
		const horizon = now - Math.max(2 * baselineDelayMs, baselineDelayMs + robustWidthMs);

		let stale = 0;
		while (stale < this.samples.length && this.samples[stale].timestamp < horizon) {
			stale++;
		}
		if (stale > 0) {
			this.samples.splice(0, stale);
		}
	}
}
