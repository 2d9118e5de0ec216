/**
 * STREAM FUSION BUFFER
 * =====================
 *
 * Merges one sensor's historical backfill (ascending pages) and live stream
 * (real time, jittered, may replay on reconnect) into a single strictly
 * increasing sequence.
 *
 * Release rules:
 * - Historical readings are released as soon as nothing earlier is pending.
 * - Live readings wait until backfill has caught up to their timestamp and
 *   their jitter window has settled, or until the hold timeout elapses
 *   (released with GAP_TOLERATED if backfill was still behind).
 * - Readings within the duplicate tolerance collapse; live wins while both
 *   are pending. Once released a reading is final.
 * - A DATA_GAP marker precedes any reading further than gapFactor × the
 *   expected sampling interval from its predecessor. The interval history
 *   restarts after a gap, so a lasting cadence change is learned again.
 * - A released reading is final: a live reading arriving after the
 *   historical reading for the same time was released is a duplicate.
 */

import type {
	BackfillStatus,
	DataGapMarker,
	FusedEntry,
	FusedReading,
	Reading,
	SequenceAnnotation,
} from './types';
import type { FusionConfig } from '../config/schema';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/components';
import { median, systemClock, type Clock } from '../utils/time';

export interface HeldReading {
	readonly reading: Reading;
	readonly arrivedAt: number;
}

/**
 * Merge bookkeeping for one sensor
 */
export interface FusionCursor {
	lastFusedTimestamp: number | null;
	pendingHistoricalTail: Reading[];
	pendingLiveBuffer: HeldReading[];
}

export interface FusionCounters {
	fused: number;
	duplicates: number;
	late: number;
	gaps: number;
	tolerated: number;
}

const MIN_INTERVAL_SAMPLES = 2;

export class StreamFusionBuffer {
	private readonly cursor: FusionCursor = {
		lastFusedTimestamp: null,
		pendingHistoricalTail: [],
		pendingLiveBuffer: [],
	};
	private readonly counters: FusionCounters = {
		fused: 0,
		duplicates: 0,
		late: 0,
		gaps: 0,
		tolerated: 0,
	};
	private readonly intervals: number[] = [];
	// Set after a gap: the configured fallback no longer applies
	private cadenceReset = false;
	private backfill: BackfillStatus;
	private historicalWatermark: number | null = null;
	private liveHighWater: number | null = null;

	constructor(
		readonly sensorId: string,
		private readonly options: FusionConfig,
		initialBackfill: BackfillStatus = 'PENDING',
		private readonly clock: Clock = systemClock,
		private readonly logger?: Logger
	) {
		this.backfill = initialBackfill;
	}

	/**
	 * Accept a historical reading (pages arrive in ascending order)
	 */
	pushHistorical(reading: Reading): FusedEntry[] {
		this.historicalWatermark = Math.max(this.historicalWatermark ?? reading.timestamp, reading.timestamp);

		if (this.dropIfFused(reading)) {
			return this.drain();
		}

		const tolerance = this.tolerance();
		if (
			findWithin(this.cursor.pendingLiveBuffer, held => held.reading.timestamp, reading.timestamp, tolerance) >= 0 ||
			findWithin(this.cursor.pendingHistoricalTail, pending => pending.timestamp, reading.timestamp, tolerance) >= 0
		) {
			this.counters.duplicates++;
			return this.drain();
		}

		insertSorted(this.cursor.pendingHistoricalTail, reading, pending => pending.timestamp);
		return this.drain();
	}

	/**
	 * Accept a live reading (may be jittered or a reconnect replay)
	 */
	pushLive(reading: Reading): FusedEntry[] {
		this.liveHighWater = Math.max(this.liveHighWater ?? reading.timestamp, reading.timestamp);

		if (this.dropIfFused(reading)) {
			return this.drain();
		}

		const tolerance = this.tolerance();
		if (findWithin(this.cursor.pendingLiveBuffer, held => held.reading.timestamp, reading.timestamp, tolerance) >= 0) {
			this.counters.duplicates++;
			return this.drain();
		}

		// Live carries the authoritative value: displace pending historical duplicates
		let index = findWithin(this.cursor.pendingHistoricalTail, pending => pending.timestamp, reading.timestamp, tolerance);
		while (index >= 0) {
			this.cursor.pendingHistoricalTail.splice(index, 1);
			this.counters.duplicates++;
			index = findWithin(this.cursor.pendingHistoricalTail, pending => pending.timestamp, reading.timestamp, tolerance);
		}

		insertSorted(
			this.cursor.pendingLiveBuffer,
			{ reading, arrivedAt: this.clock.now() },
			held => held.reading.timestamp
		);
		return this.drain();
	}

	/**
	 * Historical source delivered everything for this sensor
	 */
	completeBackfill(): FusedEntry[] {
		if (this.backfill === 'PENDING') {
			this.backfill = 'COMPLETE';
		}
		return this.drain();
	}

	/**
	 * Historical paging terminated early; continue live-only
	 */
	failBackfill(reason: string): FusedEntry[] {
		if (this.backfill === 'PENDING') {
			this.backfill = 'INCOMPLETE';
			this.logger?.warn('Backfill incomplete, continuing with live data only', {
				component: LogComponents.FUSION_BUFFER,
				sensorId: this.sensorId,
				reason,
				lastFusedTimestamp: this.cursor.lastFusedTimestamp,
			});
		}
		return this.drain();
	}

	/**
	 * Release live readings whose hold timeout has elapsed
	 */
	releaseExpired(): FusedEntry[] {
		return this.drain();
	}

	/**
	 * Release everything still pending, in order (end of stream session)
	 */
	flush(): FusedEntry[] {
		const out: FusedEntry[] = [];
		const { pendingHistoricalTail: historical, pendingLiveBuffer: live } = this.cursor;

		while (historical.length > 0 || live.length > 0) {
			const next = this.nextPending();
			if (next === 'historical') {
				this.release(historical.shift(), [], out);
			} else {
				const held = live.shift();
				const caughtUp = held ? this.isCaughtUp(held.reading.timestamp) : true;
				this.release(held?.reading, caughtUp ? [] : ['GAP_TOLERATED'], out);
			}
		}

		return out;
	}

	getBackfillStatus(): BackfillStatus {
		return this.backfill;
	}

	getCursor(): Readonly<FusionCursor> {
		return {
			lastFusedTimestamp: this.cursor.lastFusedTimestamp,
			pendingHistoricalTail: [...this.cursor.pendingHistoricalTail],
			pendingLiveBuffer: [...this.cursor.pendingLiveBuffer],
		};
	}

	getCounters(): Readonly<FusionCounters> {
		return { ...this.counters };
	}

	/**
	 * Median of recent inter-arrival times, falling back to the configured interval
	 */
	getExpectedInterval(): number | null {
		if (this.intervals.length >= MIN_INTERVAL_SAMPLES) {
			return median(this.intervals);
		}
		if (this.cadenceReset) {
			return null;
		}
		return this.options.expectedSamplingIntervalMs ?? null;
	}

	private tolerance(): number {
		if (this.options.duplicateToleranceMs !== undefined) {
			return this.options.duplicateToleranceMs;
		}
		const expected = this.getExpectedInterval();
		return expected === null ? 0 : expected / 2;
	}

	/**
	 * Readings at or before the last fused timestamp are final: count and drop
	 */
	private dropIfFused(reading: Reading): boolean {
		const last = this.cursor.lastFusedTimestamp;
		if (last === null || reading.timestamp > last + this.tolerance()) {
			return false;
		}

		if (Math.abs(reading.timestamp - last) <= this.tolerance()) {
			this.counters.duplicates++;
		} else {
			this.counters.late++;
			this.logger?.debug('Dropped late reading', {
				component: LogComponents.FUSION_BUFFER,
				sensorId: this.sensorId,
				source: reading.source,
				timestamp: reading.timestamp,
				lastFusedTimestamp: last,
			});
		}
		return true;
	}

	private isCaughtUp(timestamp: number): boolean {
		return this.backfill !== 'PENDING' ||
			(this.historicalWatermark !== null && this.historicalWatermark >= timestamp);
	}

	private isJitterSettled(held: HeldReading, now: number): boolean {
		const jitter = this.options.jitterWindowMs;
		if (jitter <= 0) return true;

		const aheadBy = (this.liveHighWater ?? held.reading.timestamp) - held.reading.timestamp;
		return aheadBy >= jitter || now - held.arrivedAt >= jitter;
	}

	private nextPending(): 'historical' | 'live' {
		const historical = this.cursor.pendingHistoricalTail[0];
		const held = this.cursor.pendingLiveBuffer[0];
		if (historical && (!held || historical.timestamp < held.reading.timestamp)) {
			return 'historical';
		}
		return 'live';
	}

	private drain(): FusedEntry[] {
		const out: FusedEntry[] = [];
		const now = this.clock.now();
		const { pendingHistoricalTail: historical, pendingLiveBuffer: live } = this.cursor;

		while (historical.length > 0 || live.length > 0) {
			if (this.nextPending() === 'historical') {
				this.release(historical.shift(), [], out);
				continue;
			}

			const held = live[0];
			const caughtUp = this.isCaughtUp(held.reading.timestamp);

			if (caughtUp && this.isJitterSettled(held, now)) {
				live.shift();
				this.release(held.reading, [], out);
				continue;
			}

			if (now - held.arrivedAt >= this.options.holdTimeoutMs) {
				live.shift();
				if (!caughtUp) {
					this.counters.tolerated++;
					this.logger?.warn('Hold timeout elapsed before backfill caught up', {
						component: LogComponents.FUSION_BUFFER,
						sensorId: this.sensorId,
						timestamp: held.reading.timestamp,
						historicalWatermark: this.historicalWatermark,
					});
				}
				this.release(held.reading, caughtUp ? [] : ['GAP_TOLERATED'], out);
				continue;
			}

			break;
		}

		return out;
	}

	private release(
		reading: Reading | undefined,
		annotations: SequenceAnnotation[],
		out: FusedEntry[]
	): void {
		if (!reading) return;

		const last = this.cursor.lastFusedTimestamp;
		if (last !== null && reading.timestamp <= last) {
			this.counters.late++;
			return;
		}

		if (last !== null) {
			const delta = reading.timestamp - last;
			const expected = this.getExpectedInterval();

			if (expected !== null && delta > this.options.gapFactor * expected) {
				out.push(this.gapMarker(last, reading.timestamp, expected));
				// The sensor may have resumed at a new cadence: learn it afresh
				this.intervals.length = 0;
				this.cadenceReset = true;
			} else {
				this.intervals.push(delta);
				if (this.intervals.length > this.options.intervalHistory) {
					this.intervals.shift();
				}
			}
		}

		if (this.backfill === 'INCOMPLETE') {
			annotations.push('BACKFILL_INCOMPLETE');
		}

		const fused: FusedReading = {
			kind: 'reading',
			sensorId: reading.sensorId,
			timestamp: reading.timestamp,
			temperatureCelsius: reading.temperatureCelsius,
			source: reading.source,
			annotations: Object.freeze(annotations),
		};

		out.push(Object.freeze(fused));
		this.cursor.lastFusedTimestamp = reading.timestamp;
		this.counters.fused++;
	}

	private gapMarker(gapStart: number, gapEnd: number, expectedIntervalMs: number): DataGapMarker {
		this.counters.gaps++;
		this.logger?.info('Data gap detected', {
			component: LogComponents.FUSION_BUFFER,
			sensorId: this.sensorId,
			gapStart,
			gapEnd,
			expectedIntervalMs,
		});

		const marker: DataGapMarker = {
			kind: 'gap',
			sensorId: this.sensorId,
			timestamp: gapStart + expectedIntervalMs,
			gapStart,
			gapEnd,
			expectedIntervalMs,
		};
		return Object.freeze(marker);
	}
}

/**
 * Index of the first item whose timestamp is within `tolerance` of `timestamp`
 */
function findWithin<T>(
	items: readonly T[],
	timestampOf: (item: T) => number,
	timestamp: number,
	tolerance: number
): number {
	return items.findIndex(item => Math.abs(timestampOf(item) - timestamp) <= tolerance);
}

/**
 * Insert keeping ascending timestamp order (appends in the common in-order case)
 */
function insertSorted<T>(items: T[], item: T, timestampOf: (item: T) => number): void {
	let index = items.length;
	while (index > 0 && timestampOf(items[index - 1]) > timestampOf(item)) {
		index--;
	}
	items.splice(index, 0, item);
}
