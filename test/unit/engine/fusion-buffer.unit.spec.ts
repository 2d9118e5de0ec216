/**
 * Unit Tests: StreamFusionBuffer
 * ==============================
 *
 * Test Categories:
 * 1. Merge idempotence (re-delivered batches, reconnect replay)
 * 2. Ordering (jittered live input, hold until backfill catches up)
 * 3. Duplicate resolution (live wins while both pending)
 * 4. Hold timeout and backfill failure annotations
 * 5. Gap detection
 */

import { StreamFusionBuffer } from '../../../src/engine/fusion-buffer';
import type { FusedEntry, FusedReading } from '../../../src/engine/types';
import { FusionConfigSchema, type FusionConfigInput } from '../../../src/config/schema';
import { createReading, createFakeClock, at, MINUTE, type FakeClock } from '../../helpers/fixtures';
import { createMockLogger } from '../../helpers/mock-logger';

const fusionConfig = (overrides: FusionConfigInput = {}) => FusionConfigSchema.parse(overrides);

const timestamps = (entries: FusedEntry[]) => entries.map(entry => entry.timestamp);

const readingsOnly = (entries: FusedEntry[]): FusedReading[] =>
	entries.filter((entry): entry is FusedReading => entry.kind === 'reading');

describe('StreamFusionBuffer', () => {
	let clock: FakeClock;

	beforeEach(() => {
		clock = createFakeClock();
	});

	describe('merge idempotence', () => {
		it('should fuse a re-delivered historical batch once', () => {
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'PENDING', clock);
			const batch = [0, 1, 2, 3].map(minute => createReading(minute, 3));

			const first = batch.flatMap(reading => buffer.pushHistorical(reading));
			const second = batch.flatMap(reading => buffer.pushHistorical(reading));

			expect(timestamps(first)).toEqual([at(0), at(1), at(2), at(3)]);
			expect(second).toEqual([]);
			expect(buffer.getCounters()).toEqual({ fused: 4, duplicates: 1, late: 3, gaps: 0, tolerated: 0 });
		});

		it('should collapse the overlap replayed after a live reconnect', () => {
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig({ jitterWindowMs: 0 }), 'COMPLETE', clock);

			const released = [0, 1, 2, 1, 2, 3].flatMap(minute => buffer.pushLive(createReading(minute, 3, 'LIVE')));

			expect(timestamps(released)).toEqual([at(0), at(1), at(2), at(3)]);
			expect(buffer.getCounters()).toMatchObject({ fused: 4, duplicates: 1, late: 1 });
		});
	});

	describe('ordering', () => {
		it('should release jittered live readings in timestamp order', () => {
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'COMPLETE', clock);

			expect(buffer.pushLive(createReading(0, 3, 'LIVE'))).toEqual([]);
			expect(timestamps(buffer.pushLive(createReading(2, 3, 'LIVE')))).toEqual([at(0)]);
			expect(timestamps(buffer.pushLive(createReading(1, 3, 'LIVE')))).toEqual([at(1)]);
			expect(timestamps(buffer.pushLive(createReading(3, 3, 'LIVE')))).toEqual([at(2)]);
			expect(timestamps(buffer.flush())).toEqual([at(3)]);
		});

		it('should hold live readings until backfill catches up', () => {
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'PENDING', clock);

			expect(buffer.pushLive(createReading(5, 4, 'LIVE'))).toEqual([]);
			expect(buffer.pushLive(createReading(6, 4, 'LIVE'))).toEqual([]);
			expect(buffer.getCursor().pendingLiveBuffer).toHaveLength(2);

			const historical = [3, 4].flatMap(minute => buffer.pushHistorical(createReading(minute, 3)));
			expect(timestamps(historical)).toEqual([at(3), at(4)]);

			expect(timestamps(buffer.completeBackfill())).toEqual([at(5)]);
			expect(buffer.getCursor().lastFusedTimestamp).toBe(at(5));
		});
	});

	describe('duplicate resolution', () => {
		it('should let the live reading win while both are pending', () => {
			const buffer = new StreamFusionBuffer(
				'sensor-a',
				fusionConfig({ duplicateToleranceMs: 15_000 }),
				'PENDING',
				clock
			);

			expect(buffer.pushLive(createReading(5, 3.0, 'LIVE'))).toEqual([]);
			expect(buffer.pushHistorical(createReading(6, 2.0))).toEqual([]);

			const liveDuplicate = { ...createReading(6, 3.1, 'LIVE'), timestamp: at(6) + 5_000 };
			const released = buffer.pushLive(liveDuplicate);
			expect(readingsOnly(released).map(reading => reading.source)).toEqual(['LIVE']);
			expect(timestamps(released)).toEqual([at(5)]);

			expect(buffer.completeBackfill()).toEqual([]);
			clock.advance(2_000);
			const rest = readingsOnly(buffer.releaseExpired());

			expect(rest).toEqual([
				{
					kind: 'reading',
					sensorId: 'sensor-a',
					timestamp: at(6) + 5_000,
					temperatureCelsius: 3.1,
					source: 'LIVE',
					annotations: [],
				},
			]);
			expect(buffer.getCounters()).toMatchObject({ fused: 2, duplicates: 1 });
		});

		it('should drop a historical reading already covered by a pending live one', () => {
			const buffer = new StreamFusionBuffer(
				'sensor-a',
				fusionConfig({ duplicateToleranceMs: 15_000 }),
				'PENDING',
				clock
			);

			buffer.pushLive(createReading(5, 3.0, 'LIVE'));
			buffer.pushHistorical(createReading(5, 2.0));
			const released = buffer.completeBackfill();
			clock.advance(2_000);
			released.push(...buffer.releaseExpired());

			expect(readingsOnly(released).map(reading => [reading.source, reading.temperatureCelsius])).toEqual([
				['LIVE', 3.0],
			]);
		});

		it('should keep a released historical reading when the live one arrives later', () => {
			const buffer = new StreamFusionBuffer(
				'sensor-a',
				fusionConfig({ duplicateToleranceMs: 15_000 }),
				'PENDING',
				clock
			);

			expect(timestamps(buffer.pushHistorical(createReading(5, 2.0)))).toEqual([at(5)]);
			expect(buffer.pushLive(createReading(5, 3.0, 'LIVE'))).toEqual([]);
			expect(buffer.flush()).toEqual([]);
			expect(buffer.getCounters()).toMatchObject({ fused: 1, duplicates: 1, late: 0 });
		});
	});

	describe('hold timeout', () => {
		it('should release with GAP_TOLERATED when backfill never catches up', () => {
			const logger = createMockLogger();
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'PENDING', clock, logger);

			buffer.pushLive(createReading(0, 3, 'LIVE'));
			clock.advance(29_999);
			expect(buffer.releaseExpired()).toEqual([]);

			clock.advance(1);
			const released = readingsOnly(buffer.releaseExpired());

			expect(released).toHaveLength(1);
			expect(released[0].annotations).toEqual(['GAP_TOLERATED']);
			expect(buffer.getCounters().tolerated).toBe(1);
			expect(logger.warn.calledOnce).toBe(true);
		});

		it('should annotate readings released after a backfill failure', () => {
			const logger = createMockLogger();
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'PENDING', clock, logger);

			buffer.pushLive(createReading(0, 3, 'LIVE'));
			expect(buffer.failBackfill('page 3 timed out')).toEqual([]);
			expect(buffer.getBackfillStatus()).toBe('INCOMPLETE');

			clock.advance(2_000);
			const released = readingsOnly(buffer.releaseExpired());

			expect(released.map(reading => reading.annotations)).toEqual([['BACKFILL_INCOMPLETE']]);
			expect(logger.warn.firstCall.args[0]).toBe('Backfill incomplete, continuing with live data only');
		});

		it('should flush held readings on shutdown', () => {
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'PENDING', clock);
			buffer.pushLive(createReading(0, 3, 'LIVE'));
			buffer.pushLive(createReading(1, 3, 'LIVE'));

			const flushed = readingsOnly(buffer.flush());

			expect(flushed.map(reading => reading.annotations)).toEqual([['GAP_TOLERATED'], ['GAP_TOLERATED']]);
			expect(buffer.getCursor().pendingLiveBuffer).toEqual([]);
		});
	});

	describe('gap detection', () => {
		it('should emit a DATA_GAP marker before a reading past gapFactor × interval', () => {
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'PENDING', clock);
			[0, 1, 2, 3].forEach(minute => buffer.pushHistorical(createReading(minute, 3)));

			expect(buffer.getExpectedInterval()).toBe(MINUTE);

			const released = buffer.pushHistorical(createReading(10, 3));

			expect(released).toHaveLength(2);
			expect(released[0]).toEqual({
				kind: 'gap',
				sensorId: 'sensor-a',
				timestamp: at(4),
				gapStart: at(3),
				gapEnd: at(10),
				expectedIntervalMs: MINUTE,
			});
			expect(released[1].timestamp).toBe(at(10));
			expect(Object.isFrozen(released[0])).toBe(true);
			expect(buffer.getCounters().gaps).toBe(1);
		});

		it('should not flag a gap before the interval is known', () => {
			const buffer = new StreamFusionBuffer('sensor-a', fusionConfig(), 'PENDING', clock);
			buffer.pushHistorical(createReading(0, 3));

			const released = buffer.pushHistorical(createReading(30, 3));

			expect(released.map(entry => entry.kind)).toEqual(['reading']);
		});

		it('should use the configured sampling interval as a fallback', () => {
			const buffer = new StreamFusionBuffer(
				'sensor-a',
				fusionConfig({ expectedSamplingIntervalMs: MINUTE }),
				'PENDING',
				clock
			);
			buffer.pushHistorical(createReading(0, 3));

			const released = buffer.pushHistorical(createReading(30, 3));

			expect(released.map(entry => entry.kind)).toEqual(['gap', 'reading']);
		});

		it('should learn a new sampling cadence after a gap', () => {
			const buffer = new StreamFusionBuffer(
				'sensor-a',
				fusionConfig({ expectedSamplingIntervalMs: MINUTE }),
				'PENDING',
				clock
			);
			[0, 1, 2, 3, 4, 5].forEach(minute => buffer.pushHistorical(createReading(minute, 3)));

			const released = [10, 15, 20, 25, 30].flatMap(minute => buffer.pushHistorical(createReading(minute, 3)));

			expect(released.map(entry => entry.kind)).toEqual(['gap', 'reading', 'reading', 'reading', 'reading', 'reading']);
			expect(buffer.getExpectedInterval()).toBe(5 * MINUTE);
			expect(buffer.getCounters().gaps).toBe(1);
		});
	});
});
