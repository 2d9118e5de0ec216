/**
 * Unit Tests: SensorWindow and RollingStatsTracker
 */

import {
	createWindow,
	pushSample,
	getVariance,
	getValues,
	getMedian,
	getMAD,
	getOldest,
} from '../../../src/engine/window';
import { RollingStatsTracker } from '../../../src/engine/rolling-stats';
import { createFusedReading, at, MINUTE } from '../../helpers/fixtures';

describe('SensorWindow', () => {
	it('should keep Welford mean and variance exact across count eviction', () => {
		const window = createWindow(3, 60 * MINUTE);
		pushSample(window, 1, at(0));
		pushSample(window, 2, at(1));
		pushSample(window, 3, at(2));

		expect(window.mean).toBeCloseTo(2, 10);
		expect(getVariance(window)).toBeCloseTo(1, 10);

		const evicted = pushSample(window, 4, at(3));

		expect(evicted).toBe(1);
		expect(getValues(window)).toEqual([2, 3, 4]);
		expect(window.mean).toBeCloseTo(3, 10);
		expect(getVariance(window)).toBeCloseTo(1, 10);
	});

	it('should evict samples older than the age bound', () => {
		const window = createWindow(10, 10 * MINUTE);
		pushSample(window, 1, at(0));
		pushSample(window, 2, at(5));

		const evicted = pushSample(window, 3, at(12));

		expect(evicted).toBe(1);
		expect(getValues(window)).toEqual([2, 3]);
		expect(getOldest(window)).toEqual({ value: 2, timestamp: at(5) });
		expect(window.mean).toBeCloseTo(2.5, 10);
	});

	it('should compute the robust envelope on demand', () => {
		const window = createWindow(10, 60 * MINUTE);
		[1, 2, 3, 4, 100].forEach((value, i) => pushSample(window, value, at(i)));

		expect(getMedian(window)).toBe(3);
		expect(getMAD(window)).toBe(1);
	});
});

describe('RollingStatsTracker', () => {
	const options = { durationMs: 60 * MINUTE, maxSamples: 720 };

	it('should report slopes in °C per minute once the segment is long enough', () => {
		const tracker = new RollingStatsTracker('sensor-a', options);

		const first = tracker.update(createFusedReading(0, 2.0));
		expect(first.shortTermSlope).toBeNull();
		expect(first.longTermSlope).toBeNull();
		expect(first.variance).toBe(0);

		const second = tracker.update(createFusedReading(1, 2.5));
		expect(second.shortTermSlope).toBeNull();
		expect(second.longTermSlope).toBeCloseTo(0.5, 10);

		const third = tracker.update(createFusedReading(2, 3.5));
		expect(third.count).toBe(3);
		expect(third.segmentCount).toBe(3);
		expect(third.mean).toBeCloseTo(8 / 3, 10);
		expect(third.variance).toBeCloseTo(7 / 12, 10);
		expect(third.shortTermSlope).toBeCloseTo(0.75, 10);
		expect(third.longTermSlope).toBeCloseTo(0.75, 10);
		expect(third.lastValue).toBe(3.5);
		expect(third.lastTimestamp).toBe(at(2));
	});

	it('should not measure slopes across a gap', () => {
		const tracker = new RollingStatsTracker('sensor-a', options);
		tracker.update(createFusedReading(0, 2.0));
		tracker.update(createFusedReading(1, 2.5));
		tracker.update(createFusedReading(2, 3.5));

		tracker.markGap();
		const afterGap = tracker.update(createFusedReading(30, 3.0));

		expect(afterGap.segmentCount).toBe(1);
		expect(afterGap.count).toBe(4);
		expect(afterGap.shortTermSlope).toBeNull();
		expect(afterGap.longTermSlope).toBeNull();

		const next = tracker.update(createFusedReading(31, 3.2));
		expect(next.longTermSlope).toBeCloseTo(0.2, 10);
		expect(next.shortTermSlope).toBeNull();
	});

	it('should return frozen snapshots and a debug trace', () => {
		const tracker = new RollingStatsTracker('sensor-a', options);
		expect(tracker.trace()).toBeNull();

		const stats = tracker.update(createFusedReading(0, 4));
		tracker.update(createFusedReading(1, 2));
		tracker.update(createFusedReading(2, 3));

		expect(Object.isFrozen(stats)).toBe(true);
		expect(tracker.trace()).toMatchObject({ min: 2, max: 4, median: 3, mad: 1, count: 3 });
	});
});
