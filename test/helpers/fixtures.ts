/**
 * Test Fixtures
 * =============
 *
 * Factory functions for readings, raw records and configuration.
 *
 * Usage:
 *   const reading = createReading(3, 4.5);              // minute 3, 4.5 °C
 *   const event = createVendorEvent('room-1', 3, 4.5);
 */

import type { FusedReading, Reading, ReadingSource } from '../../src/engine/types';
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from '../../src/config';
import type { Clock } from '../../src/utils/time';

export const BASE_TIME = Date.UTC(2024, 0, 15, 8, 0, 0);
export const MINUTE = 60_000;

export const at = (minute: number): number => BASE_TIME + minute * MINUTE;

export const createReading = (
	minute: number,
	temperatureCelsius: number,
	source: ReadingSource = 'HISTORICAL',
	sensorId: string = 'sensor-a'
): Reading => Object.freeze({ sensorId, timestamp: at(minute), temperatureCelsius, source });

export const createFusedReading = (
	minute: number,
	temperatureCelsius: number,
	sensorId: string = 'sensor-a'
): FusedReading => ({
	kind: 'reading',
	sensorId,
	timestamp: at(minute),
	temperatureCelsius,
	source: 'HISTORICAL',
	annotations: [],
});

/**
 * Raw event in the vendor envelope (targetName path + temperature payload)
 */
export const createVendorEvent = (
	sensorId: string,
	minute: number,
	value: number | string,
	project: string = 'cold-chain'
) => ({
	targetName: `projects/${project}/devices/${sensorId}`,
	eventType: 'temperature',
	data: {
		temperature: {
			value,
			updateTime: new Date(at(minute)).toISOString(),
		},
	},
});

export const createFlatRecord = (sensorId: string, minute: number, temperature: number) => ({
	sensorId,
	timestamp: at(minute),
	temperature,
});

export interface FakeClock extends Clock {
	advance(ms: number): void;
}

export const createFakeClock = (start: number = BASE_TIME): FakeClock => {
	let now = start;
	return {
		now: () => now,
		advance: (ms: number) => {
			now += ms;
		},
	};
};

export const createTestConfig = (input: EngineConfigInput = {}): EngineConfig => parseEngineConfig(input);

/**
 * Thresholds used by the hysteresis scenarios: soft threshold 7 °C, hard 8 °C
 */
export const WARM_ROOM_THRESHOLDS = {
	expectedMinC: 0,
	expectedMaxC: 8,
	marginC: 1,
	debounceSamples: 2,
	minSamples: 3,
} as const;
