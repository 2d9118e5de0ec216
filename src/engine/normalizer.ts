/**
 * EVENT NORMALIZER
 * =================
 *
 * Converts raw records from either source into a canonical Reading.
 * Pure: no logging, no state.
 *
 * Accepted shapes:
 *   vendor event  { targetName: 'projects/<p>/devices/<id>', eventType?, timestamp?,
 *                   data: { temperature: { value, updateTime } } }
 *   flat record   { sensorId, timestamp, temperature }
 */

import { z } from 'zod';
import type { Reading, ReadingSource } from './types';
import { MalformedRecordError, type MalformedField } from './errors';
import { parseTimestamp } from '../utils/time';

const TimestampSchema = z.union([z.string(), z.number()]);
const TemperatureSchema = z.union([z.number(), z.string()]);

/**
 * Vendor event envelope (historical pages and live stream share it)
 */
export const VendorEventSchema = z.object({
	targetName: z.string().min(1),
	eventType: z.string().optional(),
	timestamp: TimestampSchema.optional(),
	data: z.object({
		temperature: z.object({
			value: TemperatureSchema.optional(),
			updateTime: TimestampSchema.optional(),
		}).optional(),
	}).passthrough(),
});

export const FlatRecordSchema = z.object({
	sensorId: z.string().min(1),
	timestamp: TimestampSchema.optional(),
	temperature: TemperatureSchema.optional(),
});

export type VendorEvent = z.infer<typeof VendorEventSchema>;
export type FlatRecord = z.infer<typeof FlatRecordSchema>;

export type NormalizeResult =
	| { status: 'ok'; reading: Reading }
	| { status: 'ignored'; sensorId: string; eventType: string }
	| { status: 'malformed'; error: MalformedRecordError };

/**
 * Normalize one raw record
 */
export function normalizeRecord(raw: unknown, source: ReadingSource): NormalizeResult {
	const vendor = VendorEventSchema.safeParse(raw);
	if (vendor.success) {
		return fromVendorEvent(vendor.data, source);
	}

	const flat = FlatRecordSchema.safeParse(raw);
	if (flat.success) {
		return build(flat.data.sensorId, flat.data.timestamp, flat.data.temperature, source);
	}

	if (!isObject(raw)) {
		return malformed('record', source, 'not an object');
	}

	// Report against whichever shape the record claims to be
	const issue = 'targetName' in raw ? vendor.error.issues[0] : flat.error.issues[0];
	const sensorId = typeof raw.sensorId === 'string' ? raw.sensorId : undefined;
	const field = issue ? fieldOf(issue.path) : 'record';
	const detail = issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'unrecognized record shape';
	return malformed(field, source, detail, sensorId);
}

function fromVendorEvent(event: VendorEvent, source: ReadingSource): NormalizeResult {
	const sensorId = event.targetName.split('/').pop();
	if (!sensorId) {
		return malformed('sensorId', source, `cannot derive sensor id from '${event.targetName}'`);
	}

	const temperature = event.data.temperature;
	if (!temperature) {
		// Only temperature events are modeled; other sensor event types pass through unseen
		const eventType = event.eventType ?? Object.keys(event.data)[0];
		if (eventType !== undefined && eventType !== 'temperature') {
			return { status: 'ignored', sensorId, eventType };
		}
	}

	return build(sensorId, temperature?.updateTime ?? event.timestamp, temperature?.value, source);
}

function build(
	sensorId: string,
	rawTimestamp: string | number | undefined,
	rawTemperature: string | number | undefined,
	source: ReadingSource
): NormalizeResult {
	if (rawTimestamp === undefined) {
		return malformed('timestamp', source, 'missing', sensorId);
	}
	const timestamp = parseTimestamp(rawTimestamp);
	if (timestamp === null) {
		return malformed('timestamp', source, `unparsable value '${rawTimestamp}'`, sensorId);
	}

	if (rawTemperature === undefined) {
		return malformed('temperature', source, 'missing', sensorId);
	}
	const temperatureCelsius = parseTemperature(rawTemperature);
	if (temperatureCelsius === null) {
		return malformed('temperature', source, `unparsable value '${rawTemperature}'`, sensorId);
	}

	return {
		status: 'ok',
		reading: Object.freeze({ sensorId, timestamp, temperatureCelsius, source }),
	};
}

function parseTemperature(value: string | number): number | null {
	const parsed = typeof value === 'number' ? value : value.trim() === '' ? Number.NaN : Number(value);
	return Number.isFinite(parsed) ? parsed : null;
}

function malformed(
	field: MalformedField,
	source: ReadingSource,
	detail: string,
	sensorId?: string
): NormalizeResult {
	return { status: 'malformed', error: new MalformedRecordError(field, source, detail, sensorId) };
}

function fieldOf(issuePath: readonly (string | number)[]): MalformedField {
	if (issuePath.includes('targetName') || issuePath.includes('sensorId')) return 'sensorId';
	if (issuePath.includes('timestamp') || issuePath.includes('updateTime')) return 'timestamp';
	if (issuePath.includes('temperature') || issuePath.includes('value')) return 'temperature';
	return 'record';
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}
