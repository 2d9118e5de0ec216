/**
 * Engine errors
 */

import type { ReadingSource } from './types';

export type MalformedField = 'record' | 'sensorId' | 'timestamp' | 'temperature';

export class MalformedRecordError extends Error {
	readonly code = 'MALFORMED_RECORD' as const;

	constructor(
		readonly field: MalformedField,
		readonly source: ReadingSource,
		detail: string,
		readonly sensorId?: string
	) {
		super(`Malformed ${source.toLowerCase()} record (${field}): ${detail}`);
		this.name = 'MalformedRecordError';
	}
}

export class SourcesUnavailableError extends Error {
	readonly code = 'SOURCES_UNAVAILABLE' as const;

	constructor(readonly causes: readonly unknown[]) {
		super(
			`No data source available at start: ` +
			causes.map(cause => (cause instanceof Error ? cause.message : String(cause))).join('; ')
		);
		this.name = 'SourcesUnavailableError';
	}
}

export class LiveStreamUnavailableError extends Error {
	readonly code = 'LIVE_STREAM_UNAVAILABLE' as const;

	constructor(
		sourceName: string,
		readonly attempts: number,
		readonly lastError: unknown,
		readonly receivedData: boolean
	) {
		super(
			`Live source '${sourceName}' unavailable after ${attempts} attempt(s): ` +
			(lastError instanceof Error ? lastError.message : String(lastError))
		);
		this.name = 'LiveStreamUnavailableError';
	}
}

export class EngineClosedError extends Error {
	readonly code = 'ENGINE_CLOSED' as const;

	constructor() {
		super('Engine is shut down and no longer accepts input');
		this.name = 'EngineClosedError';
	}
}

export class ConfigValidationError extends Error {
	readonly code = 'INVALID_CONFIG' as const;

	constructor(readonly errors: readonly string[]) {
		super(`Invalid engine configuration: ${errors.join('; ')}`);
		this.name = 'ConfigValidationError';
	}
}

export class SourceTransportError extends Error {
	readonly code = 'SOURCE_TRANSPORT' as const;

	constructor(readonly sourceName: string, detail: string) {
		super(`Source '${sourceName}' transport failure: ${detail}`);
		this.name = 'SourceTransportError';
	}
}
