/**
 * Time utilities shared by the normalizer, fusion buffer and stream engine
 */

const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;

// Epoch values below this are taken as seconds (1e11 s is year 5138)
const EPOCH_SECONDS_LIMIT = 1e11;

const NUMERIC_PATTERN = /^[+-]?\d+(\.\d+)?$/;
const ZONE_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Source of wall-clock time.
 * Injected so hold timeouts can be driven deterministically.
 */
export interface Clock {
	now(): number;
}

export const systemClock: Clock = {
	now: () => Date.now(),
};

/**
 * Convert a source timestamp to UTC epoch milliseconds
 *
 * Accepts ISO-8601 strings (zone-less values are UTC, digits past the
 * millisecond are truncated), epoch seconds, epoch milliseconds and numeric
 * strings. Returns null when the value cannot be interpreted.
 */
export function parseTimestamp(value: unknown): number | null {
	if (typeof value === 'number') {
		return fromEpoch(value);
	}

	if (typeof value !== 'string') {
		return null;
	}

	const trimmed = value.trim();
	if (trimmed.length === 0) {
		return null;
	}

	if (NUMERIC_PATTERN.test(trimmed)) {
		return fromEpoch(Number(trimmed));
	}

	let iso = trimmed.replace(' ', 'T').replace(/(\.\d{3})\d+/, '$1');
	if (iso.includes('T') && !ZONE_PATTERN.test(iso)) {
		iso += 'Z';
	}

	const parsed = Date.parse(iso);
	return Number.isFinite(parsed) ? parsed : null;
}

function fromEpoch(value: number): number | null {
	if (!Number.isFinite(value)) {
		return null;
	}
	const ms = Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * MS_PER_SECOND : value;
	return Math.round(ms);
}

/**
 * Median of a list of numbers (0 for an empty list)
 */
export function median(values: readonly number[]): number {
	if (values.length === 0) return 0;

	const sorted = [...values].sort((a, b) => a - b);
	const mid = Math.floor(sorted.length / 2);

	if (sorted.length % 2 === 0) {
		return (sorted[mid - 1] + sorted[mid]) / 2;
	}
	return sorted[mid];
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise(resolve => {
		if (signal?.aborted) {
			resolve();
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}
