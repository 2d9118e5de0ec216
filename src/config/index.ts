/**
 * Configuration Module
 * ====================
 *
 * Parsing, environment loading and validation of the engine configuration
 */

import { ConfigValidationError } from '../engine/errors';
import {
	EngineConfigSchema,
	type EngineConfig,
	type EngineConfigInput,
	type Thresholds,
} from './schema';

export * from './schema';

/**
 * Parse raw configuration input, applying defaults.
 * Throws ConfigValidationError on schema or cross-field violations.
 */
export function parseEngineConfig(input: EngineConfigInput = {}): EngineConfig {
	return parseConfig(input);
}

function parseConfig(input: unknown): EngineConfig {
	const parsed = EngineConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new ConfigValidationError(
			parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
		);
	}

	const errors = validateConfig(parsed.data);
	if (errors.length > 0) {
		throw new ConfigValidationError(errors);
	}

	return parsed.data;
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
	let sensors: unknown = undefined;
	if (env.ENGINE_SENSOR_OVERRIDES) {
		try {
			sensors = JSON.parse(env.ENGINE_SENSOR_OVERRIDES);
		} catch (error) {
			const detail = error instanceof Error ? error.message : String(error);
			throw new ConfigValidationError([`ENGINE_SENSOR_OVERRIDES: ${detail}`]);
		}
	}

	const input = {
		fusion: {
			duplicateToleranceMs: readNumber(env, 'ENGINE_DUPLICATE_TOLERANCE_MS'),
			jitterWindowMs: readNumber(env, 'ENGINE_JITTER_WINDOW_MS'),
			holdTimeoutMs: readNumber(env, 'ENGINE_HOLD_TIMEOUT_MS'),
			gapFactor: readNumber(env, 'ENGINE_GAP_FACTOR'),
			intervalHistory: readNumber(env, 'ENGINE_INTERVAL_HISTORY'),
			expectedSamplingIntervalMs: readNumber(env, 'ENGINE_SAMPLING_INTERVAL_MS'),
		},
		window: {
			durationMs: readNumber(env, 'ENGINE_WINDOW_DURATION_MS'),
			maxSamples: readNumber(env, 'ENGINE_WINDOW_MAX_SAMPLES'),
		},
		thresholds: {
			expectedMinC: readNumber(env, 'ENGINE_EXPECTED_MIN_C'),
			expectedMaxC: readNumber(env, 'ENGINE_EXPECTED_MAX_C'),
			marginC: readNumber(env, 'ENGINE_MARGIN_C'),
			slopeThresholdCPerMin: readNumber(env, 'ENGINE_SLOPE_THRESHOLD_C_PER_MIN'),
			debounceSamples: readNumber(env, 'ENGINE_DEBOUNCE_SAMPLES'),
			warmingGracePeriodMs: readNumber(env, 'ENGINE_WARMING_GRACE_MS'),
			recoveryHoldPeriodMs: readNumber(env, 'ENGINE_RECOVERY_HOLD_MS'),
			minSamples: readNumber(env, 'ENGINE_MIN_SAMPLES'),
		},
		envelope: {
			baselineDelayMs: readNumber(env, 'ENGINE_BASELINE_DELAY_MS'),
			robustCycleMs: readNumber(env, 'ENGINE_ROBUST_CYCLE_MS'),
			robustWidthMs: readNumber(env, 'ENGINE_ROBUST_WIDTH_MS'),
			robustWindows: readNumber(env, 'ENGINE_ROBUST_WINDOWS'),
			madMultiplier: readNumber(env, 'ENGINE_MAD_MULTIPLIER'),
			boundMinC: readNumber(env, 'ENGINE_BOUND_MIN_C'),
		},
		live: {
			maxReconnects: readNumber(env, 'ENGINE_MAX_RECONNECTS'),
			reconnectBaseDelayMs: readNumber(env, 'ENGINE_RECONNECT_BASE_DELAY_MS'),
			reconnectMaxDelayMs: readNumber(env, 'ENGINE_RECONNECT_MAX_DELAY_MS'),
		},
		sweepIntervalMs: readNumber(env, 'ENGINE_SWEEP_INTERVAL_MS'),
		debugTrace: env.ENGINE_DEBUG_TRACE === undefined ? undefined : env.ENGINE_DEBUG_TRACE === 'true',
		sensors,
	};

	return parseConfig(input);
}

/**
 * Unset variables stay undefined so schema defaults apply;
 * unparsable ones become NaN and are rejected by the schema.
 */
function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (raw === undefined || raw.trim() === '') {
		return undefined;
	}
	return Number(raw);
}

/**
 * Merge global thresholds with a sensor's overrides
 */
export function resolveThresholds(config: EngineConfig, sensorId: string): Thresholds {
	const overrides = config.sensors[sensorId];
	if (!overrides) {
		return config.thresholds;
	}

	const defined = Object.fromEntries(
		Object.entries(overrides).filter(([, value]) => value !== undefined)
	);
	return { ...config.thresholds, ...defined };
}

/**
 * Cross-field validation (schema handles per-field ranges)
 */
export function validateConfig(config: EngineConfig): string[] {
	const errors: string[] = [];

	errors.push(...validateThresholds('thresholds', config.thresholds));
	for (const sensorId of Object.keys(config.sensors)) {
		errors.push(...validateThresholds(`sensors.${sensorId}`, resolveThresholds(config, sensorId)));
	}

	if (config.live.reconnectMaxDelayMs < config.live.reconnectBaseDelayMs) {
		errors.push('live.reconnectMaxDelayMs must be at least reconnectBaseDelayMs');
	}

	return errors;
}

function validateThresholds(scope: string, thresholds: Thresholds): string[] {
	const errors: string[] = [];

	if (thresholds.expectedMinC >= thresholds.expectedMaxC) {
		errors.push(`${scope}: expectedMinC must be below expectedMaxC`);
	}
	if (thresholds.marginC >= thresholds.expectedMaxC - thresholds.expectedMinC) {
		errors.push(`${scope}: marginC must be smaller than the expected range`);
	}

	return errors;
}

/**
 * Get human-readable configuration summary
 */
export function getConfigSummary(config: EngineConfig): string {
	const t = config.thresholds;
	const tolerance = config.fusion.duplicateToleranceMs === undefined
		? 'half sampling interval'
		: `${config.fusion.duplicateToleranceMs}ms`;

	return `
Anomaly Engine Configuration:
  Expected Range: ${t.expectedMinC}°C .. ${t.expectedMaxC}°C (margin ${t.marginC}°C)
  Slope Threshold: ${t.slopeThresholdCPerMin}°C/min over ${t.debounceSamples} samples
  Warming Grace: ${t.warmingGracePeriodMs / 1000}s
  Recovery Hold: ${t.recoveryHoldPeriodMs / 1000}s
  Min Samples: ${t.minSamples}
  Window: ${config.window.durationMs / 1000}s / ${config.window.maxSamples} samples
  Baseline: ±${config.envelope.baselineDelayMs / 1000}s, robust every ${config.envelope.robustCycleMs / 1000}s over ${config.envelope.robustWindows} windows
  Duplicate Tolerance: ${tolerance}
  Hold Timeout: ${config.fusion.holdTimeoutMs / 1000}s (jitter ${config.fusion.jitterWindowMs}ms)
  Sensor Overrides: ${Object.keys(config.sensors).length}
  Debug Trace: ${config.debugTrace ? 'Yes' : 'No'}
	`.trim();
}
