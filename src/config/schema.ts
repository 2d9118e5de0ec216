/**
 * ENGINE CONFIGURATION SCHEMA
 * ============================
 *
 * Every threshold the engine uses lives here with its default.
 * Durations are milliseconds, temperatures °C, slopes °C per minute.
 */

import { z } from 'zod';

const MINUTE_MS = 60_000;

/**
 * Stream fusion (merge, hold, gap detection)
 */
export const FusionConfigSchema = z.object({
	// Equality tolerance for duplicates; half the tracked sampling interval when unset
	duplicateToleranceMs: z.number().nonnegative().optional(),
	jitterWindowMs: z.number().nonnegative().default(2_000),
	holdTimeoutMs: z.number().positive().default(30_000),
	gapFactor: z.number().gt(1).default(3),
	intervalHistory: z.number().int().min(2).default(5),
	// Used until enough inter-arrival times have been observed
	expectedSamplingIntervalMs: z.number().positive().optional(),
});

/**
 * Sliding window bounds (whichever evicts first)
 */
export const WindowConfigSchema = z.object({
	durationMs: z.number().positive().default(60 * MINUTE_MS),
	maxSamples: z.number().int().min(3).default(720),
});

/**
 * Classifier thresholds (overridable per sensor)
 */
export const ThresholdsSchema = z.object({
	expectedMinC: z.number().default(0),
	expectedMaxC: z.number().default(4),
	marginC: z.number().nonnegative().default(1),
	slopeThresholdCPerMin: z.number().positive().default(0.5),
	debounceSamples: z.number().int().min(1).default(2),
	warmingGracePeriodMs: z.number().nonnegative().default(15 * MINUTE_MS),
	recoveryHoldPeriodMs: z.number().nonnegative().default(10 * MINUTE_MS),
	minSamples: z.number().int().min(1).default(3),
});

/**
 * Baseline and robust envelope reported in the debug trace.
 * Baseline = rolling median over ±baselineDelayMs, so it lags the newest
 * reading by baselineDelayMs. Every robustCycleMs the deviations from the
 * baseline over the preceding robustWidthMs are sampled (max, min, MAD);
 * bounds use the medians of the last robustWindows samples.
 */
export const EnvelopeConfigSchema = z.object({
	baselineDelayMs: z.number().positive().default(3 * 60 * MINUTE_MS),
	robustCycleMs: z.number().positive().default(16 * 60 * MINUTE_MS),
	robustWidthMs: z.number().positive().default(24 * 60 * MINUTE_MS),
	// 1.5 cycles per day over 5 days
	robustWindows: z.number().int().min(1).default(7),
	madMultiplier: z.number().nonnegative().default(1),
	boundMinC: z.number().nonnegative().default(0),
});

/**
 * Live stream reconnection
 */
export const LiveConfigSchema = z.object({
	maxReconnects: z.number().int().min(0).default(5),
	reconnectBaseDelayMs: z.number().nonnegative().default(1_000),
	reconnectMaxDelayMs: z.number().nonnegative().default(30_000),
	backoffMultiplier: z.number().min(1).default(2),
});

export const EngineConfigSchema = z.object({
	fusion: FusionConfigSchema.default({}),
	window: WindowConfigSchema.default({}),
	thresholds: ThresholdsSchema.default({}),
	sensors: z.record(ThresholdsSchema.partial()).default({}),
	envelope: EnvelopeConfigSchema.default({}),
	live: LiveConfigSchema.default({}),
	sweepIntervalMs: z.number().int().positive().default(1_000),
	debugTrace: z.boolean().default(false),
});

export type FusionConfig = z.infer<typeof FusionConfigSchema>;
export type FusionConfigInput = z.input<typeof FusionConfigSchema>;
export type WindowConfig = z.infer<typeof WindowConfigSchema>;
export type Thresholds = z.infer<typeof ThresholdsSchema>;
export type EnvelopeConfig = z.infer<typeof EnvelopeConfigSchema>;
export type LiveConfig = z.infer<typeof LiveConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
