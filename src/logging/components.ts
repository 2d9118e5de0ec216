/**
 * Logging Component Names
 *
 * Standardized component names for structured logging.
 * Use these constants instead of hardcoded strings to ensure consistency.
 *
 * Usage:
 *   logger.info('Backfill complete', { component: LogComponents.STREAM_ENGINE });
 */

export const LogComponents = {
  // Runner
  STREAM_ENGINE: 'StreamEngine',

  // Inputs
  NORMALIZER: 'Normalizer',
  HISTORICAL_SOURCE: 'HistoricalSource',
  LIVE_SOURCE: 'LiveSource',

  // Per-sensor pipeline
  FUSION_BUFFER: 'FusionBuffer',
  CLASSIFIER: 'Classifier',

  // Output multiplexing
  COORDINATOR: 'Coordinator',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
