/**
 * Cold-storage stream fusion & online anomaly engine
 */

export * from './engine/types';
export * from './engine/errors';
export { normalizeRecord, VendorEventSchema, FlatRecordSchema } from './engine/normalizer';
export type { NormalizeResult, VendorEvent, FlatRecord } from './engine/normalizer';
export { StreamFusionBuffer } from './engine/fusion-buffer';
export type { FusionCursor, FusionCounters, HeldReading } from './engine/fusion-buffer';
export { RollingStatsTracker } from './engine/rolling-stats';
export { RobustEnvelope } from './engine/envelope';
export { AnomalyClassifier } from './engine/classifier';
export { SensorPipeline } from './engine/pipeline';
export { EngineCoordinator } from './engine/coordinator';
export type { EngineStats, SensorStatus, CoordinatorOptions } from './engine/coordinator';

export * from './config';

export { RecordedHistoricalSource, RecordedLiveSource } from './sources/recorded';
export type { LiveSession, SessionOutcome, RecordedHistoryOptions } from './sources/recorded';
export { ReconnectingLiveStream } from './sources/live-session';
export type { HistoricalPage, HistoricalSource, LiveSource } from './sources/types';

export { StreamEngine } from './stream-engine';
export type { RunSummary, SourceOutcome, SourceStatus, StreamEngineOptions } from './stream-engine';

export { createLogger, logger } from './logging/logger';
export { LogComponents } from './logging/components';
export type { Logger } from './logging/types';
export { systemClock, parseTimestamp } from './utils/time';
export type { Clock } from './utils/time';
