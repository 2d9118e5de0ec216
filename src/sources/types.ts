/**
 * Source contracts
 *
 * Transport, authentication and paging mechanics live behind these
 * interfaces; the engine only sees records.
 */

/**
 * One page of historical records, ascending by time within each sensor
 */
export interface HistoricalPage {
	records: readonly unknown[];
	// Sensors whose history is fully delivered once this page is consumed
	completedSensorIds?: readonly string[];
}

export interface HistoricalSource {
	readonly name: string;
	pages(signal: AbortSignal): AsyncIterable<HistoricalPage>;
}

/**
 * A live session yields records until it ends or throws on transport loss.
 * Calling connect() again opens a new session.
 */
export interface LiveSource {
	readonly name: string;
	connect(signal: AbortSignal): AsyncIterable<unknown>;
}
