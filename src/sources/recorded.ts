/**
 * Recorded sources
 *
 * Replay captured input through the source contracts: history split into
 * pages, live input as scripted sessions that end or drop the connection.
 */

import type { HistoricalPage, HistoricalSource, LiveSource } from './types';
import { SourceTransportError } from '../engine/errors';

export interface RecordedHistoryOptions {
	name?: string;
	pageSize?: number;
	// Throw after this many pages, or after the last page when there are fewer (simulates paging failure)
	failAfterPages?: number;
}

export class RecordedHistoricalSource implements HistoricalSource {
	readonly name: string;
	private readonly pageList: HistoricalPage[];
	private readonly failAfterPages?: number;

	constructor(pages: readonly HistoricalPage[], options: RecordedHistoryOptions = {}) {
		this.name = options.name ?? 'recorded-history';
		this.pageList = [...pages];
		this.failAfterPages = options.failAfterPages;
	}

	/**
	 * Split a flat record list into fixed-size pages
	 */
	static fromRecords(records: readonly unknown[], options: RecordedHistoryOptions = {}): RecordedHistoricalSource {
		const pageSize = Math.max(1, options.pageSize ?? 100);
		const pages: HistoricalPage[] = [];
		for (let offset = 0; offset < records.length; offset += pageSize) {
			pages.push({ records: records.slice(offset, offset + pageSize) });
		}
		return new RecordedHistoricalSource(pages, options);
	}

	async *pages(signal: AbortSignal): AsyncGenerator<HistoricalPage> {
		let delivered = 0;
		for (const page of this.pageList) {
			if (signal.aborted) return;
			if (this.failAfterPages !== undefined && delivered >= this.failAfterPages) {
				throw new SourceTransportError(this.name, `paging failed after ${delivered} page(s)`);
			}
			delivered++;
			yield page;
		}

		if (signal.aborted) return;
		if (this.failAfterPages !== undefined) {
			throw new SourceTransportError(this.name, `paging failed after ${delivered} page(s)`);
		}
	}
}

export type SessionOutcome = 'end' | 'disconnect' | 'refuse';

export interface LiveSession {
	records: readonly unknown[];
	// 'end' closes the stream, 'disconnect' drops it after the records, 'refuse' fails to connect
	outcome: SessionOutcome;
}

export class RecordedLiveSource implements LiveSource {
	readonly name: string;
	private readonly sessions: LiveSession[];
	private connections = 0;

	constructor(sessions: readonly LiveSession[], name = 'recorded-live') {
		this.sessions = [...sessions];
		this.name = name;
	}

	getConnectionCount(): number {
		return this.connections;
	}

	async *connect(signal: AbortSignal): AsyncGenerator<unknown> {
		const session = this.sessions[this.connections];
		this.connections++;

		if (!session || session.outcome === 'refuse') {
			throw new SourceTransportError(this.name, 'connection refused');
		}

		for (const record of session.records) {
			if (signal.aborted) return;
			yield record;
		}

		if (session.outcome === 'disconnect') {
			throw new SourceTransportError(this.name, 'stream disconnected');
		}
	}
}
