import { RecordedHistoricalSource, RecordedLiveSource } from '../../../src/sources/recorded';
import { SourceTransportError } from '../../../src/engine/errors';
import type { HistoricalPage } from '../../../src/sources/types';

const drainPages = async (source: RecordedHistoricalSource, signal: AbortSignal): Promise<HistoricalPage[]> => {
	const pages: HistoricalPage[] = [];
	for await (const page of source.pages(signal)) {
		pages.push(page);
	}
	return pages;
};

describe('RecordedHistoricalSource', () => {
	it('should split records into fixed-size pages', async () => {
		const source = RecordedHistoricalSource.fromRecords(['a', 'b', 'c', 'd', 'e'], { pageSize: 2 });

		const pages = await drainPages(source, new AbortController().signal);

		expect(pages.map(page => page.records)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
	});

	it('should fail after the configured number of pages', async () => {
		const source = RecordedHistoricalSource.fromRecords(['a', 'b', 'c'], { pageSize: 1, failAfterPages: 1 });
		const delivered: HistoricalPage[] = [];

		await expect(
			(async () => {
				for await (const page of source.pages(new AbortController().signal)) {
					delivered.push(page);
				}
			})()
		).rejects.toBeInstanceOf(SourceTransportError);
		expect(delivered).toHaveLength(1);
	});

	it('should fail at the end of history when fewer pages exist than the limit', async () => {
		const empty = RecordedHistoricalSource.fromRecords([], { failAfterPages: 0 });
		const short = RecordedHistoricalSource.fromRecords(['a'], { failAfterPages: 3 });

		await expect(drainPages(empty, new AbortController().signal)).rejects.toThrow(
			"Source 'recorded-history' transport failure: paging failed after 0 page(s)"
		);
		await expect(drainPages(short, new AbortController().signal)).rejects.toThrow(
			"Source 'recorded-history' transport failure: paging failed after 1 page(s)"
		);
	});

	it('should stop paging once aborted', async () => {
		const controller = new AbortController();
		controller.abort();
		const source = RecordedHistoricalSource.fromRecords(['a', 'b']);

		await expect(drainPages(source, controller.signal)).resolves.toEqual([]);
	});
});

describe('RecordedLiveSource', () => {
	it('should replay one scripted session per connection', async () => {
		const source = new RecordedLiveSource([
			{ records: [1, 2], outcome: 'end' },
			{ records: [], outcome: 'refuse' },
		]);
		const signal = new AbortController().signal;

		const first: unknown[] = [];
		for await (const record of source.connect(signal)) {
			first.push(record);
		}

		expect(first).toEqual([1, 2]);
		await expect(source.connect(signal).next()).rejects.toThrow("Source 'recorded-live' transport failure: connection refused");
		expect(source.getConnectionCount()).toBe(2);
	});
});
