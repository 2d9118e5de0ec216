/**
 * Unit Tests: ReconnectingLiveStream
 * ==================================
 *
 * Reconnect with backoff, failure-count reset after data, give-up after
 * the reconnect limit and abort handling. The backoff wait is stubbed.
 */

import { stub, type SinonStub } from 'sinon';
import { ReconnectingLiveStream } from '../../../src/sources/live-session';
import { RecordedLiveSource } from '../../../src/sources/recorded';
import { LiveStreamUnavailableError } from '../../../src/engine/errors';
import { LiveConfigSchema } from '../../../src/config/schema';
import type { LiveSource } from '../../../src/sources/types';
import { createMockLogger } from '../../helpers/mock-logger';

const collect = async (stream: LiveSource, signal: AbortSignal = new AbortController().signal): Promise<unknown[]> => {
	const records: unknown[] = [];
	for await (const record of stream.connect(signal)) {
		records.push(record);
	}
	return records;
};

describe('ReconnectingLiveStream', () => {
	let wait: SinonStub;

	beforeEach(() => {
		wait = stub().resolves();
	});

	it('should reconnect transparently after a disconnect', async () => {
		const source = new RecordedLiveSource([
			{ records: ['r0', 'r1'], outcome: 'disconnect' },
			{ records: ['r1', 'r2'], outcome: 'end' },
		]);
		const stream = new ReconnectingLiveStream(source, LiveConfigSchema.parse({}), createMockLogger(), wait);

		const records = await collect(stream);

		expect(records).toEqual(['r0', 'r1', 'r1', 'r2']);
		expect(stream.getReconnectCount()).toBe(1);
		expect(wait.calledOnce).toBe(true);
		expect(wait.firstCall.args[0]).toBe(1_000);
	});

	it('should give up with exponential backoff once reconnects are exhausted', async () => {
		const source = new RecordedLiveSource([]);
		const logger = createMockLogger();
		const stream = new ReconnectingLiveStream(
			source,
			LiveConfigSchema.parse({ maxReconnects: 2, reconnectBaseDelayMs: 1_000 }),
			logger,
			wait
		);

		const error = await collect(stream).then(
			() => null,
			(reason: unknown) => reason
		);

		expect(error).toBeInstanceOf(LiveStreamUnavailableError);
		if (error instanceof LiveStreamUnavailableError) {
			expect(error.attempts).toBe(3);
			expect(error.receivedData).toBe(false);
		}
		expect(source.getConnectionCount()).toBe(3);
		expect(wait.args.map(args => args[0])).toEqual([1_000, 2_000]);
		expect(logger.warn.callCount).toBe(2);
		expect(logger.error.calledOnce).toBe(true);
	});

	it('should reset the failure count once a session delivers data', async () => {
		const source = new RecordedLiveSource([
			{ records: ['a'], outcome: 'disconnect' },
			{ records: ['b'], outcome: 'disconnect' },
		]);
		const stream = new ReconnectingLiveStream(source, LiveConfigSchema.parse({ maxReconnects: 1 }), undefined, wait);
		const received: unknown[] = [];

		let failure: unknown = null;
		try {
			for await (const record of stream.connect(new AbortController().signal)) {
				received.push(record);
			}
		} catch (error) {
			failure = error;
		}

		expect(received).toEqual(['a', 'b']);
		expect(failure).toBeInstanceOf(LiveStreamUnavailableError);
		expect(stream.hasReceivedData()).toBe(true);
		expect(wait.args.map(args => args[0])).toEqual([1_000, 1_000]);
	});

	it('should stop without error when aborted', async () => {
		const controller = new AbortController();
		controller.abort();
		const source = new RecordedLiveSource([{ records: ['r0'], outcome: 'end' }]);
		const stream = new ReconnectingLiveStream(source, LiveConfigSchema.parse({}), undefined, wait);

		await expect(collect(stream, controller.signal)).resolves.toEqual([]);
		expect(source.getConnectionCount()).toBe(0);
	});
});
