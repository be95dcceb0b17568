import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { SinkError, type SinkBackend } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import type { ObservationRecord } from '../market/types.js';
import { RecordSink } from '../sink/record_sink.js';
import type { RecordBackend } from '../sink/types.js';
import { record } from './fixtures.js';

jest.mock('../infra/logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

class MemoryBackend implements RecordBackend {
    readonly rows: ObservationRecord[] = [];
    readonly description: string;
    failWith: Error | null = null;
    gate: Promise<void> | null = null;

    constructor(readonly backend: SinkBackend) {
        this.description = `memory:${backend}`;
    }

    async open(): Promise<void> {}

    async write(rec: ObservationRecord): Promise<void> {
        if (this.gate) {
            await this.gate;
        }
        if (this.failWith) {
            throw this.failWith;
        }
        this.rows.push(rec);
    }

    async close(): Promise<void> {}
}

function gate() {
    let open: () => void = () => undefined;
    const promise = new Promise<void>(resolve => {
        open = resolve;
    });
    return { promise, open };
}

describe('RecordSink', () => {
    let durable: MemoryBackend;
    let remote: MemoryBackend;

    beforeEach(() => {
        jest.clearAllMocks();
        durable = new MemoryBackend('durable');
        remote = new MemoryBackend('remote');
    });

    it('writes durably and mirrors to the remote backend', async () => {
        const sink = new RecordSink(durable, remote);
        const rec = record('0.45', '0.47');

        const outcome = await sink.append(rec);
        await sink.close();

        expect(outcome).toEqual({ backend: 'durable', ok: true });
        expect(durable.rows).toEqual([rec]);
        expect(remote.rows).toEqual([rec]);
        expect(sink.descriptions).toEqual(['memory:durable', 'memory:remote']);
    });

    it('works with the durable backend alone', async () => {
        const sink = new RecordSink(durable);

        expect(await sink.append(record('0.45', '0.47'))).toEqual({ backend: 'durable', ok: true });
        expect(sink.descriptions).toEqual(['memory:durable']);
    });

    it('does not wait for a slow remote backend', async () => {
        const slow = gate();
        remote.gate = slow.promise;
        const sink = new RecordSink(durable, remote);

        await sink.append(record('0.45', '0.47'));
        await sink.append(record('0.52', '0.51'));

        expect(durable.rows).toHaveLength(2);
        expect(remote.rows).toHaveLength(0);

        slow.open();
        await sink.close();
        expect(remote.rows.map(r => r.sum.toFixed(4))).toEqual(['0.9200', '1.0300']);
    });

    it('drops the oldest waiting remote row when the buffer is full', async () => {
        const slow = gate();
        remote.gate = slow.promise;
        const sink = new RecordSink(durable, remote, { remoteQueueLimit: 2 });
        const recs = [record('0.10', '0.10'), record('0.20', '0.20'), record('0.30', '0.30'), record('0.40', '0.40')];

        for (const rec of recs) {
            await sink.append(rec);
        }
        slow.open();
        await sink.close();

        expect(durable.rows).toEqual(recs);
        expect(remote.rows).toEqual([recs[0], recs[2], recs[3]]);
        expect(logger.warn).toHaveBeenCalledTimes(1);
        expect(logger.warn).toHaveBeenCalledWith('sink.remote.dropped', {
            backend: 'remote',
            marketId: 'market-a',
            timestamp: '2024-01-15 09:05:07',
            queueLimit: 2,
        });
    });

    it('still persists durably when the remote backend fails', async () => {
        remote.failWith = new SinkError('remote', 'rate limited');
        const sink = new RecordSink(durable, remote);
        const rec = record('0.45', '0.47');

        const outcome = await sink.append(rec);
        await sink.close();

        expect(durable.rows).toEqual([rec]);
        expect(outcome).toEqual({ backend: 'durable', ok: true });
        expect(logger.warn).toHaveBeenCalledWith('sink.remote.failed', {
            backend: 'remote',
            marketId: 'market-a',
            timestamp: '2024-01-15 09:05:07',
            sum: '0.9200',
            error: 'rate limited',
        });
        expect(logger.error).not.toHaveBeenCalled();
    });

    it('keeps mirroring after a remote failure', async () => {
        remote.failWith = new Error('socket hang up');
        const sink = new RecordSink(durable, remote);

        await sink.append(record('0.45', '0.47'));
        await sink.close();
        remote.failWith = null;
        await sink.append(record('0.52', '0.51'));
        await sink.close();

        expect(remote.rows.map(r => r.sum.toFixed(4))).toEqual(['1.0300']);
        expect(logger.warn).toHaveBeenCalledWith('sink.remote.failed', expect.objectContaining({ error: 'socket hang up' }));
    });

    it('still mirrors remotely when the durable backend fails, and logs it as an error', async () => {
        durable.failWith = new SinkError('durable', 'disk full');
        const sink = new RecordSink(durable, remote);

        const outcome = await sink.append(record('0.45', '0.47'));
        await sink.close();

        expect(remote.rows).toHaveLength(1);
        expect(outcome.ok).toBe(false);
        expect(logger.error).toHaveBeenCalledWith('sink.durable.failed', expect.objectContaining({ error: 'disk full' }));
    });

    it('wraps foreign errors in a SinkError for the failing backend', async () => {
        durable.failWith = new Error('EACCES');
        const sink = new RecordSink(durable);

        const outcome = await sink.append(record('0.45', '0.47'));

        if (outcome.ok) {
            throw new Error('expected the durable write to fail');
        }
        expect(outcome.error).toBeInstanceOf(SinkError);
        expect(outcome.error.backend).toBe('durable');
        expect(outcome.error.message).toBe('EACCES');
    });
});
