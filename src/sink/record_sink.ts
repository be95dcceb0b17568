import { SinkError } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import type { ObservationRecord } from '../market/types.js';
import { displayValues, formatTimestamp } from './row_format.js';
import type { RecordBackend, SinkOutcome } from './types.js';

export interface RecordSinkOptions {
    /** Rows waiting for the remote backend; beyond this the oldest is dropped */
    remoteQueueLimit?: number;
}

function toSinkError(backend: RecordBackend, error: unknown): SinkError {
    return error instanceof SinkError
        ? error
        : new SinkError(backend.backend, error instanceof Error ? error.message : String(error), { cause: error });
}

/**
 * Writes each record to the durable backend and mirrors it to the remote one.
 *
 * `append` resolves with the durable outcome and never rejects. Remote rows
 * go through a bounded buffer drained by a single writer, so a slow or failing
 * remote store never holds up the durable write.
 */
export class RecordSink {
    private readonly pendingRemote: ObservationRecord[] = [];
    private readonly remoteQueueLimit: number;
    private remoteBusy = false;
    private remoteDrained: Promise<void> = Promise.resolve();

    constructor(
        private readonly durable: RecordBackend,
        private readonly remote: RecordBackend | null = null,
        options: RecordSinkOptions = {}
    ) {
        this.remoteQueueLimit = options.remoteQueueLimit ?? 1000;
    }

    get descriptions(): string[] {
        return this.remote ? [this.durable.description, this.remote.description] : [this.durable.description];
    }

    async append(record: ObservationRecord): Promise<SinkOutcome> {
        this.mirror(record);

        try {
            await this.durable.write(record);
            return { backend: this.durable.backend, ok: true };
        } catch (error) {
            const sinkError = toSinkError(this.durable, error);
            this.report(record, sinkError);
            return { backend: this.durable.backend, ok: false, error: sinkError };
        }
    }

    /**
     * Wait for the durable queue and every buffered remote row
     */
    async close(): Promise<void> {
        await this.durable.close();
        await this.remoteDrained;
        if (this.remote) {
            await this.remote.close();
        }
    }

    private mirror(record: ObservationRecord): void {
        if (!this.remote) {
            return;
        }

        if (this.pendingRemote.length >= this.remoteQueueLimit) {
            const dropped = this.pendingRemote.shift();
            logger.warn('sink.remote.dropped', {
                backend: this.remote.backend,
                marketId: dropped?.marketId,
                timestamp: dropped ? formatTimestamp(dropped.timestamp) : undefined,
                queueLimit: this.remoteQueueLimit,
            });
        }
        this.pendingRemote.push(record);

        if (!this.remoteBusy) {
            this.remoteDrained = this.flushRemote(this.remote);
        }
    }

    private async flushRemote(remote: RecordBackend): Promise<void> {
        this.remoteBusy = true;
        try {
            let next = this.pendingRemote.shift();
            while (next) {
                try {
                    await remote.write(next);
                } catch (error) {
                    this.report(next, toSinkError(remote, error));
                }
                next = this.pendingRemote.shift();
            }
        } finally {
            this.remoteBusy = false;
        }
    }

    private report(record: ObservationRecord, error: SinkError): void {
        const payload = {
            backend: error.backend,
            marketId: record.marketId,
            timestamp: formatTimestamp(record.timestamp),
            sum: displayValues(record).sum,
            error: error.message,
        };

        // Durable failures are errors, remote ones warnings
        if (error.backend === 'durable') {
            logger.error('sink.durable.failed', payload);
        } else {
            logger.warn('sink.remote.failed', payload);
        }
    }
}
