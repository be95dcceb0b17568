import type { SinkBackend, SinkError } from '../infra/errors.js';
import type { ObservationRecord } from '../market/types.js';

/**
 * One durable or remote store of observation rows
 */
export interface RecordBackend {
    readonly backend: SinkBackend;
    readonly description: string;

    /** Prepare the store (create file/tab, write the header row) */
    open(): Promise<void>;

    /** Append one record; rejects with a SinkError */
    write(record: ObservationRecord): Promise<void>;

    /** Wait for queued writes */
    close(): Promise<void>;
}

export type SinkOutcome =
    | { backend: SinkBackend; ok: true }
    | { backend: SinkBackend; ok: false; error: SinkError };
