import { SinkError } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import type { ObservationRecord, ThresholdSet } from '../market/types.js';
import type { RowStore } from './google_sheets_store.js';
import { formatRow, headerRow } from './row_format.js';
import type { RecordBackend } from './types.js';
import { WriteQueue } from './write_queue.js';

function message(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Best-effort spreadsheet mirror of the CSV rows
 */
export class SheetsSink implements RecordBackend {
    readonly backend = 'remote' as const;
    private readonly queue = new WriteQueue();
    private readonly header: string[];

    constructor(
        private readonly store: RowStore,
        private readonly tab: string,
        thresholds: ThresholdSet
    ) {
        this.header = headerRow(thresholds);
    }

    get description(): string {
        return `sheets:${this.tab}`;
    }

    async open(): Promise<void> {
        try {
            await this.store.ensureTab(this.tab);
            const existing = await this.store.readHeader(this.tab);

            if (existing.length === 0) {
                await this.store.appendRow(this.tab, this.header);
                logger.info('sink.sheets.header_written', { tab: this.tab, columns: this.header.length });
                return;
            }

            if (existing.join(',') !== this.header.join(',')) {
                logger.warn('sink.sheets.header_mismatch', {
                    tab: this.tab,
                    expected: this.header,
                    found: existing,
                });
            }
        } catch (error) {
            throw new SinkError('remote', `Cannot open sheet tab "${this.tab}": ${message(error)}`, { cause: error });
        }
    }

    write(record: ObservationRecord): Promise<void> {
        const row = formatRow(record);
        return this.queue.run(async () => {
            try {
                await this.store.appendRow(this.tab, row);
            } catch (error) {
                throw new SinkError('remote', `Cannot append to sheet tab "${this.tab}": ${message(error)}`, {
                    cause: error,
                });
            }
        });
    }

    close(): Promise<void> {
        return this.queue.drain();
    }
}
