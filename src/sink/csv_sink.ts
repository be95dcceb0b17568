import { appendFile, mkdir, open, stat } from 'fs/promises';
import { dirname } from 'path';
import { SinkError } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import type { ObservationRecord, ThresholdSet } from '../market/types.js';
import { formatRow, headerRow, toCsvLine } from './row_format.js';
import type { RecordBackend } from './types.js';
import { WriteQueue } from './write_queue.js';

async function fileSize(path: string): Promise<number | null> {
    try {
        return (await stat(path)).size;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return null;
        }
        throw error;
    }
}

async function firstLine(path: string): Promise<string> {
    const handle = await open(path, 'r');
    try {
        const { buffer, bytesRead } = await handle.read(Buffer.alloc(4096), 0, 4096, 0);
        return buffer.toString('utf-8', 0, bytesRead).split(/\r?\n/, 1)[0];
    } finally {
        await handle.close();
    }
}

/**
 * Append-only CSV file; the mandatory backend
 */
export class CsvSink implements RecordBackend {
    readonly backend = 'durable' as const;
    private readonly queue = new WriteQueue();
    private readonly header: string[];

    constructor(private readonly path: string, thresholds: ThresholdSet) {
        this.header = headerRow(thresholds);
    }

    get description(): string {
        return `csv:${this.path}`;
    }

    async open(): Promise<void> {
        try {
            await mkdir(dirname(this.path), { recursive: true });
            const size = await fileSize(this.path);

            if (size === null || size === 0) {
                await appendFile(this.path, toCsvLine(this.header), 'utf-8');
                logger.info('sink.csv.created', { path: this.path, columns: this.header.length });
                return;
            }

            const existing = await firstLine(this.path);
            const expected = toCsvLine(this.header).trimEnd();
            if (existing !== expected) {
                logger.warn('sink.csv.header_mismatch', {
                    path: this.path,
                    expected,
                    found: existing,
                });
            }
        } catch (error) {
            throw new SinkError('durable', `Cannot open ${this.path}: ${error instanceof Error ? error.message : String(error)}`, {
                cause: error,
            });
        }
    }

    write(record: ObservationRecord): Promise<void> {
        const line = toCsvLine(formatRow(record));
        return this.queue.run(async () => {
            try {
                await appendFile(this.path, line, 'utf-8');
            } catch (error) {
                throw new SinkError('durable', `Cannot append to ${this.path}: ${error instanceof Error ? error.message : String(error)}`, {
                    cause: error,
                });
            }
        });
    }

    close(): Promise<void> {
        return this.queue.drain();
    }
}
