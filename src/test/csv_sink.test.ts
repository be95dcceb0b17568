import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SinkError } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import { CsvSink } from '../sink/csv_sink.js';
import { MARKET_A, MARKET_B, THRESHOLDS, T0, record } from './fixtures.js';

jest.mock('../infra/logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const HEADER = 'Timestamp_UTC,Market_ID,Market_Name,YES_Price,NO_Price,Sum,Gap_From_One,Below_1.00,Below_0.95,Below_0.90';

describe('CsvSink', () => {
    let dir: string;

    beforeEach(async () => {
        jest.clearAllMocks();
        dir = await mkdtemp(join(tmpdir(), 'gap-monitor-csv-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('creates the file with a header, including missing directories', async () => {
        const path = join(dir, 'nested', 'data.csv');
        const sink = new CsvSink(path, THRESHOLDS);

        await sink.open();

        expect(await readFile(path, 'utf-8')).toBe(`${HEADER}\n`);
    });

    it('appends one line per record', async () => {
        const path = join(dir, 'data.csv');
        const sink = new CsvSink(path, THRESHOLDS);
        await sink.open();

        await sink.write(record('0.45', '0.47'));
        await sink.write(record('0.52', '0.51', MARKET_B));

        expect(await readFile(path, 'utf-8')).toBe([
            HEADER,
            '2024-01-15 09:05:07,market-a,Rates cut in December,0.4500,0.4700,0.9200,0.0800,YES,YES,NO',
            '2024-01-15 09:05:07,market-b,Turnout above 60%,0.5200,0.5100,1.0300,-0.0300,NO,NO,NO',
            '',
        ].join('\n'));
    });

    it('does not repeat the header when reopening an existing file', async () => {
        const path = join(dir, 'data.csv');
        const first = new CsvSink(path, THRESHOLDS);
        await first.open();
        await first.write(record('0.45', '0.47'));

        const second = new CsvSink(path, THRESHOLDS);
        await second.open();
        await second.write(record('0.45', '0.47'));

        const lines = (await readFile(path, 'utf-8')).trimEnd().split('\n');
        expect(lines).toHaveLength(3);
        expect(lines.filter(line => line === HEADER)).toHaveLength(1);
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('warns when an existing file has different columns', async () => {
        const path = join(dir, 'data.csv');
        await writeFile(path, 'Timestamp_UTC,Market_ID\n');

        await new CsvSink(path, THRESHOLDS).open();

        expect(logger.warn).toHaveBeenCalledWith('sink.csv.header_mismatch', {
            path,
            expected: HEADER,
            found: 'Timestamp_UTC,Market_ID',
        });
    });

    it('quotes market names containing commas', async () => {
        const path = join(dir, 'data.csv');
        const sink = new CsvSink(path, THRESHOLDS);
        await sink.open();

        await sink.write(record('0.45', '0.47', { ...MARKET_A, name: 'Rates, December' }));

        const lines = (await readFile(path, 'utf-8')).trimEnd().split('\n');
        expect(lines[1]).toBe('2024-01-15 09:05:07,market-a,"Rates, December",0.4500,0.4700,0.9200,0.0800,YES,YES,NO');
    });

    it('keeps submission order under concurrent writes', async () => {
        const path = join(dir, 'data.csv');
        const sink = new CsvSink(path, THRESHOLDS);
        await sink.open();

        const stamps = Array.from({ length: 25 }, (_, i) => new Date(T0.getTime() + i * 1000));
        await Promise.all(stamps.map(at => sink.write(record('0.45', '0.47', MARKET_A, at))));
        await sink.close();

        const lines = (await readFile(path, 'utf-8')).trimEnd().split('\n').slice(1);
        expect(lines.map(line => line.slice(0, 19))).toEqual(
            stamps.map((_, i) => `2024-01-15 09:05:${String(7 + i).padStart(2, '0')}`)
        );
    });

    it('rejects with a durable SinkError when the file cannot be written', async () => {
        // A directory in place of the file
        const sink = new CsvSink(dir, THRESHOLDS);

        await expect(sink.write(record('0.45', '0.47'))).rejects.toBeInstanceOf(SinkError);
        await expect(sink.write(record('0.45', '0.47'))).rejects.toMatchObject({ backend: 'durable' });
    });
});
