import { describe, it, expect } from '@jest/globals';
import { Decimal } from 'decimal.js';
import {
    formatDecimal,
    formatRow,
    formatTimestamp,
    headerRow,
    thresholdColumn,
    toCsvLine,
} from '../sink/row_format.js';
import { MARKET_B, THRESHOLDS, record } from './fixtures.js';

describe('headerRow', () => {
    it('lists the fixed columns followed by one Below_ column per threshold', () => {
        expect(headerRow(THRESHOLDS)).toEqual([
            'Timestamp_UTC',
            'Market_ID',
            'Market_Name',
            'YES_Price',
            'NO_Price',
            'Sum',
            'Gap_From_One',
            'Below_1.00',
            'Below_0.95',
            'Below_0.90',
        ]);
    });
});

describe('thresholdColumn', () => {
    it('labels thresholds with two decimals', () => {
        expect(thresholdColumn(new Decimal(1))).toBe('Below_1.00');
        expect(thresholdColumn(new Decimal(0.9))).toBe('Below_0.90');
    });

    it('keeps extra precision instead of colliding with a neighbour', () => {
        expect(thresholdColumn(new Decimal('0.925'))).toBe('Below_0.925');
    });
});

describe('formatRow', () => {
    it('formats the opportunity example', () => {
        expect(formatRow(record('0.45', '0.47'))).toEqual([
            '2024-01-15 09:05:07',
            'market-a',
            'Rates cut in December',
            '0.4500',
            '0.4700',
            '0.9200',
            '0.0800',
            'YES',
            'YES',
            'NO',
        ]);
    });

    it('formats a negative gap', () => {
        expect(formatRow(record('0.52', '0.51', MARKET_B)).slice(1)).toEqual([
            'market-b',
            'Turnout above 60%',
            '0.5200',
            '0.5100',
            '1.0300',
            '-0.0300',
            'NO',
            'NO',
            'NO',
        ]);
    });

    it('derives the printed gap from the printed sum', () => {
        // sum 0.92005 rounds half-up to 0.9201; 1 - 0.9201 = 0.0799
        const row = formatRow(record('0.46005', '0.46'));

        expect(row.slice(3, 7)).toEqual(['0.4601', '0.4600', '0.9201', '0.0799']);
    });

    it('prints an even market as a zero gap', () => {
        expect(formatRow(record('0.5', '0.5')).slice(5, 7)).toEqual(['1.0000', '0.0000']);
    });
});

describe('formatDecimal', () => {
    it('never prints negative zero', () => {
        expect(formatDecimal(new Decimal('-0.00001'))).toBe('0.0000');
    });

    it('rounds half away from zero', () => {
        expect(formatDecimal(new Decimal('0.12345'))).toBe('0.1235');
        expect(formatDecimal(new Decimal('-0.12345'))).toBe('-0.1235');
    });
});

describe('formatTimestamp', () => {
    it('prints UTC with zero padding', () => {
        expect(formatTimestamp(new Date(Date.UTC(2025, 2, 4, 5, 6, 7)))).toBe('2025-03-04 05:06:07');
    });
});

describe('toCsvLine', () => {
    it('quotes fields that contain separators or quotes', () => {
        expect(toCsvLine(['a', 'b,c', 'say "hi"'])).toBe('a,"b,c","say ""hi"""\n');
    });
});
