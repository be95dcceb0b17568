import { Decimal } from 'decimal.js';
import type { ObservationRecord, ThresholdSet } from '../market/types.js';

const ONE = new Decimal(1);
const DISPLAY_PLACES = 4;

export const BASE_COLUMNS = [
    'Timestamp_UTC',
    'Market_ID',
    'Market_Name',
    'YES_Price',
    'NO_Price',
    'Sum',
    'Gap_From_One',
] as const;

/**
 * `Below_1.00`, `Below_0.95`; values with more than two decimals keep them all
 */
export function thresholdColumn(value: Decimal): string {
    const label = value.decimalPlaces() <= 2 ? value.toFixed(2) : value.toString();
    return `Below_${label}`;
}

export function headerRow(thresholds: ThresholdSet): string[] {
    return [...BASE_COLUMNS, ...thresholds.map(threshold => thresholdColumn(threshold.value))];
}

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC
 */
export function formatTimestamp(date: Date): string {
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
        + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

function round(value: Decimal): Decimal {
    return value.toDecimalPlaces(DISPLAY_PLACES, Decimal.ROUND_HALF_UP);
}

/**
 * Fixed four decimals, never `-0.0000`
 */
export function formatDecimal(value: Decimal): string {
    const rounded = round(value);
    return (rounded.isZero() ? new Decimal(0) : rounded).toFixed(DISPLAY_PLACES);
}

/**
 * Display values of a record. The gap is derived from the rounded sum so the
 * two printed columns always add up to 1.
 */
export function displayValues(record: ObservationRecord): { yes: string; no: string; sum: string; gap: string } {
    const roundedSum = round(record.sum);
    return {
        yes: formatDecimal(record.yesPrice),
        no: formatDecimal(record.noPrice),
        sum: formatDecimal(roundedSum),
        gap: formatDecimal(ONE.minus(roundedSum)),
    };
}

/**
 * The persisted row, fields in header order
 */
export function formatRow(record: ObservationRecord): string[] {
    const values = displayValues(record);
    return [
        formatTimestamp(record.timestamp),
        record.marketId,
        record.marketName,
        values.yes,
        values.no,
        values.sum,
        values.gap,
        ...record.classifications.map(c => (c.below ? 'YES' : 'NO')),
    ];
}

function csvField(field: string): string {
    return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function toCsvLine(fields: readonly string[]): string {
    return fields.map(csvField).join(',') + '\n';
}
