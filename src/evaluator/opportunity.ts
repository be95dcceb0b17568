import { Decimal } from 'decimal.js';
import type { Market, ObservationRecord, PriceQuote, ThresholdSet } from '../market/types.js';

const ONE = new Decimal(1);

/**
 * Drops sub-second precision; records are stamped to the second
 */
export function truncateToSecond(date: Date): Date {
    return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * Turn one quote into an observation.
 *
 * Sum and gap are exact decimals; every classification compares the
 * unrounded sum, strictly (`sum == threshold` is not below). Prices are
 * recorded as observed, with no bounds check.
 */
export function evaluate(
    quote: PriceQuote,
    thresholds: ThresholdSet,
    market: Market,
    timestamp: Date
): ObservationRecord {
    const sum = quote.yes.plus(quote.no);
    const gap = ONE.minus(sum);

    const classifications = thresholds.map(threshold => Object.freeze({
        name: threshold.name,
        threshold: threshold.value,
        below: sum.lt(threshold.value),
    }));

    return Object.freeze({
        timestamp: truncateToSecond(timestamp),
        marketId: market.id,
        marketName: market.name,
        yesPrice: quote.yes,
        noPrice: quote.no,
        sum,
        gap,
        classifications: Object.freeze(classifications),
    });
}

/**
 * True when the sum is below the first configured threshold
 */
export function isOpportunity(record: ObservationRecord): boolean {
    return record.classifications.length > 0 && record.classifications[0].below;
}
