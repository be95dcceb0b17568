import type { Decimal } from 'decimal.js';

/**
 * A monitored binary market
 */
export interface Market {
    readonly id: string;
    readonly name: string;
    readonly endpoint: string;      // CLOB market resource, <host>/markets/<conditionId>
}

/**
 * Best YES/NO prices read in one poll
 */
export interface PriceQuote {
    readonly yes: Decimal;
    readonly no: Decimal;
    readonly yesTokenId: string;
    readonly noTokenId: string;
}

export interface Threshold {
    readonly name: string;
    readonly value: Decimal;
}

/**
 * Ordered, non-empty list of sum cutoffs
 */
export type ThresholdSet = readonly Threshold[];

export interface Classification {
    readonly name: string;
    readonly threshold: Decimal;
    readonly below: boolean;        // sum < threshold, strictly
}

/**
 * One persisted observation
 */
export interface ObservationRecord {
    readonly timestamp: Date;       // UTC, whole seconds
    readonly marketId: string;
    readonly marketName: string;
    readonly yesPrice: Decimal;
    readonly noPrice: Decimal;
    readonly sum: Decimal;
    readonly gap: Decimal;
    readonly classifications: readonly Classification[];
}

/**
 * Which side of the book supplies the "best" price
 */
export type QuoteSide = 'bid' | 'ask';
