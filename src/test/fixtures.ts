import { Decimal } from 'decimal.js';
import type { Market, ObservationRecord, PriceQuote, ThresholdSet } from '../market/types.js';
import { evaluate } from '../evaluator/opportunity.js';

export const THRESHOLDS: ThresholdSet = [
    { name: 'primary', value: new Decimal('1.00') },
    { name: 'secondary', value: new Decimal('0.95') },
    { name: 'tertiary', value: new Decimal('0.90') },
];

export const MARKET_A: Market = {
    id: 'market-a',
    name: 'Rates cut in December',
    endpoint: 'https://clob.polymarket.com/markets/0xaaa',
};

export const MARKET_B: Market = {
    id: 'market-b',
    name: 'Turnout above 60%',
    endpoint: 'https://clob.polymarket.com/markets/0xbbb',
};

export const T0 = new Date(Date.UTC(2024, 0, 15, 9, 5, 7, 800));

export function quote(yes: string, no: string): PriceQuote {
    return { yes: new Decimal(yes), no: new Decimal(no), yesTokenId: '111', noTokenId: '222' };
}

export function record(yes: string, no: string, market: Market = MARKET_A, at: Date = T0): ObservationRecord {
    return evaluate(quote(yes, no), THRESHOLDS, market, at);
}
