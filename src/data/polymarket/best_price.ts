import { Decimal } from 'decimal.js';
import { FetchError } from '../../infra/errors.js';
import type { QuoteSide } from '../../market/types.js';
import type { PolyOrderbook, PolyOrderbookLevel } from './types.js';

const PRICE_PATTERN = /^\d+(\.\d+)?$/;

function parsePrice(level: PolyOrderbookLevel, tokenId: string): Decimal {
    const raw = level.price.trim();
    if (!PRICE_PATTERN.test(raw)) {
        throw new FetchError('parse', `Malformed price "${level.price}" in book for token ${tokenId}`);
    }
    return new Decimal(raw);
}

/**
 * Pick the best price from one side of a book.
 *
 * `bid` takes the highest bid, `ask` the lowest ask. The API's level order is
 * not relied upon, so the result only depends on the set of levels.
 */
export function selectBestPrice(book: PolyOrderbook, side: QuoteSide, tokenId: string): Decimal {
    const levels = side === 'bid' ? book.bids : book.asks;

    if (levels.length === 0) {
        throw new FetchError('parse', `No ${side}s in book for token ${tokenId}`);
    }

    let best = parsePrice(levels[0], tokenId);
    for (let i = 1; i < levels.length; i++) {
        const price = parsePrice(levels[i], tokenId);
        if (side === 'bid' ? price.gt(best) : price.lt(best)) {
            best = price;
        }
    }

    return best;
}
