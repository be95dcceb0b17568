import type { z } from 'zod';
import { FetchError } from '../../infra/errors.js';
import { logger } from '../../infra/logger.js';
import type { Market, PriceQuote, QuoteSide } from '../../market/types.js';
import { selectBestPrice } from './best_price.js';
import { clobMarketSchema, orderbookSchema, type ClobMarket } from './types.js';

/**
 * Reads the current best YES/NO prices of a market
 */
export interface PriceFetcher {
    fetchQuote(market: Market, signal?: AbortSignal): Promise<PriceQuote>;
}

export interface ClobPriceFetcherOptions {
    timeoutMs: number;
    side: QuoteSide;
    fetchImpl?: typeof fetch;
}

/**
 * Builds `<host>[/prefix]/book?token_id=<id>` from a market endpoint
 */
export function bookUrl(endpoint: string, tokenId: string): string {
    const url = new URL(endpoint);
    const prefix = url.pathname.replace(/\/markets\/[^/]+\/?$/, '');
    const book = new URL(`${prefix}/book`, url.origin);
    book.searchParams.set('token_id', tokenId);
    return book.toString();
}

interface Deadline {
    signal: AbortSignal;
    timedOut(): boolean;
}

function findOutcomeToken(market: ClobMarket, outcome: 'yes' | 'no', endpoint: string): string {
    const token = market.tokens.find(t => t.outcome.trim().toLowerCase() === outcome);
    if (!token) {
        throw new FetchError('parse', `Market ${endpoint} has no "${outcome}" outcome token`);
    }
    return token.token_id;
}

/**
 * Polymarket CLOB REST price fetcher.
 *
 * One poll is three requests: the market (for its outcome token ids) and the
 * two books, read in parallel, all under a single timeout. Nothing is cached
 * and nothing is retried.
 */
export class ClobPriceFetcher implements PriceFetcher {
    private readonly timeoutMs: number;
    private readonly side: QuoteSide;
    private readonly fetchImpl: typeof fetch;

    constructor(options: ClobPriceFetcherOptions) {
        this.timeoutMs = options.timeoutMs;
        this.side = options.side;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    /**
     * All three requests share one deadline of `timeoutMs`
     */
    async fetchQuote(market: Market, signal?: AbortSignal): Promise<PriceQuote> {
        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.timeoutMs);
        const onAbort = () => controller.abort();

        if (signal?.aborted) {
            controller.abort();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
        }

        try {
            return await this.readQuote(market, { signal: controller.signal, timedOut: () => timedOut });
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
            // Cancels a book request left running by its sibling's failure
            controller.abort();
        }
    }

    private async readQuote(market: Market, deadline: Deadline): Promise<PriceQuote> {
        const clobMarket = await this.getJson(market.endpoint, clobMarketSchema, deadline);

        const yesTokenId = findOutcomeToken(clobMarket, 'yes', market.endpoint);
        const noTokenId = findOutcomeToken(clobMarket, 'no', market.endpoint);

        const [yesBook, noBook] = await Promise.all([
            this.getJson(bookUrl(market.endpoint, yesTokenId), orderbookSchema, deadline),
            this.getJson(bookUrl(market.endpoint, noTokenId), orderbookSchema, deadline),
        ]);

        const quote: PriceQuote = {
            yes: selectBestPrice(yesBook, this.side, yesTokenId),
            no: selectBestPrice(noBook, this.side, noTokenId),
            yesTokenId,
            noTokenId,
        };

        logger.debug('clob.quote', {
            marketId: market.id,
            side: this.side,
            yes: quote.yes.toString(),
            no: quote.no.toString(),
            yesTokenId: quote.yesTokenId,
            noTokenId: quote.noTokenId,
            yesLevels: this.side === 'bid' ? yesBook.bids.length : yesBook.asks.length,
            noLevels: this.side === 'bid' ? noBook.bids.length : noBook.asks.length,
        });

        return quote;
    }

    /**
     * GET a JSON document before the deadline, mapping every failure onto a
     * FetchError kind
     */
    private async getJson<S extends z.ZodTypeAny>(
        url: string,
        schema: S,
        deadline: Deadline
    ): Promise<z.output<S>> {
        let body: unknown;
        try {
            const response = await this.fetchImpl(url, {
                signal: deadline.signal,
                headers: { accept: 'application/json' },
            });

            if (!response.ok) {
                throw new FetchError('protocol', `GET ${url} returned ${response.status} ${response.statusText}`, {
                    status: response.status,
                });
            }

            const text = await response.text();
            try {
                body = JSON.parse(text);
            } catch (error) {
                throw new FetchError('parse', `GET ${url} returned invalid JSON`, { cause: error });
            }
        } catch (error) {
            if (error instanceof FetchError) {
                throw error;
            }
            if (deadline.timedOut()) {
                throw new FetchError('timeout', `GET ${url} timed out after ${this.timeoutMs}ms`, { cause: error });
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new FetchError('network', `GET ${url} failed: ${message}`, { cause: error });
        }

        const result = schema.safeParse(body);
        if (!result.success) {
            const issues = result.error.errors.map(err => `${err.path.join('.') || '(root)'}: ${err.message}`);
            throw new FetchError('parse', `GET ${url} returned an unexpected shape (${issues.join('; ')})`);
        }
        return result.data;
    }
}
