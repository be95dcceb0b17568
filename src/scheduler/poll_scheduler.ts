import type { PriceFetcher } from '../data/polymarket/clob_fetcher.js';
import { evaluate, isOpportunity } from '../evaluator/opportunity.js';
import { describeError, FetchError } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import type { Market, ObservationRecord, PriceQuote, ThresholdSet } from '../market/types.js';
import type { RecordSink } from '../sink/record_sink.js';
import { displayValues, formatTimestamp } from '../sink/row_format.js';
import type { SinkOutcome } from '../sink/types.js';

export type PollState = 'idle' | 'polling' | 'evaluating' | 'persisting';

export type PollResult =
    | { status: 'persisted'; marketId: string; record: ObservationRecord; outcome: SinkOutcome }
    | { status: 'fetch_failed'; marketId: string; error: FetchError }
    | { status: 'skipped'; marketId: string; reason: 'in_flight' | 'backoff' }
    | { status: 'abandoned'; marketId: string };

export interface PollSchedulerOptions {
    markets: readonly Market[];
    thresholds: ThresholdSet;
    fetcher: PriceFetcher;
    sink: Pick<RecordSink, 'append'>;
    intervalMs: number;
    /** Cap for doubling the wait after consecutive fetch failures; 0 retries on the next tick */
    maxBackoffMs?: number;
    clock?: () => Date;
}

interface MarketSlot {
    readonly market: Market;
    state: PollState;
    inFlight: Promise<PollResult> | null;
    timer: NodeJS.Timeout | null;
    consecutiveErrors: number;
    retryAt: number;
}

/**
 * Drives fetch → evaluate → persist for every market.
 *
 * Each market has its own fixed-rate timer with the same period. A tick that
 * fires while the market's previous poll is still running is skipped, so polls
 * of one market never overlap. Failures stay inside the market's own slot and
 * are retried by a later tick.
 */
export class PollScheduler {
    private readonly slots: Map<string, MarketSlot>;
    private readonly thresholds: ThresholdSet;
    private readonly fetcher: PriceFetcher;
    private readonly sink: Pick<RecordSink, 'append'>;
    private readonly intervalMs: number;
    private readonly maxBackoffMs: number;
    private readonly clock: () => Date;
    private controller = new AbortController();
    private isRunning = false;

    constructor(options: PollSchedulerOptions) {
        this.slots = new Map<string, MarketSlot>(options.markets.map(market => [market.id, {
            market,
            state: 'idle',
            inFlight: null,
            timer: null,
            consecutiveErrors: 0,
            retryAt: 0,
        }]));
        this.thresholds = options.thresholds;
        this.fetcher = options.fetcher;
        this.sink = options.sink;
        this.intervalMs = options.intervalMs;
        this.maxBackoffMs = options.maxBackoffMs ?? 0;
        this.clock = options.clock ?? (() => new Date());
    }

    get running(): boolean {
        return this.isRunning;
    }

    /**
     * Poll every market now, then once per interval until stopped
     */
    start(): void {
        if (this.isRunning) {
            logger.warn('scheduler.already_running', { markets: this.slots.size });
            return;
        }

        this.isRunning = true;
        if (this.controller.signal.aborted) {
            this.controller = new AbortController();
        }

        logger.info('scheduler.started', {
            markets: this.slots.size,
            intervalMs: this.intervalMs,
            maxBackoffMs: this.maxBackoffMs,
        });

        for (const slot of this.slots.values()) {
            this.fire(slot);
        }
    }

    /**
     * Clear all timers, abort in-flight fetches and wait for those polls to settle.
     * An aborted poll persists nothing.
     */
    async stop(): Promise<void> {
        this.isRunning = false;

        const pending: Promise<PollResult>[] = [];
        for (const slot of this.slots.values()) {
            if (slot.timer) {
                clearTimeout(slot.timer);
                slot.timer = null;
            }
            if (slot.inFlight) {
                pending.push(slot.inFlight);
            }
        }

        this.controller.abort();
        await Promise.allSettled(pending);

        logger.info('scheduler.stopped', { abandoned: pending.length });
    }

    /**
     * Poll every market once, concurrently
     */
    runCycle(): Promise<PollResult[]> {
        return Promise.all([...this.slots.values()].map(slot => this.poll(slot)));
    }

    /**
     * Poll one market by id
     */
    pollMarket(marketId: string): Promise<PollResult> {
        const slot = this.slots.get(marketId);
        if (!slot) {
            return Promise.reject(new Error(`Unknown market "${marketId}"`));
        }
        return this.poll(slot);
    }

    /**
     * Re-arm the market's timer, then poll
     */
    private fire(slot: MarketSlot): void {
        if (!this.isRunning) {
            return;
        }

        slot.timer = setTimeout(() => this.fire(slot), this.intervalMs);

        this.poll(slot).catch(error => {
            logger.error('poll.unexpected_error', { marketId: slot.market.id, ...describeError(error) });
        });
    }

    private async poll(slot: MarketSlot): Promise<PollResult> {
        const marketId = slot.market.id;

        // Guard against overlapping polls of one market
        if (slot.inFlight) {
            logger.warn('poll.skipped', { marketId, reason: 'previous poll still in flight', state: slot.state });
            return { status: 'skipped', marketId, reason: 'in_flight' };
        }

        if (slot.retryAt > this.clock().getTime()) {
            logger.debug('poll.skipped', { marketId, reason: 'backoff', consecutiveErrors: slot.consecutiveErrors });
            return { status: 'skipped', marketId, reason: 'backoff' };
        }

        const run = this.execute(slot);
        slot.inFlight = run;
        try {
            return await run;
        } finally {
            slot.inFlight = null;
            slot.state = 'idle';
        }
    }

    private async execute(slot: MarketSlot): Promise<PollResult> {
        const { market } = slot;
        const { signal } = this.controller;
        const startedAt = this.clock().getTime();

        slot.state = 'polling';
        let quote: PriceQuote;
        try {
            quote = await this.fetcher.fetchQuote(market, signal);
        } catch (error) {
            if (signal.aborted) {
                logger.debug('poll.abandoned', { marketId: market.id });
                return { status: 'abandoned', marketId: market.id };
            }
            return this.handleFetchError(slot, error, startedAt);
        }

        slot.consecutiveErrors = 0;
        slot.retryAt = 0;

        slot.state = 'evaluating';
        const record = evaluate(quote, this.thresholds, market, this.clock());

        slot.state = 'persisting';
        const outcome = await this.sink.append(record);

        const values = displayValues(record);
        const payload = {
            marketId: record.marketId,
            marketName: record.marketName,
            timestamp: formatTimestamp(record.timestamp),
            yes: values.yes,
            no: values.no,
            sum: values.sum,
            gap: values.gap,
            below: Object.fromEntries(record.classifications.map(c => [c.name, c.below])),
            persisted: outcome.ok,
        };

        if (isOpportunity(record)) {
            logger.warn('poll.opportunity', payload);
        } else {
            logger.info('poll.observation', payload);
        }

        return { status: 'persisted', marketId: market.id, record, outcome };
    }

    /**
     * Count the failure and, when backoff is enabled, hold the market back
     * interval * 2^(n-1), capped, counted from when the failed poll started
     * so the retry lands on a tick
     */
    private handleFetchError(slot: MarketSlot, error: unknown, startedAt: number): PollResult {
        const fetchError = error instanceof FetchError
            ? error
            : new FetchError('network', error instanceof Error ? error.message : String(error), { cause: error });

        slot.consecutiveErrors++;

        let backoffMs = 0;
        if (this.maxBackoffMs > 0 && slot.consecutiveErrors > 1) {
            backoffMs = Math.min(
                this.intervalMs * Math.pow(2, slot.consecutiveErrors - 1),
                this.maxBackoffMs
            );
            slot.retryAt = startedAt + backoffMs;
        }

        logger.error('poll.fetch_failed', {
            marketId: slot.market.id,
            marketName: slot.market.name,
            kind: fetchError.kind,
            status: fetchError.status,
            error: fetchError.message,
            consecutiveErrors: slot.consecutiveErrors,
            nextBackoffMs: backoffMs,
        });

        return { status: 'fetch_failed', marketId: slot.market.id, error: fetchError };
    }
}
