import { z } from 'zod';

/**
 * Polymarket orderbook level (prices and sizes arrive as strings)
 */
export const orderbookLevelSchema = z.object({
    price: z.string(),
    size: z.string(),
});

export type PolyOrderbookLevel = z.infer<typeof orderbookLevelSchema>;

/**
 * `GET /book?token_id=...`
 */
export const orderbookSchema = z.object({
    market: z.string().optional(),
    asset_id: z.string().optional(),
    timestamp: z.union([z.string(), z.number()]).optional(),
    bids: z.array(orderbookLevelSchema).default([]),
    asks: z.array(orderbookLevelSchema).default([]),
});

export type PolyOrderbook = z.infer<typeof orderbookSchema>;

/**
 * One outcome token of a CLOB market
 */
export const marketTokenSchema = z.object({
    token_id: z.string().min(1),
    outcome: z.string(),
    price: z.number().optional(),
});

/**
 * `GET /markets/<conditionId>`; only the fields the fetcher reads
 */
export const clobMarketSchema = z.object({
    condition_id: z.string().optional(),
    question: z.string().optional(),
    tokens: z.array(marketTokenSchema).min(2),
});

export type ClobMarket = z.infer<typeof clobMarketSchema>;
