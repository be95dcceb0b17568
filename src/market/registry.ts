import { ConfigError } from '../infra/errors.js';
import type { Market } from './types.js';

/**
 * Static set of monitored markets, fixed for the process lifetime
 */
export class MarketRegistry {
    private readonly byId: ReadonlyMap<string, Market>;

    constructor(markets: readonly Market[]) {
        if (markets.length === 0) {
            throw new ConfigError('Market registry is empty');
        }

        const byId = new Map<string, Market>();
        for (const market of markets) {
            if (byId.has(market.id)) {
                throw new ConfigError(`Duplicate market id "${market.id}"`);
            }
            byId.set(market.id, Object.freeze({ id: market.id, name: market.name, endpoint: market.endpoint }));
        }
        this.byId = byId;
    }

    get size(): number {
        return this.byId.size;
    }

    /**
     * Markets in configuration order
     */
    list(): Market[] {
        return [...this.byId.values()];
    }
}
