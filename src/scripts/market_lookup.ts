import { ClobClient } from '@polymarket/clob-client';
import { clobMarketSchema } from '../data/polymarket/types.js';

const CLOB_HOST = 'https://clob.polymarket.com';
const POLYGON_CHAIN_ID = 137;

const conditionId = process.argv[2];

if (!conditionId) {
    console.error('❌ Error: a market condition id is required');
    console.error('');
    console.error('Usage:');
    console.error('  npm run market:lookup -- <conditionId>');
    console.error('');
    process.exit(1);
}

async function main(id: string) {
    // Read-only client, no credentials needed
    const client = new ClobClient(CLOB_HOST, POLYGON_CHAIN_ID);

    console.log(`🔍 Looking up market ${id}...\n`);

    const raw: unknown = await client.getMarket(id);
    const parsed = clobMarketSchema.safeParse(raw);

    if (!parsed.success) {
        console.error('❌ Unexpected market response:');
        parsed.error.errors.forEach(err => {
            console.error(`  - ${err.path.join('.')}: ${err.message}`);
        });
        process.exit(1);
    }

    const market = parsed.data;

    console.log(`📋 Question: ${market.question ?? '(none)'}`);
    console.log('\n🎲 Outcome tokens:');
    for (const token of market.tokens) {
        const price = token.price !== undefined ? ` @ ${token.price.toFixed(4)}` : '';
        console.log(`  ${token.outcome.padEnd(6)} ${token.token_id}${price}`);
    }

    const entry = {
        id,
        name: market.question ?? id,
        endpoint: `${CLOB_HOST}/markets/${id}`,
    };

    console.log('\n📝 Add this entry to "markets" in your config file:\n');
    console.log(JSON.stringify(entry, null, 2));
    console.log('');
}

main(conditionId).catch((error) => {
    console.error('❌ Lookup failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
