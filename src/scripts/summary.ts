import { readFile } from 'fs/promises';
import type { Decimal } from 'decimal.js';
import { parseCsv, summarize } from '../report/summary.js';
import { formatDecimal } from '../sink/row_format.js';

const csvPath = process.argv[2] || 'arbitrage_data.csv';

const show = (value: Decimal | null) => (value === null ? '-' : formatDecimal(value));

async function main() {
    const text = await readFile(csvPath, 'utf-8');
    const summary = summarize(parseCsv(text), new Date());

    console.log(`📄 ${csvPath}`);
    console.log(`Observations: ${summary.observations} (${summary.skippedRows} unreadable rows skipped)`);
    console.log(`Markets monitored: ${summary.marketsMonitored}`);

    console.log('\n📊 Opportunities by market:\n');
    console.log('Market'.padEnd(40) + 'Obs'.padStart(8) + 'Opps'.padStart(8) + 'Avg gap'.padStart(10) + 'Max gap'.padStart(10));
    for (const market of summary.byMarket) {
        console.log(
            market.marketName.slice(0, 39).padEnd(40)
            + String(market.observations).padStart(8)
            + String(market.opportunities).padStart(8)
            + show(market.avgGap).padStart(10)
            + show(market.maxGap).padStart(10)
        );
    }

    console.log('\n⏰ Opportunities by hour (UTC):\n');
    for (const hour of summary.byHour.filter(h => h.opportunities > 0)) {
        console.log(`  ${String(hour.hour).padStart(2, '0')}:00  ${String(hour.opportunities).padStart(6)}  avg gap ${show(hour.avgGap)}`);
    }

    console.log('\n🎯 Severity breakdown:\n');
    for (const threshold of summary.byThreshold) {
        console.log(`  ${threshold.column.padEnd(14)} ${threshold.count}`);
    }

    console.log('\n🕐 Last 24 hours:\n');
    console.log(`  Opportunities: ${summary.last24h.opportunities}`);
    console.log(`  Average gap:   ${show(summary.last24h.avgGap)}`);
    console.log(`  Biggest gap:   ${show(summary.last24h.maxGap)}`);
    console.log(`  Markets:       ${summary.last24h.markets}`);
    const best = summary.last24h.bestMarket;
    console.log(`  Best market:   ${best ? `${best.marketName} (${best.opportunities} opportunities)` : '-'}`);
}

main().catch((error) => {
    console.error('❌ Summary failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
