import { Decimal } from 'decimal.js';
import { BASE_COLUMNS } from '../sink/row_format.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Minimal RFC 4180 reader for the files the CSV sink writes
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let quoted = false;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];

        if (quoted) {
            if (ch === '"' && text[i + 1] === '"') {
                field += '"';
                i++;
            } else if (ch === '"') {
                quoted = false;
            } else {
                field += ch;
            }
            continue;
        }

        if (ch === '"') {
            quoted = true;
        } else if (ch === ',') {
            row.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && text[i + 1] === '\n') {
                i++;
            }
            row.push(field);
            rows.push(row);
            row = [];
            field = '';
        } else {
            field += ch;
        }
    }

    if (field !== '' || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    return rows;
}

/**
 * Inverse of the sink's timestamp format; null when unparseable
 */
export function parseTimestamp(value: string): Date | null {
    const match = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/.exec(value.trim());
    if (!match) {
        return null;
    }
    const [, y, mo, d, h, mi, s] = match.map(Number);
    return new Date(Date.UTC(y, mo - 1, d, h, mi, s));
}

interface Observation {
    timestamp: Date;
    marketId: string;
    marketName: string;
    gap: Decimal;
    below: boolean[];
}

interface GapStats {
    count: number;
    total: Decimal;
    max: Decimal | null;
}

function emptyStats(): GapStats {
    return { count: 0, total: new Decimal(0), max: null };
}

function addGap(stats: GapStats, gap: Decimal): void {
    stats.count++;
    stats.total = stats.total.plus(gap);
    stats.max = stats.max === null || gap.gt(stats.max) ? gap : stats.max;
}

function average(stats: GapStats): Decimal | null {
    return stats.count === 0 ? null : stats.total.div(stats.count);
}

function bestOf(counts: Map<string, { marketName: string; opportunities: number }>): RecentSummary['bestMarket'] {
    let best: RecentSummary['bestMarket'] = null;
    for (const [marketId, { marketName, opportunities }] of counts) {
        if (!best || opportunities > best.opportunities) {
            best = { marketId, marketName, opportunities };
        }
    }
    return best;
}

export interface MarketSummary {
    marketId: string;
    marketName: string;
    observations: number;
    opportunities: number;
    avgGap: Decimal | null;
    maxGap: Decimal | null;
}

export interface HourSummary {
    hour: number;
    opportunities: number;
    avgGap: Decimal | null;
}

export interface ThresholdCount {
    column: string;
    count: number;
}

export interface RecentSummary {
    opportunities: number;
    avgGap: Decimal | null;
    maxGap: Decimal | null;
    /** Distinct markets with an opportunity in the window */
    markets: number;
    /** Most opportunities in the window; the first market to reach the count wins a tie */
    bestMarket: { marketId: string; marketName: string; opportunities: number } | null;
}

export interface Summary {
    observations: number;
    skippedRows: number;
    marketsMonitored: number;
    byMarket: MarketSummary[];
    byHour: HourSummary[];
    byThreshold: ThresholdCount[];
    last24h: RecentSummary;
}

/**
 * Aggregate the persisted rows (header first).
 *
 * An opportunity is a row whose first `Below_` column is `YES`. Every
 * figure is recomputed from the rows on each call.
 */
export function summarize(rows: readonly string[][], now: Date): Summary {
    const [header = [], ...body] = rows;
    const thresholdColumns = header.slice(BASE_COLUMNS.length).filter(col => col.startsWith('Below_'));
    const index = (name: string) => header.indexOf(name);

    const observations: Observation[] = [];
    let skippedRows = 0;

    for (const row of body) {
        if (row.length === 1 && row[0] === '') {
            continue;
        }
        const timestamp = parseTimestamp(row[index('Timestamp_UTC')] ?? '');
        const gapText = row[index('Gap_From_One')] ?? '';
        if (!timestamp || !/^-?\d+(\.\d+)?$/.test(gapText)) {
            skippedRows++;
            continue;
        }
        observations.push({
            timestamp,
            marketId: row[index('Market_ID')] ?? '',
            marketName: row[index('Market_Name')] ?? '',
            gap: new Decimal(gapText),
            below: thresholdColumns.map(col => row[index(col)] === 'YES'),
        });
    }

    const markets = new Map<string, { name: string; observations: number; gaps: GapStats }>();
    const hours = Array.from({ length: 24 }, () => emptyStats());
    const recent = emptyStats();
    const recentByMarket = new Map<string, { marketName: string; opportunities: number }>();
    const since = now.getTime() - DAY_MS;

    for (const obs of observations) {
        const market = markets.get(obs.marketId) ?? { name: obs.marketName, observations: 0, gaps: emptyStats() };
        market.observations++;
        markets.set(obs.marketId, market);

        if (!obs.below[0]) {
            continue;
        }
        addGap(market.gaps, obs.gap);
        addGap(hours[obs.timestamp.getUTCHours()], obs.gap);
        if (obs.timestamp.getTime() >= since) {
            addGap(recent, obs.gap);
            const entry = recentByMarket.get(obs.marketId) ?? { marketName: obs.marketName, opportunities: 0 };
            entry.opportunities++;
            recentByMarket.set(obs.marketId, entry);
        }
    }

    return {
        observations: observations.length,
        skippedRows,
        marketsMonitored: markets.size,
        byMarket: [...markets.entries()].map(([marketId, market]) => ({
            marketId,
            marketName: market.name,
            observations: market.observations,
            opportunities: market.gaps.count,
            avgGap: average(market.gaps),
            maxGap: market.gaps.max,
        })),
        byHour: hours.map((stats, hour) => ({ hour, opportunities: stats.count, avgGap: average(stats) })),
        byThreshold: thresholdColumns.map((column, i) => ({
            column,
            count: observations.filter(obs => obs.below[i]).length,
        })),
        last24h: {
            opportunities: recent.count,
            avgGap: average(recent),
            maxGap: recent.max,
            markets: recentByMarket.size,
            bestMarket: bestOf(recentByMarket),
        },
    };
}
