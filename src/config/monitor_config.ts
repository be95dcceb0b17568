import { readFileSync } from 'fs';
import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { ConfigError } from '../infra/errors.js';
import type { Market, QuoteSide, ThresholdSet } from '../market/types.js';

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * True for `http(s)://host[/prefix]/markets/<conditionId>`
 */
export function isClobMarketUrl(value: string): boolean {
    let url: URL;
    try {
        url = new URL(value);
    } catch {
        return false;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return false;
    }
    return /\/markets\/[^/]+\/?$/.test(url.pathname);
}

const marketSchema = z.object({
    id: z.string().trim().min(1),
    name: z.string().trim().min(1),
    endpoint: z.string().trim().refine(isClobMarketUrl, {
        message: 'must be an http(s) URL of the form <host>/markets/<conditionId>',
    }),
}).strict();

const thresholdValueSchema = z.union([
    z.number().finite(),
    z.string().trim().regex(DECIMAL_PATTERN, 'must be a decimal number'),
]);

const INTEGER_KEY = /^(0|[1-9]\d*)$/;

// Either { "primary": 1.0, ... } in order, or [{ "name": "primary", "value": 1.0 }, ...].
// Integer-like keys are listed first by every JSON object, whatever order they were written in.
const thresholdsSchema = z.union([
    z.record(z.string().min(1), thresholdValueSchema)
        .superRefine((record, ctx) => {
            for (const name of Object.keys(record).filter(key => INTEGER_KEY.test(key))) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [name],
                    message: 'numeric threshold names do not keep their order in an object; use the list form',
                });
            }
        })
        .transform(record => Object.entries(record).map(([name, value]) => ({ name, value }))),
    z.array(z.object({ name: z.string().trim().min(1), value: thresholdValueSchema }).strict()),
]).transform((entries, ctx) => {
    const thresholds = entries.map(({ name, value }) => ({ name, value: new Decimal(value) }));

    if (thresholds.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one threshold is required' });
    }
    const seenNames = new Set<string>();
    const seenValues: Decimal[] = [];
    thresholds.forEach((threshold, index) => {
        if (seenNames.has(threshold.name)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: `duplicate threshold name "${threshold.name}"`,
            });
        }
        if (seenValues.some(value => value.eq(threshold.value))) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: `duplicate threshold value ${threshold.value.toString()}`,
            });
        }
        seenNames.add(threshold.name);
        seenValues.push(threshold.value);
    });

    return thresholds;
});

const remoteSchema = z.object({
    enabled: z.boolean().default(false),
    spreadsheetId: z.string().trim().min(1).optional(),
    tab: z.string().trim().min(1).default('Raw Data'),
    credentialsFile: z.string().trim().min(1).default('credentials.json'),
    timeoutMs: z.number().int().positive().default(10000),
    queueLimit: z.number().int().positive().default(1000),
}).strict();

// Cross-field checks run as a transform so they only see fully parsed fields
const monitorConfigSchema = z.object({
    markets: z.array(marketSchema).min(1, 'at least one market is required'),
    thresholds: thresholdsSchema.default({ primary: 1.0, secondary: 0.95, tertiary: 0.9 }),
    pollingIntervalSeconds: z.number().int().positive().default(5),
    requestTimeoutMs: z.number().int().positive().default(4000),
    quoteSide: z.enum(['bid', 'ask']).default('bid'),
    maxBackoffSeconds: z.number().int().nonnegative().default(0),
    output: z.object({
        csvPath: z.string().trim().min(1).default('arbitrage_data.csv'),
    }).strict().default({}),
    remote: remoteSchema.default({}),
}).strict().transform((config, ctx) => {
    const seenIds = new Set<string>();
    config.markets.forEach((market, index) => {
        if (seenIds.has(market.id)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['markets', index, 'id'],
                message: `duplicate market id "${market.id}"`,
            });
        }
        seenIds.add(market.id);
    });

    if (config.requestTimeoutMs >= config.pollingIntervalSeconds * 1000) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['requestTimeoutMs'],
            message: 'must be lower than the polling interval',
        });
    }

    if (config.remote.enabled && !config.remote.spreadsheetId) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['remote', 'spreadsheetId'],
            message: 'required when remote.enabled is true',
        });
    }

    return config;
});

export interface RemoteSinkConfig {
    spreadsheetId: string;
    tab: string;
    credentialsFile: string;
    timeoutMs: number;
    /** Rows waiting for the spreadsheet beyond this are dropped, oldest first */
    queueLimit: number;
}

/**
 * Validated monitor configuration
 */
export interface MonitorConfig {
    markets: Market[];
    thresholds: ThresholdSet;
    pollingIntervalMs: number;
    requestTimeoutMs: number;
    quoteSide: QuoteSide;
    maxBackoffMs: number;
    csvPath: string;
    remote: RemoteSinkConfig | null;
}

/**
 * Validate an already-parsed JSON document
 */
export function parseMonitorConfig(raw: unknown): MonitorConfig {
    const result = monitorConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(
            'Invalid monitor configuration',
            result.error.errors.map(err => `${err.path.join('.') || '(root)'}: ${err.message}`)
        );
    }

    const parsed = result.data;
    const { remote } = parsed;

    return {
        markets: parsed.markets.map(market => Object.freeze({ ...market })),
        thresholds: Object.freeze(parsed.thresholds.map(threshold => Object.freeze(threshold))),
        pollingIntervalMs: parsed.pollingIntervalSeconds * 1000,
        requestTimeoutMs: parsed.requestTimeoutMs,
        quoteSide: parsed.quoteSide,
        maxBackoffMs: parsed.maxBackoffSeconds * 1000,
        csvPath: parsed.output.csvPath,
        remote: remote.enabled && remote.spreadsheetId
            ? {
                spreadsheetId: remote.spreadsheetId,
                tab: remote.tab,
                credentialsFile: remote.credentialsFile,
                timeoutMs: remote.timeoutMs,
                queueLimit: remote.queueLimit,
            }
            : null,
    };
}

/**
 * Read and validate the monitor configuration file
 */
export function loadMonitorConfig(path: string): MonitorConfig {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ConfigError(
            `Cannot read configuration file ${path} (copy config.example.json to get started)`,
            [],
            { cause: error }
        );
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Configuration file ${path} is not valid JSON`, [], { cause: error });
    }

    return parseMonitorConfig(raw);
}
