import { env } from './config/env.js';
import { loadMonitorConfig, type MonitorConfig } from './config/monitor_config.js';
import { ClobPriceFetcher } from './data/polymarket/clob_fetcher.js';
import { describeError } from './infra/errors.js';
import { logger } from './infra/logger.js';
import { MarketRegistry } from './market/registry.js';
import { PollScheduler } from './scheduler/poll_scheduler.js';
import { CsvSink } from './sink/csv_sink.js';
import { GoogleSheetsStore } from './sink/google_sheets_store.js';
import { RecordSink } from './sink/record_sink.js';
import { thresholdColumn } from './sink/row_format.js';
import { SheetsSink } from './sink/sheets_sink.js';
import type { RecordBackend } from './sink/types.js';

// Global references for the shutdown handler
let scheduler: PollScheduler | null = null;
let sink: RecordSink | null = null;
let shuttingDown = false;

/**
 * Open the spreadsheet mirror; without it the monitor carries on with CSV only
 */
async function openRemote(config: MonitorConfig): Promise<RecordBackend | null> {
    if (!config.remote) {
        return null;
    }

    const remote = new SheetsSink(
        new GoogleSheetsStore({
            spreadsheetId: config.remote.spreadsheetId,
            credentialsFile: config.remote.credentialsFile,
            timeoutMs: config.remote.timeoutMs,
        }),
        config.remote.tab,
        config.thresholds
    );

    try {
        await remote.open();
        return remote;
    } catch (error) {
        logger.warn('sink.remote.disabled', {
            message: 'Could not set up Google Sheets, writing to CSV only',
            ...describeError(error),
        });
        return null;
    }
}

/**
 * Main application entry point
 */
async function main() {
    logger.info('app.boot', {
        message: 'Application starting...',
        environment: env.NODE_ENV,
        configFile: env.MONITOR_CONFIG,
    });

    const config = loadMonitorConfig(env.MONITOR_CONFIG);
    const registry = new MarketRegistry(config.markets);

    const durable = new CsvSink(config.csvPath, config.thresholds);
    await durable.open();
    const remote = await openRemote(config);
    sink = new RecordSink(durable, remote, { remoteQueueLimit: config.remote?.queueLimit });

    console.log('\n✅ Boot OK');
    console.log(`⏰ Timestamp: ${new Date().toISOString()}`);
    console.log(`🌍 Environment: ${env.NODE_ENV}`);
    console.log(`📝 Log Level: ${env.LOG_LEVEL}`);
    console.log(`💾 Log to File: ${env.LOG_TO_FILE ? 'Enabled' : 'Disabled'}`);
    console.log(`\n🔹 Markets (${registry.size}):`);
    for (const market of registry.list()) {
        console.log(`  🎲 ${market.id}: ${market.name}`);
    }
    console.log(`\n🎯 Thresholds:`);
    for (const threshold of config.thresholds) {
        console.log(`  📏 ${threshold.name}: ${thresholdColumn(threshold.value)}`);
    }
    console.log(`\n⏱️  Polling interval: ${config.pollingIntervalMs}ms (request timeout ${config.requestTimeoutMs}ms)`);
    console.log(`📈 Quote side: best ${config.quoteSide}`);
    console.log(`📄 Output: ${sink.descriptions.join(', ')}`);
    console.log('Press Ctrl+C to stop\n');

    scheduler = new PollScheduler({
        markets: registry.list(),
        thresholds: config.thresholds,
        fetcher: new ClobPriceFetcher({ timeoutMs: config.requestTimeoutMs, side: config.quoteSide }),
        sink,
        intervalMs: config.pollingIntervalMs,
        maxBackoffMs: config.maxBackoffMs,
    });
    scheduler.start();

    logger.info('app.ready', {
        message: 'Monitor running',
        markets: registry.size,
        sinks: sink.descriptions,
    });
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string) {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;

    logger.info('app.shutdown', {
        message: `Received ${signal}, shutting down gracefully...`,
    });

    if (scheduler?.running) {
        await scheduler.stop();
    }

    if (sink) {
        await sink.close();
    }

    process.exit(0);
}

function onSignal(signal: string) {
    gracefulShutdown(signal).catch((error) => {
        logger.error('app.shutdown_error', describeError(error));
        process.exit(1);
    });
}

// Register shutdown handlers
process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

// Start the application
main().catch((error) => {
    logger.error('app.fatal', {
        message: 'Fatal error during application startup',
        ...describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
