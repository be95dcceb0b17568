/**
 * Base class for every error the monitor raises on purpose
 */
export class MonitorError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing or malformed configuration. Fatal at startup.
 */
export class ConfigError extends MonitorError {
    constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    }
}

export type FetchErrorKind = 'network' | 'protocol' | 'parse' | 'timeout';

/**
 * A single price fetch failed. The market is skipped for this cycle.
 */
export class FetchError extends MonitorError {
    readonly status: number | undefined;

    constructor(
        readonly kind: FetchErrorKind,
        message: string,
        options?: { cause?: unknown; status?: number }
    ) {
        super(message, options);
        this.status = options?.status;
    }
}

export type SinkBackend = 'durable' | 'remote';

/**
 * A record could not be written to one backend
 */
export class SinkError extends MonitorError {
    constructor(readonly backend: SinkBackend, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Flattens an unknown thrown value into log payload fields
 */
export function describeError(error: unknown): { error: string; kind?: string } {
    if (error instanceof FetchError) {
        return { error: error.message, kind: error.kind };
    }
    if (error instanceof SinkError) {
        return { error: error.message, kind: error.backend };
    }
    if (error instanceof Error) {
        return { error: error.message };
    }
    return { error: String(error) };
}
