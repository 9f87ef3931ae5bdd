/**
 * Minimal logging seam. Everything in the engine logs through a `Logger`;
 * the default writes to the console.
 * @module core/logger
 */
export type Logger = {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
};

export type ConsoleLoggerOptions = {
    /** Prefix for every line. Defaults to `[artnet-voxel]`. */
    prefix?: string;
    /** Emit debug lines (per-packet drops). Off by default. */
    debug?: boolean;
};

export const createConsoleLogger = ({
    prefix = '[artnet-voxel]',
    debug = false,
}: ConsoleLoggerOptions = {}): Logger => ({
    debug: (message) => {
        if (debug) console.debug(`${prefix} ${message}`);
    },
    info: (message) => console.info(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
});

/** Discards everything. */
export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
