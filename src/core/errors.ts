/**
 * Structured engine error taxonomy.
 * @module core/errors
 */
export type EngineErrorDomain = 'topology' | 'transport';

export type EngineErrorCode =
    | 'INVALID_CONFIG'
    | 'INVALID_Z_INDEX'
    | 'EMPTY_TOPOLOGY'
    | 'BIND_FAILED';

export class EngineError extends Error {
    public readonly domain: EngineErrorDomain;
    public readonly code: EngineErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: EngineErrorDomain;
        code: EngineErrorCode;
        details?: Record<string, unknown>;
        cause?: unknown;
    }) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'EngineError';
        this.domain = params.domain;
        this.code = params.code;
        this.details = params.details;
    }
}

/** The topology configuration cannot be turned into routes. */
export class TopologyError extends EngineError {
    constructor(params: {
        message: string;
        code: Extract<EngineErrorCode, 'INVALID_CONFIG' | 'INVALID_Z_INDEX' | 'EMPTY_TOPOLOGY'>;
        details?: Record<string, unknown>;
        cause?: unknown;
    }) {
        super({...params, domain: 'topology'});
        this.name = 'TopologyError';
    }
}

/** A listener socket could not be bound at startup. */
export class BindError extends EngineError {
    public readonly ip: string;
    public readonly port: number;

    constructor(params: {ip: string; port: number; cause: unknown}) {
        const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
        super({
            message: `Failed to bind Art-Net listener to ${params.ip}:${params.port}: ${reason}`,
            domain: 'transport',
            code: 'BIND_FAILED',
            details: {ip: params.ip, port: params.port},
            cause: params.cause,
        });
        this.name = 'BindError';
        this.ip = params.ip;
        this.port = params.port;
    }
}

export const toError = (value: unknown): Error =>
    value instanceof Error ? value : new Error(String(value));
