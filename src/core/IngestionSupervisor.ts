/**
 * Lifecycle owner for every Art-Net listener and the shared voxel state.
 * @module core/IngestionSupervisor
 */
import {EventEmitter} from 'events';

import {
    ArtNetListener,
    type ArtNetDmxMessage,
    type ListenerStats,
    type PacketSource,
} from '../protocols/artnet/listener';
import {Topology} from '../topology/Topology';
import type {TopologyConfig} from '../topology/schema';
import {silentLogger, type Logger} from './logger';
import {PixelStore} from './PixelStore';

/**
 * Configuration for the supervisor.
 */
export type SupervisorOptions = {
    /** A built topology, or a loader-supplied config to validate and build. */
    topology: Topology | TopologyConfig;
    logger?: Logger;
    /** Allow multiple applications to bind the same UDP ports. */
    reuseAddr?: boolean;
};

/** Error raised by one listener, tagged with the binding it came from. */
export type ListenerErrorEvent = {
    key: string;
    error: Error;
};

export interface IngestionSupervisorEvents {
    /** A routed ArtDMX packet from any listener. */
    dmx: [ArtNetDmxMessage & {key: string}];
    /** ArtSync from any listener. */
    sync: [PacketSource & {key: string}];
    /** A listener failed after startup and closed; the others keep running. */
    listenerError: [ListenerErrorEvent];
}

/**
 * Builds one listener per `(ip, port)` binding of the topology, binds them all
 * on `start()`, and tears them all down on `stop()`.
 *
 * Startup is all-or-nothing: if any socket fails to bind, the ones already
 * bound are closed and `start()` rejects with that `BindError`.
 */
export class IngestionSupervisor extends EventEmitter<IngestionSupervisorEvents> {
    public readonly topology: Topology;
    public readonly store: PixelStore;
    private readonly logger: Logger;
    private readonly reuseAddr: boolean;
    private artnetListeners: ArtNetListener[] = [];
    private running = false;
    private starting: Promise<void> | null = null;
    private stopping: Promise<void> | null = null;

    /**
     * Create a supervisor and its pixel store. No socket is opened yet.
     * @param options Topology, logging and socket settings.
     */
    constructor({topology, logger = silentLogger, reuseAddr = false}: SupervisorOptions) {
        super();
        this.logger = logger;
        this.reuseAddr = reuseAddr;
        this.topology = topology instanceof Topology ? topology : Topology.fromConfig(topology, {logger});
        this.store = new PixelStore(this.topology.cubes);
    }

    public get isRunning(): boolean {
        return this.running;
    }

    /**
     * Bind every listener.
     * @throws BindError when any socket cannot be bound; nothing stays bound.
     */
    public start(): Promise<void> {
        if (this.running) return Promise.resolve();
        if (this.stopping) {
            return Promise.reject(new Error('Supervisor is stopping; wait for stop() before starting again'));
        }
        if (!this.starting) {
            this.starting = this.bindAll().finally(() => {
                this.starting = null;
            });
        }
        return this.starting;
    }

    /**
     * Close every socket and wait until all listeners have shut down.
     * Concurrent and repeated calls share one shutdown.
     */
    public stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.shutdown().finally(() => {
                this.stopping = null;
            });
        }
        return this.stopping;
    }

    /**
     * Copy of one cube's packed RGB pixels.
     * @param cube Position in the topology's cube list, or the cube's `id`.
     */
    public snapshot(cube: number | string): Uint8Array {
        return this.store.snapshot(typeof cube === 'string' ? this.topology.cubeIndexOf(cube) : cube);
    }

    /** Resolve `true` on the next pixel update, `false` after `timeoutMs`. */
    public waitForUpdate(timeoutMs: number): Promise<boolean> {
        return this.store.waitForUpdate(timeoutMs);
    }

    /** Counters per listener, keyed by `ip:port`. */
    public stats(): Record<string, ListenerStats> {
        const result: Record<string, ListenerStats> = {};
        for (const listener of this.artnetListeners) {
            result[listener.binding.key] = listener.stats();
        }
        return result;
    }

    private async bindAll(): Promise<void> {
        const listeners = this.topology.bindings.map((binding) => {
            const listener = new ArtNetListener({
                binding,
                topology: this.topology,
                store: this.store,
                logger: this.logger,
                reuseAddr: this.reuseAddr,
            });
            listener.on('dmx', (message) => this.emit('dmx', {...message, key: binding.key}));
            listener.on('sync', (source) => this.emit('sync', {...source, key: binding.key}));
            listener.on('error', (error) => this.emit('listenerError', {key: binding.key, error}));
            return listener;
        });
        this.artnetListeners = listeners;

        const results = await Promise.allSettled(listeners.map((listener) => listener.start()));
        const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
        if (failure) {
            await Promise.all(listeners.map((listener) => listener.stop()));
            this.artnetListeners = [];
            this.logger.error(`Startup aborted: ${String(failure.reason)}`);
            throw failure.reason;
        }

        this.running = true;
        this.logger.info(
            `Ingesting ${this.topology.cubes.length} cube(s) on ${listeners.length} listener(s)`,
        );
    }

    private async shutdown(): Promise<void> {
        if (this.starting) {
            // start() rejects to its own caller; here we only wait for it to settle
            await this.starting.catch(() => undefined);
        }
        const closing = this.artnetListeners.map((listener) => listener.stop());
        this.running = false;
        await Promise.all(closing);
        for (const listener of this.artnetListeners) listener.removeAllListeners();
        this.artnetListeners = [];
    }
}
