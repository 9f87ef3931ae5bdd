/**
 * Art-Net listener feeding one socket's universes into the pixel store.
 * @module artnet/listener
 */
import {createSocket, type RemoteInfo, type Socket} from 'dgram';
import {EventEmitter} from 'events';

import {BindError, toError} from '../../core/errors';
import {silentLogger, type Logger} from '../../core/logger';
import type {PixelStore} from '../../core/PixelStore';
import type {ListenerBinding, Topology} from '../../topology/Topology';
import type {UniverseRoute} from '../../topology/RouteTable';
import {BYTES_PER_PIXEL} from './constants';
import {decodeArtNetPacket, type ArtDmxPacket} from './packet';

/** Configuration for an Art-Net listener. */
export type ArtNetListenerConfiguration = {
    /** Address, port and route table this listener serves. */
    binding: ListenerBinding;
    topology: Topology;
    store: PixelStore;
    logger?: Logger;
    /** Allow multiple applications to bind to same UDP port. */
    reuseAddr?: boolean;
};

/** Running counters. */
export type ListenerStats = {
    packets: number;
    dmxPackets: number;
    syncPackets: number;
    malformed: number;
    unknownOpcodes: number;
    unroutable: number;
    pixelsWritten: number;
    pixelsDropped: number;
};

/** Source of a received datagram. */
export type PacketSource = {
    sourceAddress: string;
    sourcePort: number;
};

/** An ArtDMX packet that was routed into the store. */
export type ArtNetDmxMessage = ArtDmxPacket & PacketSource & {
    route: UniverseRoute;
    pixelsWritten: number;
};

/** Events emitted by ArtNetListener. */
export interface ArtNetListenerEvents {
    /** Routed ArtDMX packet, after its pixels were written. */
    dmx: [ArtNetDmxMessage];
    /** ArtSync received; the store was marked for redraw. */
    sync: [PacketSource];
    /** Socket errors after a successful bind. The listener closes afterwards. */
    error: [Error];
    /** Socket closed, by `stop()` or after an error. */
    close: [];
}

type ListenerState = 'idle' | 'starting' | 'listening' | 'closing' | 'closed';

const emptyStats = (): ListenerStats => ({
    packets: 0,
    dmxPackets: 0,
    syncPackets: 0,
    malformed: 0,
    unknownOpcodes: 0,
    unroutable: 0,
    pixelsWritten: 0,
    pixelsDropped: 0,
});

/**
 * Owns one UDP socket bound to one `(ip, port)` and writes every routed
 * ArtDMX triplet into the shared store.
 */
export class ArtNetListener extends EventEmitter<ArtNetListenerEvents> {
    public readonly binding: ListenerBinding;
    private readonly topology: Topology;
    private readonly store: PixelStore;
    private readonly logger: Logger;
    private readonly reuseAddr: boolean;
    private readonly counters = emptyStats();
    private socket: Socket | null = null;
    private state: ListenerState = 'idle';
    private closed: Promise<void> | null = null;

    /**
     * Create an Art-Net listener. Nothing is bound until `start()`.
     * @param config Binding, shared state and socket options.
     */
    constructor({binding, topology, store, logger = silentLogger, reuseAddr = false}: ArtNetListenerConfiguration) {
        super();
        this.binding = binding;
        this.topology = topology;
        this.store = store;
        this.logger = logger;
        this.reuseAddr = reuseAddr;
    }

    public get listening(): boolean {
        return this.state === 'listening';
    }

    /** Snapshot of the counters. */
    public stats(): ListenerStats {
        return {...this.counters};
    }

    /**
     * Bind the socket.
     * @throws BindError when the address cannot be bound.
     */
    public start(): Promise<void> {
        if (this.state !== 'idle') {
            return Promise.reject(new Error(`Listener ${this.binding.key} was already started`));
        }
        this.state = 'starting';
        const {ip, port} = this.binding;
        const socket = createSocket({type: 'udp4', reuseAddr: this.reuseAddr});
        this.socket = socket;
        this.closed = new Promise<void>((resolve) => socket.once('close', () => resolve()));

        socket.on('message', (msg, rinfo) => this.handleDatagram(msg, rinfo));

        return new Promise<void>((resolve, reject) => {
            let settled = false;
            const onBindError = (err: Error): void => {
                settled = true;
                socket.off('listening', onListening);
                this.state = 'closing';
                socket.close();
                reject(new BindError({ip, port, cause: err}));
            };
            const onListening = (): void => {
                settled = true;
                socket.off('error', onBindError);
                this.state = 'listening';
                socket.on('error', (err) => this.handleSocketError(err));
                this.logger.info(`Listening for Art-Net on ${ip}:${port} (${this.binding.routes.size} universes)`);
                resolve();
            };
            socket.once('error', onBindError);
            socket.once('listening', onListening);
            socket.once('close', () => {
                if (!settled) {
                    settled = true;
                    socket.off('error', onBindError);
                    socket.off('listening', onListening);
                    reject(new Error(`Listener ${this.binding.key} was stopped before it was bound`));
                }
                this.handleClose();
            });
            socket.bind({port, address: ip});
        });
    }

    /** Close the socket. Resolves once it has closed; safe to call repeatedly. */
    public stop(): Promise<void> {
        const socket = this.socket;
        if (!socket || !this.closed) {
            this.state = 'closed';
            return Promise.resolve();
        }
        if (this.state === 'starting' || this.state === 'listening') {
            this.state = 'closing';
            socket.close();
        }
        return this.closed;
    }

    private handleClose(): void {
        this.state = 'closed';
        this.logger.info(`Stopped Art-Net listener on ${this.binding.key}`);
        this.emit('close');
    }

    private handleSocketError(err: Error): void {
        if (this.state !== 'listening') return;
        this.logger.error(`Receive error on ${this.binding.key}, closing listener: ${err.message}`);
        if (this.listenerCount('error') > 0) this.emit('error', err);
        this.state = 'closing';
        this.socket?.close();
    }

    private handleDatagram(msg: Buffer, rinfo: RemoteInfo): void {
        if (this.state !== 'listening') return;
        this.counters.packets++;
        try {
            const packet = decodeArtNetPacket(msg);
            if (!packet) {
                this.counters.malformed++;
                this.logger.debug(`Dropped ${msg.length}-byte non-Art-Net datagram from ${rinfo.address}`);
                return;
            }
            switch (packet.kind) {
                case 'dmx':
                    this.applyDmx(packet, {sourceAddress: rinfo.address, sourcePort: rinfo.port});
                    return;
                case 'sync':
                    this.counters.syncPackets++;
                    this.store.markDirty();
                    this.emit('sync', {sourceAddress: rinfo.address, sourcePort: rinfo.port});
                    return;
                case 'unknown':
                    this.counters.unknownOpcodes++;
                    this.logger.debug(
                        `Ignored opcode 0x${packet.opcode.toString(16).padStart(4, '0')} from ${rinfo.address}`,
                    );
                    return;
            }
        } catch (err) {
            const error = toError(err);
            this.logger.error(`Failed to handle datagram on ${this.binding.key}: ${error.message}`);
            if (this.listenerCount('error') > 0) this.emit('error', error);
        }
    }

    private applyDmx(packet: ArtDmxPacket, source: PacketSource): void {
        this.counters.dmxPackets++;
        const route = this.binding.routes.resolve(packet.universe);
        if (!route) {
            this.counters.unroutable++;
            this.logger.debug(`No route for universe ${packet.universe} on ${this.binding.key}`);
            return;
        }

        const triplets = Math.floor(packet.data.length / BYTES_PER_PIXEL);
        const written = this.store.transaction((writer) => {
            let count = 0;
            for (let i = 0; i < triplets; i++) {
                const index = this.topology.voxelIndex(route, i);
                if (index >= 0 && writer.set(route.cubeIndex, index, packet.data, i * BYTES_PER_PIXEL)) {
                    count++;
                }
            }
            return count;
        });
        this.counters.pixelsWritten += written;
        this.counters.pixelsDropped += triplets - written;

        this.emit('dmx', {...packet, ...source, route, pixelsWritten: written});
    }
}
