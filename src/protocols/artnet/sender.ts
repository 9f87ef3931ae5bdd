/**
 * Controller-side sender: slices cube frames into ArtDMX packets along the
 * same routes the listeners resolve.
 * @module artnet/sender
 */
import {createSocket, type Socket} from 'dgram';
import {EventEmitter} from 'events';

import type {Topology} from '../../topology/Topology';
import {BYTES_PER_PIXEL, PIXELS_PER_UNIVERSE} from './constants';
import {buildArtDmx, buildArtSync} from './packet';

export type VoxelFrameSenderConfiguration = {
    topology: Topology;
    /** Destination node IP/hostname. Defaults to broadcast. */
    host?: string;
    /** Destination UDP port. Defaults to each route's listener port. */
    port?: number;
    /** Local interface/bind address. */
    bindAddress?: string;
    /** Enable socket broadcast mode. Defaults to true when no host is given. */
    broadcast?: boolean;
    /** Follow every frame with one ArtSync per destination port. Defaults to true. */
    sync?: boolean;
};

/** One datagram ready to send. */
export type OutgoingPacket = {
    port: number;
    universe: number;
    packet: Buffer;
};

export interface VoxelFrameSenderEvents {
    /** Low-level socket send/bind errors. */
    error: [Error];
}

/** Sends whole cube frames as ArtDMX, followed by ArtSync. */
export class VoxelFrameSender extends EventEmitter<VoxelFrameSenderEvents> {
    private readonly socket: Socket;
    private readonly config: VoxelFrameSenderConfiguration;
    private sequence = 0;

    /**
     * Create a frame sender.
     * @param config Topology and transport configuration.
     */
    constructor(config: VoxelFrameSenderConfiguration) {
        super();
        this.config = config;
        this.socket = createSocket('udp4');
        this.socket.on('error', (err) => this.emit('error', err));
        if (config.broadcast ?? !config.host) {
            this.socket.setBroadcast(true);
        }
        if (config.bindAddress) {
            this.socket.bind({address: config.bindAddress});
        }
    }

    /**
     * Build the ArtDMX packets for one cube frame without sending them.
     * The sequence byte is left at 0; `sendFrame` numbers what it sends.
     * @param cubeIndex Cube to send.
     * @param frame Packed RGB, `voxelCount * 3` bytes, in store order.
     */
    public packetsFor(cubeIndex: number, frame: Uint8Array): OutgoingPacket[] {
        return this.buildPackets(cubeIndex, frame, () => 0);
    }

    /**
     * Send one cube frame, then ArtSync unless disabled.
     * @returns Number of ArtDMX packets sent.
     */
    public async sendFrame(cubeIndex: number, frame: Uint8Array): Promise<number> {
        const packets = this.buildPackets(cubeIndex, frame, () => this.nextSequence());
        for (const {port, packet} of packets) {
            await this.sendPacket(packet, port);
        }
        if (this.config.sync ?? true) {
            for (const port of new Set(packets.map((p) => p.port))) {
                await this.sendPacket(buildArtSync(), port);
            }
        }
        return packets.length;
    }

    /**
     * Close the UDP socket.
     */
    public close(): void {
        this.socket.close();
    }

    private buildPackets(cubeIndex: number, frame: Uint8Array, sequence: () => number): OutgoingPacket[] {
        const cube = this.config.topology.cube(cubeIndex);
        const expected = cube.voxelCount * BYTES_PER_PIXEL;
        if (frame.length !== expected) {
            throw new RangeError(`Cube ${cube.id} frame must be ${expected} bytes, got ${frame.length}`);
        }

        const packets: OutgoingPacket[] = [];
        for (const {universe, route, binding} of this.config.topology.routesForCube(cubeIndex)) {
            const pixels = Math.min(PIXELS_PER_UNIVERSE, cube.layerSize - route.pixelOffset);
            if (pixels <= 0) continue;
            const start = (route.zSlice * cube.layerSize + route.pixelOffset) * BYTES_PER_PIXEL;
            packets.push({
                port: this.config.port ?? binding.port,
                universe,
                packet: buildArtDmx({
                    universe,
                    sequence: sequence(),
                    data: frame.subarray(start, start + pixels * BYTES_PER_PIXEL),
                }),
            });
        }
        return packets;
    }

    private nextSequence(): number {
        this.sequence = (this.sequence + 1) & 0xff;
        if (this.sequence === 0) this.sequence = 1;
        return this.sequence;
    }

    private async sendPacket(packet: Buffer, port: number): Promise<void> {
        const host = this.config.host ?? '255.255.255.255';
        await new Promise<void>((resolve, reject) => {
            this.socket.send(packet, port, host, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }
}
