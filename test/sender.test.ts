import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

import {decodeArtNetPacket, IngestionSupervisor, OpCode, Topology, VoxelFrameSender} from '../src';
import {MockSocket} from './support/mock-socket';

const sockets: MockSocket[] = [];

vi.mock('dgram', async () => {
    const {MockSocket: Socket} = await import('./support/mock-socket');
    return {
        createSocket: vi.fn(() => {
            const socket = new Socket();
            sockets.push(socket);
            return socket;
        }),
    };
});

beforeEach(() => {
    sockets.length = 0;
    MockSocket.busyPorts.clear();
});

afterEach(() => {
    for (const socket of sockets) {
        socket.removeAllListeners();
    }
});

const lastSocket = (): MockSocket => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('expected a socket');
    return socket;
};

const single = () => Topology.fromConfig({cubes: [{dimensions: '20x20x1'}]});

describe('VoxelFrameSender', () => {
    it('slices a layer into 170-pixel universes', () => {
        const sender = new VoxelFrameSender({topology: single()});
        const packets = sender.packetsFor(0, new Uint8Array(1200));

        expect(packets.map((p) => [p.universe, p.port, p.packet.length])).toEqual([
            [0, 6454, 528],
            [1, 6454, 528],
            [2, 6454, 198],
        ]);
        expect(packets.map((p) => p.packet[12])).toEqual([0, 0, 0]);
        sender.close();
    });

    it('broadcasts every packet followed by one ArtSync', async () => {
        const sender = new VoxelFrameSender({topology: single()});
        const socket = lastSocket();

        await expect(sender.sendFrame(0, new Uint8Array(1200))).resolves.toBe(3);

        expect(socket.broadcast).toBe(true);
        expect(socket.sent.map((s) => [s.packet.length, s.port, s.host])).toEqual([
            [528, 6454, '255.255.255.255'],
            [528, 6454, '255.255.255.255'],
            [198, 6454, '255.255.255.255'],
            [14, 6454, '255.255.255.255'],
        ]);
        expect(socket.sent[3]?.packet.readUInt16LE(8)).toBe(OpCode.OpSync);
        sender.close();
    });

    it('numbers only the packets it sends', async () => {
        const sender = new VoxelFrameSender({topology: single(), sync: false});
        const socket = lastSocket();
        const frame = new Uint8Array(1200);

        await sender.sendFrame(0, frame);
        sender.packetsFor(0, frame);
        sender.packetsFor(0, frame);
        await sender.sendFrame(0, frame);

        expect(socket.sent.map((s) => s.packet[12])).toEqual([1, 2, 3, 4, 5, 6]);
        sender.close();
    });

    it('sends to a fixed host and port without sync when asked', async () => {
        const sender = new VoxelFrameSender({
            topology: single(),
            host: '10.0.0.50',
            port: 7000,
            bindAddress: '10.0.0.1',
            sync: false,
        });
        const socket = lastSocket();

        await sender.sendFrame(0, new Uint8Array(1200));

        expect(socket.broadcast).toBe(false);
        expect(socket.bindConfig).toEqual({address: '10.0.0.1'});
        expect(socket.sent.map((s) => [s.port, s.host])).toEqual([
            [7000, '10.0.0.50'],
            [7000, '10.0.0.50'],
            [7000, '10.0.0.50'],
        ]);
        sender.close();
    });

    it('follows explicit layer mappings', () => {
        const topology = Topology.fromConfig({cubes: [{dimensions: '10x10x2', mappings: [{zIndices: [1]}]}]});
        const sender = new VoxelFrameSender({topology});
        const frame = new Uint8Array(600);
        frame.fill(1, 0, 300);
        frame.fill(2, 300);

        const packets = sender.packetsFor(0, frame);

        expect(packets).toHaveLength(1);
        const decoded = decodeArtNetPacket(packets[0]?.packet ?? Buffer.alloc(0));
        if (decoded?.kind !== 'dmx') throw new Error('expected dmx');
        expect(decoded.universe).toBe(1);
        expect(Array.from(decoded.data)).toEqual(new Array<number>(300).fill(2));
        sender.close();
    });

    it('rejects frames of the wrong size', () => {
        const sender = new VoxelFrameSender({topology: single()});
        expect(() => sender.packetsFor(0, new Uint8Array(10))).toThrow('Cube 0 frame must be 1200 bytes, got 10');
        sender.close();
    });

    it('round-trips a frame through a listener', async () => {
        const topology = single();
        const supervisor = new IngestionSupervisor({topology});
        await supervisor.start();
        const inbound = lastSocket();
        const sender = new VoxelFrameSender({topology});
        const outbound = lastSocket();
        const frame = Uint8Array.from({length: 1200}, (_, i) => i % 251);

        await sender.sendFrame(0, frame);
        for (const {packet} of outbound.sent) {
            inbound.deliver(packet);
        }

        expect(Array.from(supervisor.snapshot(0))).toEqual(Array.from(frame));
        expect(supervisor.store.consumeDirty()).toBe(true);
        sender.close();
        await supervisor.stop();
    });
});
