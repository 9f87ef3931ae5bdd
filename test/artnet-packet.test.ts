import {describe, expect, it} from 'vitest';

import {ARTNET_ID, ARTNET_PROTOCOL_VERSION, OpCode} from '../src';
import {buildArtDmx, buildArtSync, decodeArtNetPacket, splitPortAddress} from '../src';

const header = (opcode: number, length: number): Buffer => {
    const buffer = Buffer.alloc(length);
    buffer.write(ARTNET_ID, 0, 'ascii');
    buffer.writeUInt16LE(opcode, 8);
    return buffer;
};

describe('Art-Net util', () => {
    it('splits a 15-bit port-address into net/subnet/universe', () => {
        expect(splitPortAddress(0)).toEqual({net: 0, subNet: 0, universe: 0, subUni: 0});
        expect(splitPortAddress(257)).toEqual({net: 1, subNet: 0, universe: 1, subUni: 1});
        expect(splitPortAddress(32767)).toEqual({net: 127, subNet: 15, universe: 15, subUni: 255});
        expect(() => splitPortAddress(32768)).toThrow(RangeError);
        expect(() => splitPortAddress(-1)).toThrow(RangeError);
    });
});

describe('Art-Net packet builders', () => {
    it('builds ArtDMX with little-endian port-address and big-endian length', () => {
        const packet = buildArtDmx({
            universe: 257,
            sequence: 3,
            data: Uint8Array.from([1, 2, 3, 4]),
            length: 2,
        });

        expect(packet.toString('ascii', 0, 8)).toBe(ARTNET_ID);
        expect(packet.readUInt16LE(8)).toBe(OpCode.OpDmx);
        expect(packet.readUInt16BE(10)).toBe(ARTNET_PROTOCOL_VERSION);
        expect(packet[12]).toBe(3);
        expect(packet[14]).toBe(1);
        expect(packet[15]).toBe(1);
        expect(packet.readUInt16BE(16)).toBe(2);
        expect(Array.from(packet.subarray(18))).toEqual([1, 2]);
    });

    it('builds a 14-byte ArtSync', () => {
        const packet = buildArtSync();
        expect(packet.readUInt16LE(8)).toBe(OpCode.OpSync);
        expect(packet.length).toBe(14);
    });
});

describe('decodeArtNetPacket', () => {
    it('decodes ArtDMX fields', () => {
        const decoded = decodeArtNetPacket(buildArtDmx({universe: 1, sequence: 9, data: Uint8Array.from([10, 20, 30])}));

        expect(decoded).not.toBeNull();
        if (decoded?.kind !== 'dmx') throw new Error('expected dmx');
        expect(decoded.universe).toBe(1);
        expect(decoded.sequence).toBe(9);
        expect(decoded.length).toBe(3);
        expect(Array.from(decoded.data)).toEqual([10, 20, 30]);
    });

    it('rejects datagrams without the Art-Net id', () => {
        const packet = buildArtDmx({universe: 0, data: Uint8Array.from([1, 2, 3])});
        packet.write('Art-Nex', 0, 'ascii');
        expect(decodeArtNetPacket(packet)).toBeNull();
        expect(decodeArtNetPacket(Buffer.from('hello'))).toBeNull();
    });

    it('rejects ArtDMX shorter than its 18-byte header', () => {
        expect(decodeArtNetPacket(header(OpCode.OpDmx, 17))).toBeNull();
    });

    it('clamps the declared length to 512', () => {
        const packet = header(OpCode.OpDmx, 18 + 600);
        packet.writeUInt16BE(600, 16);

        const decoded = decodeArtNetPacket(packet);
        if (decoded?.kind !== 'dmx') throw new Error('expected dmx');
        expect(decoded.length).toBe(512);
        expect(decoded.data.length).toBe(512);
    });

    it('never reads past the end of a truncated datagram', () => {
        const full = buildArtDmx({universe: 4, data: Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9])});
        const decoded = decodeArtNetPacket(full.subarray(0, 25));

        if (decoded?.kind !== 'dmx') throw new Error('expected dmx');
        expect(decoded.length).toBe(9);
        expect(Array.from(decoded.data)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    });

    it('decodes ArtSync and tags other opcodes as unknown', () => {
        const padded = Buffer.concat([buildArtSync(), Buffer.alloc(4)]);
        expect(decodeArtNetPacket(padded)).toEqual({kind: 'sync', protocolVersion: ARTNET_PROTOCOL_VERSION});
        expect(decodeArtNetPacket(header(OpCode.OpPoll, 18))).toEqual({kind: 'unknown', opcode: 0x2000});
    });

    it('drops every datagram shorter than 18 bytes, whatever its opcode', () => {
        expect(decodeArtNetPacket(buildArtSync())).toBeNull();
        expect(decodeArtNetPacket(header(OpCode.OpSync, 17))).toBeNull();
        expect(decodeArtNetPacket(header(OpCode.OpPoll, 10))).toBeNull();
    });
});
