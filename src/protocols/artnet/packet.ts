/**
 * Art-Net 4 packet builders and the receive-side decoder.
 * @module artnet/packet
 *
 * Protocol reference:
 * - Art-Net 4 Specification (OpDmx, OpSync field layouts)
 *   https://art-net.org.uk/downloads/art-net.pdf
 */
import {
    ARTDMX_HEADER_LENGTH,
    ARTNET_ID,
    ARTNET_PROTOCOL_VERSION,
    ARTSYNC_LENGTH,
    DMX_MAX_CHANNELS,
    OpCode,
} from './constants';
import {splitPortAddress} from './util';

export type ArtDmxOptions = {
    /** 15-bit Port-Address the frame is addressed to. */
    universe: number;
    /** Art-Net sequence byte (0-255). */
    sequence?: number;
    /** Physical input port on the sending node. */
    physical?: number;
    /** DMX frame bytes. */
    data: Uint8Array | Buffer;
    /** Optional data length override (max 512). */
    length?: number;
};

/** Fields of a received OpDmx packet. */
export type ArtDmxPacket = {
    kind: 'dmx';
    protocolVersion: number;
    sequence: number;
    physical: number;
    /** Port-Address as read from the wire (little-endian at offset 14). */
    universe: number;
    /** Declared DMX length, clamped to 512. */
    length: number;
    /**
     * Slot bytes actually present: at most `length`, fewer when the datagram
     * was truncated. A view into the received buffer.
     */
    data: Buffer;
};

/** A received OpSync packet. */
export type ArtSyncPacket = {
    kind: 'sync';
    protocolVersion: number;
};

/** Any other opcode. The engine does not act on these. */
export type ArtUnknownPacket = {
    kind: 'unknown';
    opcode: number;
};

/** Decoded Art-Net datagram. */
export type ArtNetPacket = ArtDmxPacket | ArtSyncPacket | ArtUnknownPacket;

/** Write common Art-Net header fields into a packet buffer. */
const writeHeader = (buffer: Buffer, opcode: OpCode): void => {
    buffer.write(ARTNET_ID, 0, 'ascii');
    buffer.writeUInt16LE(opcode, 8);
    buffer.writeUInt16BE(ARTNET_PROTOCOL_VERSION, 10);
};

/**
 * Build an ArtDMX packet carrying a DMX frame for one universe.
 * @param options DMX payload and addressing fields.
 */
export const buildArtDmx = (options: ArtDmxOptions): Buffer => {
    const length = Math.min(options.length ?? options.data.length, DMX_MAX_CHANNELS);
    const buffer = Buffer.alloc(ARTDMX_HEADER_LENGTH + length);
    writeHeader(buffer, OpCode.OpDmx);
    buffer.writeUInt8((options.sequence ?? 0) & 0xff, 12);
    buffer.writeUInt8(options.physical ?? 0, 13);
    const addr = splitPortAddress(options.universe);
    buffer.writeUInt8(addr.subUni, 14);
    buffer.writeUInt8(addr.net, 15);
    buffer.writeUInt16BE(length, 16);
    Buffer.from(options.data).copy(buffer, ARTDMX_HEADER_LENGTH, 0, length);
    return buffer;
};

/** Build an ArtSync packet for multi-universe synchronization. */
export const buildArtSync = (): Buffer => {
    const buffer = Buffer.alloc(ARTSYNC_LENGTH);
    writeHeader(buffer, OpCode.OpSync);
    buffer.writeUInt8(0, 12);
    buffer.writeUInt8(0, 13);
    return buffer;
};

/**
 * Validate the Art-Net header and decode the datagram by opcode.
 *
 * Returns `null` for anything that is not Art-Net and for any datagram
 * shorter than the 18-byte ArtDmx header, whatever its opcode. The DMX
 * length field is clamped to 512 and never trusted past the end of the
 * datagram.
 * @param buffer Raw UDP payload.
 */
export const decodeArtNetPacket = (buffer: Buffer): ArtNetPacket | null => {
    if (buffer.length < ARTDMX_HEADER_LENGTH) return null;
    if (buffer.toString('ascii', 0, 8) !== ARTNET_ID) return null;

    const opcode = buffer.readUInt16LE(8);
    switch (opcode) {
        case OpCode.OpDmx: {
            const length = Math.min(buffer.readUInt16BE(16), DMX_MAX_CHANNELS);
            const end = Math.min(ARTDMX_HEADER_LENGTH + length, buffer.length);
            return {
                kind: 'dmx',
                protocolVersion: buffer.readUInt16BE(10),
                sequence: buffer.readUInt8(12),
                physical: buffer.readUInt8(13),
                universe: buffer.readUInt16LE(14),
                length,
                data: buffer.subarray(ARTDMX_HEADER_LENGTH, end),
            };
        }
        case OpCode.OpSync:
            return {kind: 'sync', protocolVersion: buffer.readUInt16BE(10)};
        default:
            return {kind: 'unknown', opcode};
    }
};
