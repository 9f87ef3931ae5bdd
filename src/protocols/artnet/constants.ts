/**
 * Art-Net 4 protocol constants.
 * @module artnet/constants
 *
 * Protocol reference:
 * - Art-Net 4 Specification (tables for opcodes, fields, and defaults)
 *   https://art-net.org.uk/downloads/art-net.pdf
 */
export const ARTNET_PORT = 6454;
/** Art-Net packet id (8-byte ASCII signature). */
export const ARTNET_ID = 'Art-Net\u0000';
/** Protocol version written by the packet builders. */
export const ARTNET_PROTOCOL_VERSION = 14;

/** ArtSync packet length as built for the wire. */
export const ARTSYNC_LENGTH = 14;
/** Offset of the first DMX slot in an ArtDmx packet; shorter datagrams are dropped. */
export const ARTDMX_HEADER_LENGTH = 18;
/** DMX512 slots per universe. */
export const DMX_MAX_CHANNELS = 512;
/** Highest 15-bit Port-Address. */
export const MAX_PORT_ADDRESS = 0x7fff;

/** Bytes per voxel on the wire (R, G, B). */
export const BYTES_PER_PIXEL = 3;
/** RGB pixels that fit in one universe: floor(512 / 3). */
export const PIXELS_PER_UNIVERSE = Math.floor(DMX_MAX_CHANNELS / BYTES_PER_PIXEL);

/** Art-Net operation codes (little-endian on wire). */
export enum OpCode {
    OpPoll = 0x2000,
    OpPollReply = 0x2100,
    OpDmx = 0x5000,
    OpNzs = 0x5100,
    OpSync = 0x5200,
}
