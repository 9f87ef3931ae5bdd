/**
 * Art-Net 4 utility helpers.
 * @module artnet/util
 *
 * Protocol reference:
 * - Art-Net 4 Specification (Port-Address / Net/SubUni packing)
 *   https://art-net.org.uk/downloads/art-net.pdf
 */
import {MAX_PORT_ADDRESS} from './constants';

export type ArtNetAddress = {
    /** 7-bit Net field (high universe bits). */
    net: number;
    /** 4-bit Sub-Net field. */
    subNet: number;
    /** 4-bit Universe field (0-15 inside one Sub-Net). */
    universe: number;
    /** Packed SubUni byte (`subNet << 4 | universe`). */
    subUni: number;
};

/**
 * Throw unless `universe` is a valid 15-bit Port-Address.
 * @returns The validated universe.
 */
export const validatePortAddress = (universe: number): number => {
    if (!Number.isInteger(universe) || universe < 0 || universe > MAX_PORT_ADDRESS) {
        throw new RangeError(`Art-Net universe must be 0-${MAX_PORT_ADDRESS}, got ${universe}`);
    }
    return universe;
};

/**
 * Split a 15-bit Port-Address (the universe number as carried on the wire)
 * into Net/Sub-Net/Universe fields.
 * @param universe Port-Address in range 0-32767.
 */
export const splitPortAddress = (universe: number): ArtNetAddress => {
    const address = validatePortAddress(universe);
    const net = (address >> 8) & 0x7f;
    const subNet = (address >> 4) & 0x0f;
    const uni = address & 0x0f;
    const subUni = (subNet << 4) | uni;
    return {net, subNet, universe: uni, subUni};
};
