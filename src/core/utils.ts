/**
 * Small numeric helpers shared by the core.
 * @module core/utils
 */

/**
 * `ceil` into a byte. Values within 1e-6 above an integer are treated as that
 * integer so float noise (`3 / 255 * 255`) does not round up.
 */
export const ceilByte = (value: number): number => {
    const rounded = Math.ceil(value - 1e-6);
    return Math.max(0, Math.min(255, rounded));
};

/** Ceiling integer division for non-negative integers. */
export const ceilDiv = (numerator: number, denominator: number): number =>
    Math.floor((numerator + denominator - 1) / denominator);
