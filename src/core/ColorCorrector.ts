/**
 * Gamma + peak-brightness correction tables.
 * @module core/ColorCorrector
 */
import {ceilByte} from './utils';

/** Per-channel correction parameters. Both arrays have one entry per channel. */
export type ColorCorrectorOptions = {
    /** Gamma exponent per channel. */
    gamma: readonly number[];
    /** Peak brightness per channel, in any common unit (datasheets give mcd). */
    brightness: readonly number[];
};

/** WS2812B: gamma 2.8, brightness at the midpoint of the datasheet ranges. */
export const WS2812B_OPTIONS: ColorCorrectorOptions = {
    gamma: [2.8, 2.8, 2.8],
    brightness: [(550 + 700) / 2, (1100 + 1400) / 2, (200 + 400) / 2],
};

/** Writable pixel storage the corrector can update in place. */
export type PixelBytes = {
    length: number;
    [index: number]: number;
};

const validateOptions = ({gamma, brightness}: ColorCorrectorOptions): void => {
    if (gamma.length === 0 || gamma.length !== brightness.length) {
        throw new RangeError(
            `gamma and brightness need one entry per channel, got ${gamma.length} and ${brightness.length}`,
        );
    }
    for (const value of [...gamma, ...brightness]) {
        if (!Number.isFinite(value) || value <= 0) {
            throw new RangeError(`gamma and brightness must be positive, got ${value}`);
        }
    }
};

/**
 * Forward and reverse 256-entry lookup tables per channel.
 *
 * Forward maps a show value to the value the LEDs are driven with: gamma is
 * applied, then every channel is dimmed to the dimmest channel's peak.
 * Reverse applies the inverse gamma to values divided by the channel's
 * brightness ratio. With equal brightness on every channel the two tables
 * invert each other (up to rounding).
 */
export class ColorCorrector {
    public readonly channels: number;
    private readonly forward: Uint8Array[];
    private readonly reverse: Uint8Array[];

    constructor(options: ColorCorrectorOptions = WS2812B_OPTIONS) {
        validateOptions(options);
        this.channels = options.gamma.length;
        const minBrightness = Math.min(...options.brightness);

        this.forward = [];
        this.reverse = [];
        for (let c = 0; c < this.channels; c++) {
            const gamma = options.gamma[c];
            // <= 1; the dimmest channel keeps full scale
            const peak = minBrightness / options.brightness[c];
            const scale = options.brightness[c] / minBrightness;
            const forward = new Uint8Array(256);
            const reverse = new Uint8Array(256);
            for (let j = 0; j < 256; j++) {
                forward[j] = ceilByte(Math.pow(j / 255, gamma) * 255 * peak);
                const normalized = Math.min(1, Math.max(0, j / 255 / scale));
                reverse[j] = ceilByte(Math.pow(normalized, 1 / gamma) * 255);
            }
            this.forward.push(forward);
            this.reverse.push(reverse);
        }
    }

    /** Forward table for one channel (copy). */
    public forwardTable(channel: number): Uint8Array {
        return Uint8Array.from(this.table(this.forward, channel));
    }

    /** Reverse table for one channel (copy). */
    public reverseTable(channel: number): Uint8Array {
        return Uint8Array.from(this.table(this.reverse, channel));
    }

    /** Apply the forward tables to one pixel starting at `offset`. */
    public correct(pixel: PixelBytes, offset = 0): void {
        this.apply(this.forward, pixel, offset);
    }

    /** Apply the reverse tables to one pixel starting at `offset`. */
    public reverseCorrect(pixel: PixelBytes, offset = 0): void {
        this.apply(this.reverse, pixel, offset);
    }

    /** Forward-correct a packed run of pixels. */
    public correctPixels(pixels: PixelBytes): void {
        for (let offset = 0; offset + this.channels <= pixels.length; offset += this.channels) {
            this.apply(this.forward, pixels, offset);
        }
    }

    /** Reverse-correct a packed run of pixels. */
    public reverseCorrectPixels(pixels: PixelBytes): void {
        for (let offset = 0; offset + this.channels <= pixels.length; offset += this.channels) {
            this.apply(this.reverse, pixels, offset);
        }
    }

    private apply(tables: Uint8Array[], pixel: PixelBytes, offset: number): void {
        for (let c = 0; c < this.channels; c++) {
            pixel[offset + c] = tables[c][pixel[offset + c] & 0xff];
        }
    }

    private table(tables: Uint8Array[], channel: number): Uint8Array {
        const table = tables[channel];
        if (!table) {
            throw new RangeError(`Channel must be 0-${this.channels - 1}, got ${channel}`);
        }
        return table;
    }
}
