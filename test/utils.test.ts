import {describe, expect, it} from 'vitest';

import {ceilByte, ceilDiv, parseAxis} from '../src';

describe('core utils', () => {
    it('rounds up into a byte, ignoring float noise', () => {
        expect(ceilByte(3 / 255 * 255)).toBe(3);
        expect(ceilByte(3.2)).toBe(4);
        expect(ceilByte(-4)).toBe(0);
        expect(ceilByte(300)).toBe(255);
    });

    it('divides rounding up', () => {
        expect(ceilDiv(400, 170)).toBe(3);
        expect(ceilDiv(340, 170)).toBe(2);
        expect(ceilDiv(0, 170)).toBe(0);
    });
});

describe('parseAxis', () => {
    it('reads optional signs', () => {
        expect(parseAxis('-Z')).toEqual({axis: 'Z', sign: -1});
        expect(parseAxis('+Y')).toEqual({axis: 'Y', sign: 1});
        expect(parseAxis('X')).toEqual({axis: 'X', sign: 1});
    });
});
