import {describe, expect, it, vi} from 'vitest';

import {PixelStore} from '../src';

const regions = [
    {pixelOffset: 0, voxelCount: 4},
    {pixelOffset: 4, voxelCount: 2},
];

describe('PixelStore', () => {
    it('starts zeroed and sized for every region', () => {
        const store = new PixelStore(regions);
        expect(store.totalVoxels).toBe(6);
        expect(store.buffer.byteLength).toBe(16 + 18);
        expect(Array.from(store.snapshot())).toEqual(new Array<number>(18).fill(0));
        expect(store.generation()).toBe(0);
        expect(store.isDirty()).toBe(false);
    });

    it('writes voxels inside their cube only', () => {
        const store = new PixelStore(regions);

        expect(store.write(1, 1, [7, 8, 9])).toBe(true);
        expect(store.write(1, 2, [1, 1, 1])).toBe(false);
        expect(store.write(2, 0, [1, 1, 1])).toBe(false);
        expect(store.write(0, -1, [1, 1, 1])).toBe(false);

        expect(store.pixel(1, 1)).toEqual([7, 8, 9]);
        expect(store.pixel(1, 2)).toBeUndefined();
        expect(Array.from(store.snapshot(1))).toEqual([0, 0, 0, 7, 8, 9]);
        expect(Array.from(store.snapshot()).slice(15)).toEqual([7, 8, 9]);
    });

    it('copies triplets from an offset into the source', () => {
        const store = new PixelStore(regions);
        store.write(0, 3, Uint8Array.from([0, 0, 10, 20, 30]), 2);
        expect(store.pixel(0, 3)).toEqual([10, 20, 30]);
    });

    it('notifies once per transaction that wrote something', () => {
        const store = new PixelStore(regions);
        const onUpdate = vi.fn();
        store.on('update', onUpdate);

        const written = store.transaction((writer) => {
            let count = 0;
            for (let i = 0; i < 5; i++) {
                if (writer.set(0, i, [i, i, i])) count++;
            }
            return count;
        });
        store.transaction((writer) => writer.set(0, 99, [1, 2, 3]));

        expect(written).toBe(4);
        expect(onUpdate).toHaveBeenCalledTimes(1);
        expect(onUpdate).toHaveBeenCalledWith(1);
        expect(store.generation()).toBe(1);
    });

    it('tracks the dirty flag until consumed', () => {
        const store = new PixelStore(regions);
        store.markDirty();

        expect(store.isDirty()).toBe(true);
        expect(store.consumeDirty()).toBe(true);
        expect(store.consumeDirty()).toBe(false);
        expect(Array.from(store.snapshot(1))).toEqual([0, 0, 0, 0, 0, 0]);
    });

    it('returns snapshots that do not alias the store', () => {
        const store = new PixelStore(regions);
        const before = store.snapshot(0);
        store.write(0, 0, [5, 5, 5]);

        expect(before[0]).toBe(0);
        before[1] = 99;
        expect(store.pixel(0, 0)).toEqual([5, 5, 5]);
    });

    it('clears every voxel', () => {
        const store = new PixelStore(regions);
        store.write(0, 0, [1, 2, 3]);
        store.write(1, 1, [4, 5, 6]);
        store.clear();

        expect(Array.from(store.snapshot())).toEqual(new Array<number>(18).fill(0));
        expect(store.generation()).toBe(3);
    });

    it('shares memory with an attached store', () => {
        const store = new PixelStore(regions);
        const attached = PixelStore.attach(store.buffer, regions);

        store.write(1, 0, [11, 12, 13]);
        expect(attached.pixel(1, 0)).toEqual([11, 12, 13]);
        expect(attached.generation()).toBe(1);
        expect(attached.consumeDirty()).toBe(true);
        expect(store.isDirty()).toBe(false);
    });

    it('rejects a shared buffer smaller than the layout', () => {
        expect(() => PixelStore.attach(new SharedArrayBuffer(20), regions)).toThrow(RangeError);
    });

    it('refuses to re-enter its lock', () => {
        const store = new PixelStore(regions);
        expect(() => store.transaction(() => store.snapshot())).toThrow('PixelStore lock is not re-entrant');
        expect(store.write(0, 0, [1, 1, 1])).toBe(true);
    });

    it('resolves waitForUpdate on the next update or after the timeout', async () => {
        vi.useFakeTimers();
        try {
            const store = new PixelStore(regions);

            const updated = store.waitForUpdate(1000);
            store.write(0, 0, [1, 1, 1]);
            await expect(updated).resolves.toBe(true);

            const idle = store.waitForUpdate(1000);
            vi.advanceTimersByTime(1000);
            await expect(idle).resolves.toBe(false);
            expect(store.listenerCount('update')).toBe(0);
        } finally {
            vi.useRealTimers();
        }
    });

    it('returns immediately from waitForUpdateSync once the generation moved', () => {
        const store = new PixelStore(regions);
        store.markDirty();
        expect(store.waitForUpdateSync(0, 10)).toBe(true);
        expect(store.waitForUpdateSync(1, 1)).toBe(false);
    });

    it('rejects snapshots of unknown cubes', () => {
        expect(() => new PixelStore(regions).snapshot(2)).toThrow(RangeError);
    });
});
