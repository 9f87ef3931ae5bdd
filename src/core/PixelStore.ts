/**
 * Shared voxel color buffer.
 * @module core/PixelStore
 *
 * Memory layout (one SharedArrayBuffer):
 *   - Control block (16 bytes, Int32 words): lock, update generation, dirty flag
 *   - Pixels: 3 bytes (R, G, B) per voxel, cubes back to back in topology order
 */
import {EventEmitter} from 'events';

import {BYTES_PER_PIXEL} from '../protocols/artnet/constants';

const CONTROL_BYTES = 16;
const LOCK = 0;
const GENERATION = 1;
const DIRTY = 2;

const UNLOCKED = 0;
const LOCKED = 1;
/** Upper bound on one Atomics.wait while contending for the lock. */
const LOCK_WAIT_MS = 5;

/** A cube's slice of the buffer, in voxels. `Topology.cubes` fits this. */
export type PixelRegion = Readonly<{
    pixelOffset: number;
    voxelCount: number;
}>;

export type Rgb = [number, number, number];

/** Bounded voxel writes, handed out by `PixelStore.transaction`. */
export type PixelWriter = {
    /**
     * Copy one RGB triplet from `source[sourceOffset..+3]` into a voxel.
     * @returns `false` (and writes nothing) when the voxel is out of range.
     */
    set(cubeIndex: number, voxelIndex: number, source: ArrayLike<number>, sourceOffset?: number): boolean;
};

export interface PixelStoreEvents {
    /** Pixel data changed or a redraw was requested. Carries the new generation. */
    update: [number];
}

/**
 * Voxel colors for every cube, guarded by one lock.
 *
 * Writers and full-buffer readers take the lock; critical sections are one
 * universe of writes or one buffer copy. The store lives in shared memory so a
 * render worker can `attach` to it and block on `waitForUpdateSync`.
 */
export class PixelStore extends EventEmitter<PixelStoreEvents> {
    public readonly regions: readonly PixelRegion[];
    public readonly totalVoxels: number;
    private readonly shared: SharedArrayBuffer;
    private readonly control: Int32Array;
    private readonly pixels: Uint8Array;
    private held = false;

    /**
     * Allocate a zeroed store for the given cube regions.
     * @param regions Cube slices, usually `topology.cubes`.
     */
    constructor(regions: readonly PixelRegion[], buffer?: SharedArrayBuffer) {
        super();
        this.regions = regions.map(({pixelOffset, voxelCount}) => ({pixelOffset, voxelCount}));
        this.totalVoxels = regions.reduce((max, r) => Math.max(max, r.pixelOffset + r.voxelCount), 0);
        const byteLength = CONTROL_BYTES + this.totalVoxels * BYTES_PER_PIXEL;
        if (buffer && buffer.byteLength < byteLength) {
            throw new RangeError(`Shared buffer holds ${buffer.byteLength} bytes, layout needs ${byteLength}`);
        }
        this.shared = buffer ?? new SharedArrayBuffer(byteLength);
        this.control = new Int32Array(this.shared, 0, CONTROL_BYTES / 4);
        this.pixels = new Uint8Array(this.shared, CONTROL_BYTES, this.totalVoxels * BYTES_PER_PIXEL);
    }

    /** Open a store over memory created by another `PixelStore` (e.g. in a worker). */
    public static attach(buffer: SharedArrayBuffer, regions: readonly PixelRegion[]): PixelStore {
        return new PixelStore(regions, buffer);
    }

    /** The shared memory, for handing to a worker thread. */
    public get buffer(): SharedArrayBuffer {
        return this.shared;
    }

    /** Monotonic (wrapping) counter bumped on every update. */
    public generation(): number {
        return Atomics.load(this.control, GENERATION);
    }

    /**
     * Write one voxel and signal the update.
     * @returns `false` when the voxel is out of range; nothing is written then.
     */
    public write(cubeIndex: number, voxelIndex: number, rgb: ArrayLike<number>, offset = 0): boolean {
        return this.transaction((writer) => writer.set(cubeIndex, voxelIndex, rgb, offset));
    }

    /**
     * Run a batch of writes under the lock. Waiters are notified once,
     * afterwards, if anything was written.
     */
    public transaction<T>(fn: (writer: PixelWriter) => T): T {
        let written = 0;
        const writer: PixelWriter = {
            set: (cubeIndex, voxelIndex, source, sourceOffset = 0) => {
                const start = this.byteOffset(cubeIndex, voxelIndex);
                if (start < 0) return false;
                this.pixels[start] = source[sourceOffset];
                this.pixels[start + 1] = source[sourceOffset + 1];
                this.pixels[start + 2] = source[sourceOffset + 2];
                written++;
                return true;
            },
        };
        const result = this.withLock(() => fn(writer));
        if (written > 0) this.notifyUpdate();
        return result;
    }

    /**
     * Copy of one cube's pixels, or of every cube when `cubeIndex` is omitted.
     * Packed RGB, voxel order `z * width * height + y * width + x`.
     */
    public snapshot(cubeIndex?: number): Uint8Array {
        if (cubeIndex === undefined) {
            return this.withLock(() => this.pixels.slice());
        }
        const region = this.region(cubeIndex);
        const start = region.pixelOffset * BYTES_PER_PIXEL;
        const end = start + region.voxelCount * BYTES_PER_PIXEL;
        return this.withLock(() => this.pixels.slice(start, end));
    }

    /** Color of one voxel, or `undefined` when out of range. */
    public pixel(cubeIndex: number, voxelIndex: number): Rgb | undefined {
        const start = this.byteOffset(cubeIndex, voxelIndex);
        if (start < 0) return undefined;
        return this.withLock((): Rgb => [this.pixels[start], this.pixels[start + 1], this.pixels[start + 2]]);
    }

    /** Zero every voxel. */
    public clear(): void {
        this.withLock(() => this.pixels.fill(0));
        this.notifyUpdate();
    }

    /** Request a redraw without changing pixels (ArtSync). */
    public markDirty(): void {
        this.notifyUpdate();
    }

    /** Bump the generation, raise the dirty flag and wake every waiter. */
    public notifyUpdate(): void {
        const generation = Atomics.add(this.control, GENERATION, 1) + 1;
        Atomics.store(this.control, DIRTY, 1);
        Atomics.notify(this.control, GENERATION);
        this.emit('update', generation | 0);
    }

    /** @returns `true` when an update arrived since the last `consumeDirty`. */
    public isDirty(): boolean {
        return Atomics.load(this.control, DIRTY) === 1;
    }

    /**
     * Read and reset the dirty flag.
     * @returns `true` if data changed since last consume.
     */
    public consumeDirty(): boolean {
        return Atomics.exchange(this.control, DIRTY, 0) === 1;
    }

    /**
     * Resolve on the next update, or with `false` after `timeoutMs` so a
     * stalled feed never hangs the consumer.
     */
    public waitForUpdate(timeoutMs: number): Promise<boolean> {
        return new Promise((resolve) => {
            const onUpdate = (): void => {
                clearTimeout(timer);
                resolve(true);
            };
            const timer = setTimeout(() => {
                this.off('update', onUpdate);
                resolve(false);
            }, timeoutMs);
            this.once('update', onUpdate);
        });
    }

    /**
     * Block the calling thread until the generation moves past `generation`.
     * Meant for render workers attached to the shared buffer.
     * @returns `false` on timeout.
     */
    public waitForUpdateSync(generation: number, timeoutMs: number): boolean {
        return Atomics.wait(this.control, GENERATION, generation, timeoutMs) !== 'timed-out';
    }

    private region(cubeIndex: number): PixelRegion {
        const region = this.regions[cubeIndex];
        if (!region) {
            throw new RangeError(`Cube index must be 0-${this.regions.length - 1}, got ${cubeIndex}`);
        }
        return region;
    }

    /** Byte offset of a voxel, or -1 when it lies outside its cube. */
    private byteOffset(cubeIndex: number, voxelIndex: number): number {
        const region = this.regions[cubeIndex];
        if (!region || !Number.isInteger(voxelIndex) || voxelIndex < 0 || voxelIndex >= region.voxelCount) {
            return -1;
        }
        return (region.pixelOffset + voxelIndex) * BYTES_PER_PIXEL;
    }

    private withLock<T>(fn: () => T): T {
        if (this.held) {
            throw new Error('PixelStore lock is not re-entrant');
        }
        while (Atomics.compareExchange(this.control, LOCK, UNLOCKED, LOCKED) !== UNLOCKED) {
            Atomics.wait(this.control, LOCK, LOCKED, LOCK_WAIT_MS);
        }
        this.held = true;
        try {
            return fn();
        } finally {
            this.held = false;
            Atomics.store(this.control, LOCK, UNLOCKED);
            Atomics.notify(this.control, LOCK, 1);
        }
    }
}
