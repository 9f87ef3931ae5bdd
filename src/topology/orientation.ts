/**
 * Cube-local to world-space voxel positions.
 * @module topology/orientation
 */
import type {SignedAxisName} from './schema';

export type Axis = 'X' | 'Y' | 'Z';
export type SignedAxis = Readonly<{axis: Axis; sign: 1 | -1}>;
export type Orientation = readonly [SignedAxis, SignedAxis, SignedAxis];
export type Vec3 = readonly [number, number, number];

const AXIS_INDEX: Record<Axis, 0 | 1 | 2> = {X: 0, Y: 1, Z: 2};

export const parseAxis = (name: SignedAxisName): SignedAxis => {
    const sign = name.startsWith('-') ? -1 : 1;
    const letter = name.charAt(name.length - 1);
    const axis: Axis = letter === 'X' ? 'X' : letter === 'Y' ? 'Y' : 'Z';
    return {axis, sign};
};

export const parseOrientation = (
    names: readonly [SignedAxisName, SignedAxisName, SignedAxisName],
): Orientation => [parseAxis(names[0]), parseAxis(names[1]), parseAxis(names[2])];

/** What `voxelWorldPosition` needs to know about a cube. */
export type OrientedVolume = {
    width: number;
    height: number;
    length: number;
    position: Vec3;
    orientation: Orientation;
    worldOrientation: Orientation;
};

/**
 * Center of voxel `(x, y, z)` in world space.
 *
 * Local axis `k` runs along `orientation[k]`; a negative axis counts from the
 * far side of the cube. The result is then permuted (and negated where
 * signed) by `worldOrientation` and offset by the cube's `position`.
 */
export const voxelWorldPosition = (cube: OrientedVolume, x: number, y: number, z: number): Vec3 => {
    const local = [x, y, z];
    const extent = [cube.width, cube.height, cube.length];
    const oriented = [0, 0, 0];
    for (let k = 0; k < 3; k++) {
        const {axis, sign} = cube.orientation[k];
        oriented[AXIS_INDEX[axis]] = sign > 0 ? local[k] + 0.5 : extent[k] - local[k] - 0.5;
    }
    const world = [0, 0, 0];
    for (let k = 0; k < 3; k++) {
        const {axis, sign} = cube.worldOrientation[k];
        world[k] = sign * oriented[AXIS_INDEX[axis]] + cube.position[k];
    }
    return [world[0], world[1], world[2]];
};
