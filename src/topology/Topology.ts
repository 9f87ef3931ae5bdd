/**
 * Cube geometry and universe routing for a multi-cube installation.
 * @module topology/Topology
 */
import {TopologyError} from '../core/errors';
import {silentLogger, type Logger} from '../core/logger';
import {ceilDiv} from '../core/utils';
import {MAX_PORT_ADDRESS, PIXELS_PER_UNIVERSE} from '../protocols/artnet/constants';
import {parseOrientation, voxelWorldPosition, type Orientation, type Vec3} from './orientation';
import {RouteTable, type UniverseRoute} from './RouteTable';
import {TopologyConfigSchema, type ParsedCubeConfig, type ParsedTopologyConfig} from './schema';

/** One rectangular voxel volume and its slice of the pixel buffer. */
export type Cube = Readonly<{
    index: number;
    id: string;
    width: number;
    height: number;
    length: number;
    /** `width * height`. */
    layerSize: number;
    /** `width * height * length`. */
    voxelCount: number;
    /** Global voxel index of this cube's first voxel. */
    pixelOffset: number;
    /** `ceil(layerSize / 170)`. */
    universesPerLayer: number;
    position: Vec3;
    orientation: Orientation;
    worldOrientation: Orientation;
}>;

/** One `(ip, port)` pair to listen on and the routes it serves. */
export type ListenerBinding = Readonly<{
    /** `ip:port`. */
    key: string;
    ip: string;
    port: number;
    routes: RouteTable;
    /** Cubes fed through this binding, ascending. */
    cubeIndices: readonly number[];
}>;

/** A resolved voxel. `index` is cube-relative, `globalIndex` buffer-wide. */
export type VoxelAddress = Readonly<{
    cubeIndex: number;
    x: number;
    y: number;
    z: number;
    index: number;
    globalIndex: number;
}>;

/** A route together with the binding and universe it was registered under. */
export type CubeRoute = Readonly<{
    universe: number;
    route: UniverseRoute;
    binding: ListenerBinding;
}>;

export type TopologyOptions = {
    /** Receives a warning for every overlapping universe registration. */
    logger?: Logger;
};

type MutableBinding = {
    ip: string;
    port: number;
    routes: RouteTable;
    cubeIndices: Set<number>;
};

const parseGeometry = (geometry: string): [number, number, number] => {
    const [width = 0, height = 0, length = 0] = geometry.split('x').map(Number);
    return [width, height, length];
};

const cubeDimensions = (
    cube: ParsedCubeConfig,
    index: number,
    fallback: string | undefined,
): [number, number, number] => {
    const fromString = cube.dimensions ?? fallback;
    const parsed = fromString ? parseGeometry(fromString) : undefined;
    const width = cube.width ?? parsed?.[0];
    const height = cube.height ?? parsed?.[1];
    const length = cube.length ?? parsed?.[2];
    if (!width || !height || !length) {
        throw new TopologyError({
            message: `Cube ${index} has no dimensions and the config has no geometry fallback`,
            code: 'INVALID_CONFIG',
            details: {cube: index},
        });
    }
    return [width, height, length];
};

/**
 * Immutable description of the installation: cubes, their buffer layout, and
 * universe routing tables.
 *
 * Cubes with explicit mappings get the routes those mappings describe. Cubes
 * without mappings are laid out sequentially on the default listener, one
 * block of `length * universesPerLayer` universes per cube. Both end up in
 * the same table form.
 */
export class Topology {
    public readonly cubes: readonly Cube[];
    public readonly bindings: readonly ListenerBinding[];
    /** Sum of every cube's voxel count. */
    public readonly totalVoxels: number;
    private readonly routes = new RouteTable();
    private readonly logger: Logger;

    /**
     * Validate a loader-supplied configuration and build a topology from it.
     * @throws TopologyError when the configuration is invalid.
     */
    public static fromConfig(config: unknown, options: TopologyOptions = {}): Topology {
        const result = TopologyConfigSchema.safeParse(config);
        if (!result.success) {
            throw new TopologyError({
                message: `Invalid topology configuration: ${result.error.issues
                    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
                    .join('; ')}`,
                code: 'INVALID_CONFIG',
                details: {issues: result.error.issues},
                cause: result.error,
            });
        }
        return new Topology(result.data, options);
    }

    constructor(config: ParsedTopologyConfig, {logger = silentLogger}: TopologyOptions = {}) {
        this.logger = logger;
        if (config.cubes.length === 0) {
            throw new TopologyError({message: 'Topology needs at least one cube', code: 'EMPTY_TOPOLOGY'});
        }

        const cubes: Cube[] = [];
        let pixelOffset = 0;
        const seenIds = new Set<string>();
        config.cubes.forEach((cubeConfig, index) => {
            const id = cubeConfig.id ?? String(index);
            if (seenIds.has(id)) {
                throw new TopologyError({
                    message: `Cube id ${id} is used more than once`,
                    code: 'INVALID_CONFIG',
                    details: {cube: index, id},
                });
            }
            seenIds.add(id);
            const [width, height, length] = cubeDimensions(cubeConfig, index, config.geometry);
            const layerSize = width * height;
            const voxelCount = layerSize * length;
            cubes.push({
                index,
                id,
                width,
                height,
                length,
                layerSize,
                voxelCount,
                pixelOffset,
                universesPerLayer: ceilDiv(layerSize, PIXELS_PER_UNIVERSE),
                position: cubeConfig.position,
                orientation: parseOrientation(cubeConfig.orientation),
                worldOrientation: parseOrientation(cubeConfig.worldOrientation),
            });
            pixelOffset += voxelCount;
        });
        this.cubes = cubes;
        this.totalVoxels = pixelOffset;

        const bindings = new Map<string, MutableBinding>();
        const bindingFor = (ip: string, port: number): MutableBinding => {
            const key = `${ip}:${port}`;
            let binding = bindings.get(key);
            if (!binding) {
                binding = {ip, port, routes: new RouteTable(), cubeIndices: new Set()};
                bindings.set(key, binding);
            }
            return binding;
        };

        config.cubes.forEach((cubeConfig, index) => {
            const cube = cubes[index];
            if (cubeConfig.mappings.length === 0) {
                const binding = bindingFor(config.defaults.ip, config.defaults.port);
                const universesPerCube = cube.length * cube.universesPerLayer;
                const baseUniverse = index * universesPerCube;
                for (let z = 0; z < cube.length; z++) {
                    for (let u = 0; u < cube.universesPerLayer; u++) {
                        this.register(binding, baseUniverse + z * cube.universesPerLayer + u, {
                            cubeIndex: index,
                            zSlice: z,
                            pixelOffset: u * PIXELS_PER_UNIVERSE,
                        });
                    }
                }
                return;
            }

            for (const mapping of cubeConfig.mappings) {
                const binding = bindingFor(mapping.ip ?? config.defaults.ip, mapping.port ?? config.defaults.port);
                const universesPerLayer = mapping.universesPerLayer ?? cube.universesPerLayer;
                const baseUniverse = mapping.baseUniverse ?? Math.min(...mapping.zIndices) * universesPerLayer;
                mapping.zIndices.forEach((zSlice, i) => {
                    if (zSlice >= cube.length) {
                        throw new TopologyError({
                            message: `Cube ${cube.id} has ${cube.length} layers, mapping names z index ${zSlice}`,
                            code: 'INVALID_Z_INDEX',
                            details: {cube: index, zSlice},
                        });
                    }
                    for (let j = 0; j < universesPerLayer; j++) {
                        this.register(binding, baseUniverse + i * universesPerLayer + j, {
                            cubeIndex: index,
                            zSlice,
                            pixelOffset: j * PIXELS_PER_UNIVERSE,
                        });
                    }
                });
            }
        });

        this.bindings = [...bindings.entries()].map(([key, binding]) => ({
            key,
            ip: binding.ip,
            port: binding.port,
            routes: binding.routes,
            cubeIndices: [...binding.cubeIndices].sort((a, b) => a - b),
        }));
    }

    /** Route for a universe across every binding (last registration wins). */
    public resolve(universe: number): UniverseRoute | undefined {
        return this.routes.resolve(universe);
    }

    /**
     * Turn the `pixel`-th RGB triplet of a routed universe into a voxel.
     * @returns `null` when the pixel falls outside its layer or cube.
     */
    public locate(route: UniverseRoute, pixel: number): VoxelAddress | null {
        const index = this.voxelIndex(route, pixel);
        const cube = this.cubes[route.cubeIndex];
        if (index < 0 || !cube) return null;
        const pixelInLayer = route.pixelOffset + pixel;
        return {
            cubeIndex: cube.index,
            x: pixelInLayer % cube.width,
            y: Math.floor(pixelInLayer / cube.width),
            z: route.zSlice,
            index,
            globalIndex: cube.pixelOffset + index,
        };
    }

    /**
     * Cube-relative voxel index of the `pixel`-th triplet of a routed universe,
     * or -1 when it falls outside the layer or the cube.
     */
    public voxelIndex(route: UniverseRoute, pixel: number): number {
        const cube = this.cubes[route.cubeIndex];
        if (!cube || !Number.isInteger(pixel) || pixel < 0) return -1;
        const pixelInLayer = route.pixelOffset + pixel;
        if (pixelInLayer >= cube.layerSize) return -1;
        const x = pixelInLayer % cube.width;
        const y = Math.floor(pixelInLayer / cube.width);
        const index = route.zSlice * cube.layerSize + y * cube.width + x;
        return index >= 0 && index < cube.voxelCount ? index : -1;
    }

    public cube(index: number): Cube {
        const cube = this.cubes[index];
        if (!cube) {
            throw new RangeError(`Cube index must be 0-${this.cubes.length - 1}, got ${index}`);
        }
        return cube;
    }

    /** Index of the cube with the given id. */
    public cubeIndexOf(id: string): number {
        const index = this.cubes.findIndex((cube) => cube.id === id);
        if (index < 0) {
            throw new RangeError(`Unknown cube id ${id}`);
        }
        return index;
    }

    /** Every route feeding one cube, grouped by binding, ascending universe. */
    public routesForCube(cubeIndex: number): CubeRoute[] {
        this.cube(cubeIndex);
        const result: CubeRoute[] = [];
        for (const binding of this.bindings) {
            for (const [universe, route] of binding.routes.entries()) {
                if (route.cubeIndex === cubeIndex) result.push({universe, route, binding});
            }
        }
        return result;
    }

    /** World-space center of a voxel of one cube. */
    public worldPosition(cubeIndex: number, x: number, y: number, z: number): Vec3 {
        return voxelWorldPosition(this.cube(cubeIndex), x, y, z);
    }

    private register(binding: MutableBinding, universe: number, route: UniverseRoute): void {
        if (universe > MAX_PORT_ADDRESS) {
            throw new TopologyError({
                message: `Cube ${route.cubeIndex} needs universe ${universe}, above the Art-Net limit ${MAX_PORT_ADDRESS}`,
                code: 'INVALID_CONFIG',
                details: {cube: route.cubeIndex, universe},
            });
        }
        binding.cubeIndices.add(route.cubeIndex);
        const replaced = binding.routes.register(universe, route);
        if (replaced) {
            this.logger.warn(
                `Universe ${universe} on ${binding.ip}:${binding.port} remapped from cube ${replaced.cubeIndex} ` +
                `layer ${replaced.zSlice} to cube ${route.cubeIndex} layer ${route.zSlice}`,
            );
        }
        this.routes.register(universe, route);
    }
}
