/**
 * Universe → layer routing.
 * @module topology/RouteTable
 */

/** Where one universe's pixels land. */
export type UniverseRoute = Readonly<{
    /** Index into `Topology.cubes`. */
    cubeIndex: number;
    /** Z layer of that cube. */
    zSlice: number;
    /** First pixel of the layer this universe carries. */
    pixelOffset: number;
}>;

/** Universe-keyed routes. Registering a universe twice keeps the later route. */
export class RouteTable {
    private readonly routes = new Map<number, UniverseRoute>();

    /**
     * @returns The route that was replaced, if any.
     */
    public register(universe: number, route: UniverseRoute): UniverseRoute | undefined {
        const previous = this.routes.get(universe);
        this.routes.set(universe, route);
        return previous;
    }

    public resolve(universe: number): UniverseRoute | undefined {
        return this.routes.get(universe);
    }

    public get size(): number {
        return this.routes.size;
    }

    /** Routes in ascending universe order. */
    public entries(): Array<[number, UniverseRoute]> {
        return [...this.routes.entries()].sort(([a], [b]) => a - b);
    }
}
