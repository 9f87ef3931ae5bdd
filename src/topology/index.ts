/**
 * Installation geometry and universe routing.
 * @module topology
 */
export * from './schema';
export * from './orientation';
export * from './RouteTable';
export * from './Topology';
