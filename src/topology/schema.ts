/**
 * Shape of the resolved topology handed over by the config loader.
 * @module topology/schema
 */
import {z} from 'zod';

import {ARTNET_PORT, MAX_PORT_ADDRESS} from '../protocols/artnet/constants';

const SignedAxisSchema = z.enum(['X', 'Y', 'Z', '+X', '+Y', '+Z', '-X', '-Y', '-Z']);

const OrientationSchema = z
    .tuple([SignedAxisSchema, SignedAxisSchema, SignedAxisSchema])
    .refine((axes) => new Set(axes.map((axis) => axis.replace(/^[+-]/, ''))).size === 3, {
        message: 'orientation must name each of X, Y and Z exactly once',
    });

/** `"20x20x20"` style geometry. */
const GeometrySchema = z.string().regex(/^\d+x\d+x\d+$/, 'geometry must look like WIDTHxHEIGHTxLENGTH');

/** JSON configs sometimes carry the port as a string. */
const PortSchema = z.coerce.number().int().min(1).max(65535);

const DimensionSchema = z.number().int().positive();

export const ZMappingSchema = z.object({
    ip: z.string().min(1).optional(),
    port: PortSchema.optional(),
    baseUniverse: z.number().int().min(0).max(MAX_PORT_ADDRESS).optional(),
    universesPerLayer: z.number().int().positive().optional(),
    zIndices: z.array(z.number().int().min(0)).min(1),
});

export const CubeConfigSchema = z.object({
    id: z.string().min(1).optional(),
    width: DimensionSchema.optional(),
    height: DimensionSchema.optional(),
    length: DimensionSchema.optional(),
    dimensions: GeometrySchema.optional(),
    position: z.tuple([z.number(), z.number(), z.number()]).default([0, 0, 0]),
    orientation: OrientationSchema.default(['-Z', 'Y', 'X']),
    worldOrientation: OrientationSchema.default(['X', 'Y', 'Z']),
    mappings: z.array(ZMappingSchema).default([]),
});

export const TopologyConfigSchema = z.object({
    /** Fallback dimensions for cubes that declare none. */
    geometry: GeometrySchema.optional(),
    defaults: z
        .object({
            ip: z.string().min(1).default('0.0.0.0'),
            port: PortSchema.default(ARTNET_PORT),
        })
        .default({}),
    cubes: z.array(CubeConfigSchema),
});

/** Configuration as accepted from a loader (defaults may be omitted). */
export type TopologyConfig = z.input<typeof TopologyConfigSchema>;
export type CubeConfig = z.input<typeof CubeConfigSchema>;
export type ZMappingConfig = z.input<typeof ZMappingSchema>;

/** Configuration after validation with every default filled in. */
export type ParsedTopologyConfig = z.output<typeof TopologyConfigSchema>;
export type ParsedCubeConfig = z.output<typeof CubeConfigSchema>;
export type SignedAxisName = z.output<typeof SignedAxisSchema>;
