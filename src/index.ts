/**
 * Art-Net voxel ingestion engine.
 * @module artnet-voxel
 */
export * from './core/errors';
export * from './core/logger';
export * from './core/utils';
export * from './core/ColorCorrector';
export * from './core/PixelStore';
export * from './core/IngestionSupervisor';
export * from './topology';
export * from './protocols';
