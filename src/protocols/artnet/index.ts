/**
 * Art-Net 4 protocol exports.
 * @module artnet
 */
export * from './constants';
export * from './util';
export * from './packet';
export * from './listener';
export * from './sender';
