/**
 * Protocol exports (Art-Net).
 * @module protocols
 */
export * from './artnet';
