import {ColorCorrector, Topology, VoxelFrameSender} from '../src';

const host = process.argv[2];
const topology = Topology.fromConfig({geometry: '20x20x20', cubes: [{}]});
const sender = new VoxelFrameSender({topology, host});
const corrector = new ColorCorrector();

const frameMs = 33;
const hueStep = 3;
const layerHueOffset = 18;

const hueToRgb = (hue: number): [number, number, number] => {
    const x = 1 - Math.abs(((hue / 60) % 2) - 1);
    let rgb: [number, number, number];
    if (hue < 60) rgb = [1, x, 0];
    else if (hue < 120) rgb = [x, 1, 0];
    else if (hue < 180) rgb = [0, 1, x];
    else if (hue < 240) rgb = [0, x, 1];
    else if (hue < 300) rgb = [x, 0, 1];
    else rgb = [1, 0, x];
    return [Math.round(rgb[0] * 255), Math.round(rgb[1] * 255), Math.round(rgb[2] * 255)];
};

const cube = topology.cube(0);
const frame = new Uint8Array(cube.voxelCount * 3);
let baseHue = 0;

const timer = setInterval(async () => {
    for (let z = 0; z < cube.length; z++) {
        const color = hueToRgb((baseHue + z * layerHueOffset) % 360);
        corrector.correct(color);
        for (let i = z * cube.layerSize; i < (z + 1) * cube.layerSize; i++) {
            frame.set(color, i * 3);
        }
    }

    try {
        await sender.sendFrame(0, frame);
    } catch (error) {
        console.error('send failed:', error instanceof Error ? error.message : error);
    }
    baseHue = (baseHue + hueStep) % 360;
}, frameMs);

sender.on('error', (error) => {
    console.error('[VoxelFrameSender]', error.message);
});

process.on('SIGINT', () => {
    clearInterval(timer);
    sender.close();
});
