import {readFileSync} from 'fs';

import {ColorCorrector, createConsoleLogger, IngestionSupervisor, Topology, type Logger} from '../src';

type CliOptions = {
    config?: string;
    geometry: string;
    fps: number;
    debug: boolean;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {
        geometry: '20x20x20',
        fps: 4,
        debug: false,
    };

    for (const arg of argv) {
        if (arg.startsWith('--config=')) {
            options.config = arg.substring('--config='.length);
        } else if (arg.startsWith('--geometry=')) {
            options.geometry = arg.substring('--geometry='.length);
        } else if (arg.startsWith('--fps=')) {
            const fps = Number(arg.substring('--fps='.length));
            if (Number.isFinite(fps) && fps >= 1 && fps <= 30) {
                options.fps = Math.round(fps);
            }
        } else if (arg === '--debug') {
            options.debug = true;
        }
    }
    return options;
}

function loadTopology(options: CliOptions, logger: Logger): Topology {
    if (!options.config) {
        return Topology.fromConfig({geometry: options.geometry, cubes: [{}]}, {logger});
    }
    const raw: unknown = JSON.parse(readFileSync(options.config, 'utf8'));
    return Topology.fromConfig(raw, {logger});
}

const options = parseArgs(process.argv.slice(2));
const logger = createConsoleLogger({debug: options.debug});
const supervisor = new IngestionSupervisor({
    topology: loadTopology(options, logger),
    logger,
    reuseAddr: true,
});
const corrector = new ColorCorrector();

supervisor.on('listenerError', ({key, error}) => {
    console.error(`[listener ${key}]`, error.message);
});

/** Average reverse-corrected color of every layer of one cube. */
function layerAverages(cubeIndex: number): string[] {
    const cube = supervisor.topology.cube(cubeIndex);
    const pixels = supervisor.snapshot(cubeIndex);
    corrector.reverseCorrectPixels(pixels);

    const lines: string[] = [];
    for (let z = 0; z < cube.length; z++) {
        const sum = [0, 0, 0];
        for (let i = z * cube.layerSize; i < (z + 1) * cube.layerSize; i++) {
            for (let c = 0; c < 3; c++) {
                sum[c] = (sum[c] ?? 0) + (pixels[i * 3 + c] ?? 0);
            }
        }
        const avg = sum.map((v) => String(Math.round(v / cube.layerSize)).padStart(3, ' '));
        lines.push(`  z=${String(z).padStart(2, ' ')}  rgb=${avg.join(' ')}`);
    }
    return lines;
}

function render(): void {
    if (!supervisor.store.consumeDirty()) return;
    process.stdout.write('\x1Bc');

    console.log('Art-Net voxel listener');
    for (const [key, stats] of Object.entries(supervisor.stats())) {
        console.log(
            `${key} | packets=${stats.packets} dmx=${stats.dmxPackets} sync=${stats.syncPackets} ` +
            `malformed=${stats.malformed} unroutable=${stats.unroutable} written=${stats.pixelsWritten}`,
        );
    }
    console.log('Press Ctrl+C to exit.\n');

    for (const cube of supervisor.topology.cubes) {
        console.log(`Cube ${cube.id} (${cube.width}x${cube.height}x${cube.length})`);
        console.log(layerAverages(cube.index).join('\n'));
        console.log('');
    }
}

const timer = setInterval(render, Math.round(1000 / options.fps));

supervisor.start().catch((error: unknown) => {
    clearInterval(timer);
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});

function shutdown(): void {
    clearInterval(timer);
    supervisor.stop().then(() => process.exit(0), (error: unknown) => {
        console.error(error);
        process.exit(1);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
