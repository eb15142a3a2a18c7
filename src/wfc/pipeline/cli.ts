#!/usr/bin/env node
import 'dotenv/config';
import { existsSync, realpathSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { generateFromCatalog } from './pipeline.js';
import { centerPin, parsePin, type PinSpec } from './pins.js';
import { writePng } from '../layer3-raster/rasterizer.js';
import { ContradictionError } from '../errors.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const BUNDLED_CATALOG = resolve(moduleDir, '../../../catalogs/knots.json');
const BUNDLED_CENTER = 'knots/cross';

export interface CliConfig {
  catalog: string;
  seed: string;
  width: number;
  height: number;
  output: string;
  tileSize?: number;
  pins: string[];
  center?: string;
  retries: number;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const args = argv.slice(2);
  const config: CliConfig = {
    catalog: env.WFC_CATALOG ?? BUNDLED_CATALOG,
    seed: env.WFC_SEED ?? `wfc-${Date.now()}`,
    width: 32,
    height: 32,
    output: env.WFC_OUTPUT ?? 'output/wfc.png',
    pins: [],
    center: env.WFC_CENTER,
    retries: 0,
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--catalog':
        config.catalog = args[++i];
        break;
      case '--seed':
        config.seed = args[++i];
        break;
      case '--width':
        config.width = parseInt(args[++i], 10);
        break;
      case '--height':
        config.height = parseInt(args[++i], 10);
        break;
      case '--size':
        config.width = config.height = parseInt(args[++i], 10);
        break;
      case '--output':
        config.output = args[++i];
        break;
      case '--tile-size':
        config.tileSize = parseInt(args[++i], 10);
        break;
      case '--pin':
        config.pins.push(args[++i]);
        break;
      case '--center':
        config.center = args[++i];
        break;
      case '--retries':
        config.retries = parseInt(args[++i], 10);
        break;
    }
  }

  // the bundled knots run grows from a cross at the centre
  if (config.center === undefined && resolve(config.catalog) === BUNDLED_CATALOG) {
    config.center = BUNDLED_CENTER;
  }
  return config;
}

async function main() {
  const config = parseArgs(process.argv);
  const startTime = Date.now();

  const pins: PinSpec[] = config.pins.map(parsePin);
  if (config.center) pins.push(centerPin(config.center, config.width, config.height));

  console.log('=== Wave Function Collapse ===');
  console.log(`Catalog: ${config.catalog}`);
  console.log(`Seed: "${config.seed}"`);
  console.log(`Grid: ${config.width}x${config.height} tiles`);
  console.log(`Output: ${config.output}`);
  console.log();

  const result = await generateFromCatalog({
    catalogPath: config.catalog,
    width: config.width,
    height: config.height,
    seed: config.seed,
    pins,
    retries: config.retries,
  });

  const tileSize = config.tileSize ?? result.catalog.tileSize;
  const outputPath = resolve(config.output);
  console.log(`[Raster] Writing ${tileSize}px tiles to ${outputPath}...`);
  const image = await writePng(result.grid, outputPath, tileSize);

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log();
  console.log('=== Generation Complete ===');
  console.log(`Catalog: "${result.catalog.name}" (${result.tileset.size} variants)`);
  console.log(`Seed used: "${result.seed}" after ${result.attempts} attempt(s)`);
  console.log(`Image: ${image.width}x${image.height} px`);
  console.log(`Time: ${elapsed}s`);
}

const invokedDirectly = process.argv[1] !== undefined
  && existsSync(process.argv[1])
  && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  main().catch((err: unknown) => {
    console.error('Generation failed:', err instanceof Error ? err.message : String(err));
    if (err instanceof ContradictionError) {
      console.error('Try another --seed, add --retries, or adjust the catalog.');
    }
    process.exit(1);
  });
}
