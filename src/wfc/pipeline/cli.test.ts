import { describe, it, expect } from 'vitest';
import { parseArgs } from './cli.js';

describe('parseArgs', () => {
  it('reads flags', () => {
    const config = parseArgs(
      ['node', 'cli', '--width', '10', '--height', '4', '--seed', 'abc',
        '--pin', '1,1=a', '--pin', '0,0=b:r2', '--retries', '2', '--tile-size', '8'],
      {},
    );
    expect(config.width).toBe(10);
    expect(config.height).toBe(4);
    expect(config.seed).toBe('abc');
    expect(config.pins).toEqual(['1,1=a', '0,0=b:r2']);
    expect(config.retries).toBe(2);
    expect(config.tileSize).toBe(8);
  });

  it('sets both dimensions with --size', () => {
    const config = parseArgs(['node', 'cli', '--size', '12'], {});
    expect(config.width).toBe(12);
    expect(config.height).toBe(12);
  });

  it('falls back to the environment, then built-in defaults', () => {
    const fromEnv = parseArgs(['node', 'cli'], { WFC_SEED: 'env-seed', WFC_OUTPUT: 'out/env.png' });
    expect(fromEnv.seed).toBe('env-seed');
    expect(fromEnv.output).toBe('out/env.png');

    const defaults = parseArgs(['node', 'cli'], {});
    expect(defaults.seed).toMatch(/^wfc-\d+$/);
    expect(defaults.output).toBe('output/wfc.png');
    expect(defaults.catalog.endsWith('catalogs/knots.json')).toBe(true);
    expect(defaults.retries).toBe(0);
    expect(defaults.center).toBe('knots/cross');
  });

  it('takes the centre pin from the environment unless a flag overrides it', () => {
    expect(parseArgs(['node', 'cli'], { WFC_CENTER: 'knots/t' }).center).toBe('knots/t');
    expect(parseArgs(['node', 'cli', '--center', 'knots/line'], { WFC_CENTER: 'knots/t' }).center).toBe('knots/line');
  });

  it('pins no centre tile for other catalogs', () => {
    expect(parseArgs(['node', 'cli', '--catalog', 'other.json'], {}).center).toBeUndefined();
    expect(parseArgs(['node', 'cli'], { WFC_CATALOG: 'other.json' }).center).toBeUndefined();
  });
});
