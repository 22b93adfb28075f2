import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadSettings } from '../src/config/settings.js';

const cwd = path.resolve('/work/store');

describe('loadSettings', () => {
  it('defaults to inventory.txt in the working directory', () => {
    expect(loadSettings({}, {}, cwd)).toEqual({
      inventoryPath: path.join(cwd, 'inventory.txt'),
      verbose: false,
    });
  });

  it('reads the file and verbosity from the environment', () => {
    const settings = loadSettings({ SHOE_STOCK_FILE: 'data/stock.txt', SHOE_STOCK_VERBOSE: 'TRUE' }, {}, cwd);

    expect(settings).toEqual({
      inventoryPath: path.join(cwd, 'data', 'stock.txt'),
      verbose: true,
    });
  });

  it('lets command-line options win over the environment', () => {
    const settings = loadSettings(
      { SHOE_STOCK_FILE: 'data/stock.txt', SHOE_STOCK_VERBOSE: '1' },
      { file: 'other.txt', verbose: false },
      cwd,
    );

    expect(settings).toEqual({ inventoryPath: path.join(cwd, 'other.txt'), verbose: false });
  });

  it('keeps absolute paths as given', () => {
    const absolute = path.resolve('/data/inventory.txt');

    expect(loadSettings({ SHOE_STOCK_FILE: absolute }, {}, cwd).inventoryPath).toBe(absolute);
  });

  it('throws when SHOE_STOCK_FILE is blank', () => {
    expect(() => loadSettings({ SHOE_STOCK_FILE: '   ' }, {}, cwd)).toThrow('SHOE_STOCK_FILE cannot be empty');
  });

  it('throws when SHOE_STOCK_VERBOSE is not a boolean word', () => {
    expect(() => loadSettings({ SHOE_STOCK_VERBOSE: 'maybe' }, {}, cwd)).toThrow(/SHOE_STOCK_VERBOSE/);
  });
});
