import { afterEach, describe, expect, it, vi } from 'vitest';
import { debug, error, log, setVerbose, warn } from '../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    setVerbose(false);
  });

  it('prints info and warn to stdout', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('info', 'loaded');
    warn('skipped');

    expect(out).toHaveBeenCalledTimes(2);
    expect(out.mock.calls.map(([line]) => String(line).endsWith(' loaded'))).toEqual([true, false]);
    expect(String(out.mock.calls[1][0])).toMatch(/warn.* skipped$/);
  });

  it('prints errors to stderr', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});

    error('disk full');

    expect(err).toHaveBeenCalledWith(expect.stringMatching(/error.* disk full$/));
  });

  it('prints debug only when verbose', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    debug('hidden');
    expect(out).not.toHaveBeenCalled();

    setVerbose(true);
    debug('shown');
    expect(out).toHaveBeenCalledWith(expect.stringMatching(/debug.* shown$/));
  });
});
