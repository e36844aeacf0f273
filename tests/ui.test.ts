import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { ui } from '../src/ui.js';

describe('ui', () => {
  beforeEach(() => {
    ui.setVerbosity(0);
    ui.setQuiet(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ui.setVerbosity(0);
    ui.setQuiet(false);
  });

  test('tree headers go to stderr and include the path only when verbose', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    ui.tree('api', '/work/api');
    ui.setVerbosity(1);
    ui.tree('api', '/work/api');

    expect(stderr).toHaveBeenCalledTimes(2);
    expect(stderr.mock.calls[0][0]).not.toContain('/work/api');
    expect(stderr.mock.calls[1][0]).toContain('/work/api');
  });

  test('quiet suppresses tree headers', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    ui.setQuiet(true);

    ui.tree('api', '/work/api');
    ui.missingTree('db', '/work/db');

    expect(stderr).not.toHaveBeenCalled();
  });

  test('debug and command echo depend on verbosity', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    ui.debug('eval', 'hidden');
    ui.command('make');
    expect(stderr).not.toHaveBeenCalled();

    ui.setVerbosity(1);
    ui.debug('eval', 'shown');
    ui.command('make');
    expect(stderr).toHaveBeenCalledTimes(1);

    ui.setVerbosity(2);
    ui.command('make');
    expect(stderr).toHaveBeenCalledTimes(2);
    expect(stderr.mock.calls[1][0]).toContain('make');
  });
});
