/**
 * Tests for the leveled logger.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { getLogLevel, logDebug, logError, logInfo, logWarning, setLogLevel } from '../../src/core/logger.js';

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('should drop messages below the current level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    logDebug('debug detail');
    logInfo('info detail');

    expect(error).not.toHaveBeenCalled();
  });

  it('should write warnings with console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    logWarning('Skipping unreadable file a.md');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Skipping unreadable file a.md'));
  });

  it('should pass context along when present', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('debug');

    logDebug('Build complete', { nodes: 3 });
    logError('Failed');

    expect(error).toHaveBeenNthCalledWith(1, expect.stringContaining('Build complete'), { nodes: 3 });
    expect(error).toHaveBeenNthCalledWith(2, expect.stringContaining('Failed'));
  });

  it('should log nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('silent');

    logError('Failed');
    logWarning('Careful');

    expect(error).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});
