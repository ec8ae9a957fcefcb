import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { clearLogHistory, getLogHistory, getLogLevel, log, setLogLevel } from './log';

describe('Log', () => {
  const initial = getLogLevel();

  beforeEach(() => {
    clearLogHistory();
    vi.spyOn(console, 'warn').mockImplementation(() => { });
    vi.spyOn(console, 'error').mockImplementation(() => { });
    vi.spyOn(console, 'log').mockImplementation(() => { });
    vi.spyOn(console, 'debug').mockImplementation(() => { });
  });

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('drops messages below the current level', () => {
    setLogLevel('warn');
    log.info('Test', 'quiet');
    log.warn('Test', 'loud');
    expect(getLogHistory().map(e => e.message)).toEqual(['loud']);
    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('[Test] loud');
  });

  it('passes data through to the console', () => {
    setLogLevel('debug');
    log.error('Scope', 'release failed', { label: 'buffer' });
    expect(console.error).toHaveBeenCalledWith('[Scope] release failed', { label: 'buffer' });
    expect(getLogHistory()[0]).toMatchObject({ level: 'error', module: 'Scope', data: { label: 'buffer' } });
  });

  it('says nothing when silent', () => {
    setLogLevel('silent');
    log.error('Test', 'ignored');
    expect(getLogHistory()).toHaveLength(0);
    expect(console.error).not.toHaveBeenCalled();
  });

  it('keeps a bounded history', () => {
    setLogLevel('debug');
    for (let i = 0; i < 510; i++) log.debug('Test', `m${i}`);
    const history = getLogHistory();
    expect(history).toHaveLength(500);
    expect(history[0].message).toBe('m10');
  });
});
