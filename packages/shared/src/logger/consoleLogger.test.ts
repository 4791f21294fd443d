import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, SilentLogger } from './consoleLogger';
import type { ScanWarningEvent } from '../types/events';

const event: ScanWarningEvent = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'ScanWarning',
  payload: { path: '/src/locked', message: 'Permission denied', code: 'EACCES' },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints events as JSON only when verbose', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().log(event);
    expect(debugSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ verbose: true }).log(event);
    expect(debugSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('suppresses debug output unless verbose', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    new ConsoleLogger().debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ run: 'r1' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[run=r1] warn');
  });
});

describe('SilentLogger', () => {
  it('never touches the console', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new SilentLogger();
    logger.info('x');
    logger.child({ a: 1 }).warn('y');
    expect(infoSpy).not.toHaveBeenCalled();
    infoSpy.mockRestore();
  });
});
