import { logger } from './logger';

describe('logger', () => {
  const originalEnv = { ...process.env };
  let debugSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    delete process.env.GAZEDT_DEBUG;
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    debugSpy.mockRestore();
    warnSpy.mockRestore();
  });

  test('debug output is off unless GAZEDT_DEBUG is set', () => {
    delete process.env.NODE_ENV;
    logger.debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    process.env.GAZEDT_DEBUG = '1';
    logger.debug('idt:', 3);
    expect(debugSpy).toHaveBeenCalledWith('idt:', 3);
  });

  test('warnings are silent under test and production runs', () => {
    process.env.NODE_ENV = 'test';
    logger.warn('hidden');
    process.env.NODE_ENV = 'production';
    logger.warn('hidden');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  test('warnings print otherwise', () => {
    delete process.env.NODE_ENV;
    logger.warn('split');
    expect(warnSpy).toHaveBeenCalledWith('split');
  });
});
