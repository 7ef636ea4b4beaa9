import { ConsoleLogger, isLogLevel } from './logger';

describe('ConsoleLogger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes one JSON line with level, message and fields', () => {
    new ConsoleLogger('info').log('request', { event: 'request', status: 200 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const line = JSON.parse(logSpy.mock.calls[0][0]);
    expect(line).toMatchObject({ level: 'info', msg: 'request', event: 'request', status: 200 });
    expect(typeof line.time).toBe('string');
  });

  it('drops messages below the minimum level', () => {
    const logger = new ConsoleLogger('warn');
    logger.debug('hidden');
    logger.log('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('can change level at runtime', () => {
    const logger = new ConsoleLogger('error');
    logger.setLevel('debug');
    logger.debug('now visible');
    expect(logSpy).toHaveBeenCalledTimes(1);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
