import { ConsoleLogger, isLogLevel, silentLogger } from '../Logger';

describe('ConsoleLogger', () => {
  let log: jest.SpyInstance;
  let debug: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages and route them by level', () => {
    const logger = new ConsoleLogger({ level: 'debug' });

    logger.debug('checking');
    logger.info('Running migration: 001_a.up.sql');
    logger.warn('careful');
    logger.error('failed', { code: 1 });

    expect(debug).toHaveBeenCalledWith('[migrate] checking');
    expect(log).toHaveBeenCalledWith('[migrate] Running migration: 001_a.up.sql');
    expect(warn).toHaveBeenCalledWith('[migrate] careful');
    expect(error).toHaveBeenCalledWith('[migrate] failed', { code: 1 });
  });

  it('should drop messages below the threshold', () => {
    const logger = new ConsoleLogger({ level: 'warn', prefix: '[db]' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[db] shown');
  });

  it('should log info and above by default', () => {
    const logger = new ConsoleLogger();

    logger.debug('hidden');
    logger.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('should stay quiet when silent', () => {
    silentLogger.error('nothing');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should recognise the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error', 'trace'].filter(isLogLevel)).toEqual(['debug', 'info', 'warn', 'error']);
  });
});
