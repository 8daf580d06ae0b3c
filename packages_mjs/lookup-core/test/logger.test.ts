import { createLogger, isLogLevel } from '../src/logger';

describe('createLogger', () => {
    let warn: jest.SpyInstance;
    let debug: jest.SpyInstance;

    beforeEach(() => {
        warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    });

    afterEach(() => jest.restoreAllMocks());

    it('prefixes messages and passes extra arguments through', () => {
        createLogger('info').warn('hierarchy changed', { entries: 2 });
        expect(warn).toHaveBeenCalledWith('[tiered-lookup] hierarchy changed', { entries: 2 });
    });

    it('drops messages below its level', () => {
        const logger = createLogger('warn');
        logger.debug('deep merge');
        logger.warn('deprecated');
        expect(debug).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('logs nothing when silent', () => {
        createLogger('silent').warn('deprecated');
        expect(warn).not.toHaveBeenCalled();
    });

    it('logs debug messages at debug level', () => {
        createLogger('debug').debug('deep merge');
        expect(debug).toHaveBeenCalledWith('[tiered-lookup] deep merge');
    });
});

describe('isLogLevel', () => {
    it('knows the level names', () => {
        expect(isLogLevel('trace')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
    });
});
