import { Logger, LogLevel, parseLogLevel } from '../../src/utils/Logger';

describe('Logger', () => {
    let debugSpy: jest.SpyInstance;
    let infoSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
        infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should parse level names', () => {
        expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
        expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
        expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
        expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });

    it('should skip messages below the minimum level', () => {
        const logger = new Logger('Test', { minLogLevel: LogLevel.INFO, includeTimestamps: false });
        logger.debug('hidden');
        logger.info('shown');
        expect(debugSpy).not.toHaveBeenCalled();
        expect(infoSpy).toHaveBeenCalledWith('[INFO] [Test] shown');
    });

    it('should append context as JSON', () => {
        const logger = new Logger('Test', { includeTimestamps: false, prefix: 'cookbook', minLogLevel: LogLevel.DEBUG });
        logger.warn('slow call', { durationMs: 1200 });
        expect(warnSpy).toHaveBeenCalledWith('cookbook [WARN] [Test] slow call Context: {"durationMs":1200}');
    });

    it('should name child loggers after their parent', () => {
        const child = new Logger('Gateway', { includeTimestamps: false, minLogLevel: LogLevel.INFO }).createChildLogger('http');
        expect(child.component).toBe('Gateway.http');
        child.info('ready');
        expect(infoSpy).toHaveBeenCalledWith('[INFO] [Gateway.http] ready');
    });
});
