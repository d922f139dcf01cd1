import { describe, it, expect, beforeEach, vi, afterEach, type MockInstance } from 'vitest';
import { Logger, LogLevel, logger } from './Logger';

describe('Logger', () => {
    let infoSpy: MockInstance;
    let debugSpy: MockInstance;
    let warnSpy: MockInstance;
    let errorSpy: MockInstance;

    beforeEach(() => {
        infoSpy = vi.spyOn(console, 'info').mockImplementation(() => { });
        debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => { });
        warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => { });
        errorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        logger.setLogLevel(LogLevel.INFO);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should log info messages by default', () => {
        logger.info('hello world');
        expect(infoSpy).toHaveBeenCalledWith('[wsio] hello world');
    });

    it('takes a starting level', () => {
        const verbose = new Logger('TestDebug', LogLevel.DEBUG);
        verbose.debug('debug message');
        expect(debugSpy).toHaveBeenCalledWith('[TestDebug] (DEBUG) debug message');
    });

    it('error() logs with error prefix', () => {
        logger.error('something failed');
        expect(errorSpy).toHaveBeenCalledWith('[wsio] ❌ something failed');
    });

    it('warn() logs with warning prefix', () => {
        logger.warn('a warning');
        expect(warnSpy).toHaveBeenCalledWith('[wsio] ⚠️ a warning');
    });

    it('passes extra arguments through', () => {
        const err = new Error('boom');
        logger.warn('send failed', err);
        expect(warnSpy).toHaveBeenCalledWith('[wsio] ⚠️ send failed', err);
    });

    it('should not log debug messages by default', () => {
        logger.debug('should not see this');
        logger.conn('nor this');
        expect(debugSpy).not.toHaveBeenCalled();
    });

    it('respects log levels', () => {
        logger.setLogLevel(LogLevel.ERROR);
        logger.debug('test');
        logger.info('test');
        logger.warn('test');
        logger.conn('test');
        expect(infoSpy).not.toHaveBeenCalled();
        expect(warnSpy).not.toHaveBeenCalled();
        expect(debugSpy).not.toHaveBeenCalled();

        logger.setLogLevel(LogLevel.NONE);
        logger.error('test');
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('creates child loggers at the parent level', () => {
        logger.setLogLevel(LogLevel.WARN);
        const child = logger.child('transport');
        child.info('connected');
        child.warn('slow');
        expect(infoSpy).not.toHaveBeenCalled();
        expect(warnSpy).toHaveBeenCalledWith('[wsio:transport] ⚠️ slow');
    });

    it('conn() logs at DEBUG level without the debug marker', () => {
        logger.setLogLevel(LogLevel.DEBUG);
        logger.conn('handshake-started');
        expect(debugSpy).toHaveBeenCalledWith('[wsio] handshake-started');
    });
});
