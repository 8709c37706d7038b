import { describe, it, expect, vi } from 'vitest';
import { createFilteredLogger, noopLogger } from '../../../src/lib/logger';
import type { Logger } from '../../../src/lib/logger';

function createLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Logger', () => {
    it('should drop messages below the configured level', () => {
        const base = createLogger();
        const logger = createFilteredLogger(base, 'warn');

        logger.debug('debug');
        logger.info('info');
        logger.warn('warn', { a: 1 });
        logger.error('error');

        expect(base.debug).not.toHaveBeenCalled();
        expect(base.info).not.toHaveBeenCalled();
        expect(base.warn).toHaveBeenCalledWith('warn', { a: 1 });
        expect(base.error).toHaveBeenCalledWith('error', undefined);
    });

    it('should drop everything when silent', () => {
        const base = createLogger();
        const logger = createFilteredLogger(base, 'silent');

        logger.error('error');

        expect(base.error).not.toHaveBeenCalled();
    });

    it('should pass everything at debug', () => {
        const base = createLogger();
        createFilteredLogger(base, 'debug').debug('trace', { step: 1 });

        expect(base.debug).toHaveBeenCalledWith('trace', { step: 1 });
    });

    it('should provide a silent default', () => {
        expect(() => noopLogger.info('ignored')).not.toThrow();
    });
});
