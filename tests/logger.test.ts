/**
 * Logger tests
 */

import { createLogger, silentLogger } from '../src/logger.js';

describe('createLogger', () => {
    function capture(level: Parameters<typeof createLogger>[0]['level']) {
        const lines: string[] = [];
        const logger = createLogger({ level, color: false, sink: line => { lines.push(line); } });
        return { logger, lines };
    }

    test('writes messages at or above the threshold', () => {
        const { logger, lines } = capture('info');
        logger.error('e');
        logger.warn('w');
        logger.info('i');
        logger.debug('d');
        logger.trace('t');
        expect(lines).toEqual(['ERROR e', 'WARN  w', 'INFO  i']);
    });

    test('passes details to the sink', () => {
        const received: unknown[][] = [];
        const logger = createLogger({ level: 'debug', color: false, sink: (...args) => { received.push(args); } });
        logger.debug('branch', 3);
        expect(received).toEqual([['DEBUG branch', 3]]);
    });

    test('reports enabled levels', () => {
        const { logger } = capture('debug');
        expect(logger.isEnabled('debug')).toBe(true);
        expect(logger.isEnabled('trace')).toBe(false);
        expect(logger.level).toBe('debug');
    });

    test('silent logger writes nothing', () => {
        expect(silentLogger.isEnabled('error')).toBe(false);
    });
});
