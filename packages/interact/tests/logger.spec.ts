/**
 * Validate log accumulation, level filtering and entry formatting.
 */
import { TEST_CONSTANTS } from '@knobs/test-utils/constants';
import { Effect, Logger, LogLevel } from 'effect';
import { describe, expect, it } from 'vitest';
import {
    createAccumulatingLogger,
    createLoggerLayer,
    extractMessage,
    formatLogEntry,
    getLogsFormatted,
    type LogEntry,
    LOGGER_TUNING,
    mapEffectLevel,
    parseLogLevel,
} from '../src/logger.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    levels: ['logInfo', 'logWarning', 'logError'] as const,
    testMaxLogs: [5, 10, 20] as const,
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
    annotations: {},
    fiberId: '#0',
    level: 'Info',
    message: 'hello',
    spans: {},
    timestamp: TEST_CONSTANTS.frozenTime,
    ...overrides,
});
const runLogIterations = (count: number, logFn: (i: number) => void): void => {
    for (let i = 0; i < count; i += 1) {
        logFn(i);
    }
};

// --- [TESTS] -----------------------------------------------------------------

describe('logger', () => {
    describe('createAccumulatingLogger', () => {
        it.each(B.levels)('%s captures with correct level', (method) => {
            const { logger, logs } = createAccumulatingLogger({ maxLogs: 100 });
            const layer = Logger.replace(Logger.defaultLogger, logger);
            Effect.runSync(Effect[method]('test message').pipe(Effect.provide(layer)));
            expect(logs[0]?.level).toBe(method.replace('log', ''));
        });

        it('captures annotations and spans', () => {
            const { logger, logs } = createAccumulatingLogger({ maxLogs: 100 });
            Effect.runSync(
                Effect.logInfo('t').pipe(
                    Effect.withLogSpan('outer'),
                    Effect.annotateLogs({ function: 'f', source: 'interact' }),
                    Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
                ),
            );
            expect(logs[0]?.annotations).toEqual({ function: 'f', source: 'interact' });
            expect(Object.keys(logs[0]?.spans ?? {})).toEqual(['outer']);
        });

        it('joins multi-part messages', () => {
            const { logger, logs } = createAccumulatingLogger({ maxLogs: 100 });
            Effect.runSync(Effect.logInfo('count', 3).pipe(Effect.provide(Logger.replace(Logger.defaultLogger, logger))));
            expect(logs[0]?.message).toBe('count 3');
        });

        it.each(B.testMaxLogs)('truncates at maxLogs boundary (maxLogs=%i)', (maxLogs) => {
            const { logger, logs } = createAccumulatingLogger({ maxLogs });
            const layer = Logger.replace(Logger.defaultLogger, logger);
            const overflow = maxLogs + 10;
            runLogIterations(overflow, (i) => Effect.runSync(Effect.logInfo(`msg-${i}`).pipe(Effect.provide(layer))));
            expect([logs.length, logs[0]?.message, logs[maxLogs - 1]?.message]).toEqual([
                maxLogs,
                `msg-${overflow - maxLogs}`,
                `msg-${overflow - 1}`,
            ]);
        });
    });

    describe('createLoggerLayer', () => {
        it.each([
            ['Debug', ['Debug', 'Info', 'Warning']],
            ['Info', ['Info', 'Warning']],
            ['Warning', ['Warning']],
        ] as const)('logLevel=%s filters correctly', (level, expectedLevels) => {
            const { layer, logs } = createLoggerLayer({ logLevel: level, maxLogs: 100, silent: true });
            Effect.runSync(Effect.logDebug('d').pipe(Effect.provide(layer)));
            Effect.runSync(Effect.logInfo('i').pipe(Effect.provide(layer)));
            Effect.runSync(Effect.logWarning('w').pipe(Effect.provide(layer)));
            expect(logs.map((l) => l.level)).toEqual(expectedLevels);
        });

        it('defaults to info level and the default buffer size', () => {
            const { layer, logs } = createLoggerLayer({ silent: true });
            runLogIterations(LOGGER_TUNING.defaults.maxLogs + 1, (i) =>
                Effect.runSync(Effect.logInfo(`m-${i}`).pipe(Effect.provide(layer))),
            );
            Effect.runSync(Effect.logDebug('hidden').pipe(Effect.provide(layer)));
            expect([logs.length, logs[0]?.message]).toEqual([LOGGER_TUNING.defaults.maxLogs, 'm-1']);
        });
    });

    describe('levels', () => {
        it.each([
            ['Debug', LogLevel.Debug],
            ['Warning', LogLevel.Warning],
            ['Fatal', LogLevel.Fatal],
            ['verbose', LogLevel.Info],
            [undefined, LogLevel.Info],
        ] as const)('parseLogLevel(%s)', (raw, expected) => {
            expect(parseLogLevel(raw)).toBe(expected);
        });

        it.each([
            ['WARN', 'Warning'],
            ['ERROR', 'Error'],
            ['TRACE', 'Debug'],
            ['unknown', 'Info'],
        ])('mapEffectLevel(%s) is %s', (label, expected) => {
            expect(mapEffectLevel(label)).toBe(expected);
        });
    });

    describe('formatting', () => {
        it.each([
            ['plain', 'plain'],
            [['a', 1, { b: 2 }], 'a 1 {"b":2}'],
            [{ x: 1 }, '{"x":1}'],
        ] as const)('extractMessage(%j)', (message, expected) => {
            expect(extractMessage(message)).toBe(expected);
        });

        it('formats time, padded level, message and spans', () => {
            expect(formatLogEntry(entry({ spans: { a: 5 } }))).toBe('12:00:00.000 Info    hello [a=5ms]');
            expect(formatLogEntry(entry({ level: 'Warning', message: 'w' }))).toBe('12:00:00.000 Warning w');
        });

        it('joins entries with newlines', () => {
            expect(getLogsFormatted([entry({ message: 'one' }), entry({ message: 'two' })])).toBe(
                '12:00:00.000 Info    one\n12:00:00.000 Info    two',
            );
        });
    });
});
