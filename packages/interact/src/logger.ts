/**
 * Effect logger that keeps a bounded buffer of entries alongside the pretty console logger,
 * so hosts and tests can read back what an interactive container logged.
 */
import { Layer, List, Logger, LogLevel, Schema as S } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type LogLevelKey = S.Schema.Type<typeof LogLevelLiteral>;
type LogEntry = S.Schema.Type<typeof LogEntrySchema>;
type LoggerConfig = {
    readonly logLevel?: string | undefined;
    readonly maxLogs?: number | undefined;
    readonly silent?: boolean | undefined;
};
type AccumulatingLoggerResult = {
    readonly logger: Logger.Logger<unknown, void>;
    readonly logs: LogEntry[];
};
type LoggerLayerResult = {
    readonly layer: Layer.Layer<never>;
    readonly logs: LogEntry[];
};

// --- [SCHEMA] ----------------------------------------------------------------

const LogLevelLiteral = S.Literal('Debug', 'Info', 'Warning', 'Error', 'Fatal');
const LogEntrySchema = S.Struct({
    annotations: S.Record({ key: S.String, value: S.Unknown }),
    fiberId: S.String,
    level: LogLevelLiteral,
    message: S.String,
    spans: S.Record({ key: S.String, value: S.Number }),
    timestamp: S.DateFromSelf,
});

// --- [CONSTANTS] -------------------------------------------------------------

// Effect labels WARN; accept both spellings.
const fromLabel: Readonly<Record<string, LogLevelKey>> = {
    all: 'Debug',
    debug: 'Debug',
    error: 'Error',
    fatal: 'Fatal',
    info: 'Info',
    none: 'Debug',
    trace: 'Debug',
    warn: 'Warning',
    warning: 'Warning',
};
const B = Object.freeze({
    defaults: { level: 'Info' satisfies LogLevelKey, maxLogs: 200 },
    format: { levelPad: 7, timeSlice: { end: 23, start: 11 } },
    fromLabel,
    toEffect: {
        Debug: LogLevel.Debug,
        Error: LogLevel.Error,
        Fatal: LogLevel.Fatal,
        Info: LogLevel.Info,
        Warning: LogLevel.Warning,
    },
    noop: () => {},
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const isLogLevelKey = S.is(LogLevelLiteral);
const mapEffectLevel = (label: string): LogLevelKey => B.fromLabel[label.toLowerCase()] ?? 'Info';
const parseLogLevel = (level: string | undefined): LogLevel.LogLevel =>
    B.toEffect[level !== undefined && isLogLevelKey(level) ? level : B.defaults.level];
const extractMessage = (message: unknown): string =>
    Array.isArray(message)
        ? message.map((m: unknown) => (typeof m === 'string' ? m : JSON.stringify(m))).join(' ')
        : typeof message === 'string'
          ? message
          : JSON.stringify(message);
const truncateLogs = (logs: LogEntry[], maxLogs: number): void => {
    const excess = logs.length - maxLogs + 1;
    excess > 0 && logs.splice(0, excess);
};
const formatLogEntry = (entry: LogEntry): string => {
    const time = entry.timestamp.toISOString().slice(B.format.timeSlice.start, B.format.timeSlice.end);
    const spans = Object.entries(entry.spans)
        .map(([k, v]) => `${k}=${v}ms`)
        .join(' ');
    return `${time} ${entry.level.padEnd(B.format.levelPad)} ${entry.message}${spans ? ` [${spans}]` : ''}`;
};

// --- [ENTRY_POINT] -----------------------------------------------------------

const createAccumulatingLogger = (config: { readonly maxLogs: number }): AccumulatingLoggerResult => {
    const logs: LogEntry[] = [];
    const logger = Logger.make<unknown, void>(({ annotations, date, fiberId, logLevel, message, spans }) => {
        const spanEntries = List.toArray(
            List.map(spans, (span): [string, number] => [span.label, date.getTime() - span.startTime]),
        );
        truncateLogs(logs, config.maxLogs);
        logs.push({
            annotations: Object.fromEntries(annotations),
            fiberId: String(fiberId),
            level: mapEffectLevel(logLevel.label),
            message: extractMessage(message),
            spans: Object.fromEntries(spanEntries),
            timestamp: date,
        });
    });
    return { logger, logs };
};

/** Replace the default logger; silent drops the pretty console output and keeps only the buffer. */
const createLoggerLayer = (config: LoggerConfig = {}): LoggerLayerResult => {
    const { logger: accumulating, logs } = createAccumulatingLogger({ maxLogs: config.maxLogs ?? B.defaults.maxLogs });
    const logger: Logger.Logger<unknown, unknown> = config.silent ? accumulating : Logger.zip(Logger.prettyLogger(), accumulating);
    const layer = Layer.mergeAll(
        Logger.replace(Logger.defaultLogger, Logger.map(logger, B.noop)),
        Logger.minimumLogLevel(parseLogLevel(config.logLevel)),
    );
    return { layer, logs };
};

const getLogsFormatted = (logs: ReadonlyArray<LogEntry>): string => logs.map(formatLogEntry).join('\n');

// --- [EXPORT] ----------------------------------------------------------------

export type { LogEntry, LoggerConfig, LoggerLayerResult, LogLevelKey };
export {
    B as LOGGER_TUNING,
    createAccumulatingLogger,
    createLoggerLayer,
    extractMessage,
    formatLogEntry,
    getLogsFormatted,
    LogEntrySchema,
    mapEffectLevel,
    parseLogLevel,
};
