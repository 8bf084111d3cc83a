/**
 * Container defaults read from the ambient ConfigProvider; reserved override keys win over these.
 */
import { InteractError } from '@knobs/types/errors';
import { Config, type ConfigError, Effect, type LogLevel, type Option } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type InteractConfig = {
    readonly clearOutput: boolean;
    readonly logLevel: Option.Option<LogLevel.LogLevel>;
    readonly manual: boolean;
    readonly runLabel: string;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    defaults: { clearOutput: true, manual: false, runLabel: 'Run' },
    keys: {
        clearOutput: 'KNOBS_CLEAR_OUTPUT',
        logLevel: 'KNOBS_LOG_LEVEL',
        manual: 'KNOBS_MANUAL',
        runLabel: 'KNOBS_RUN_LABEL',
    },
} as const);

// --- [CONFIG] ----------------------------------------------------------------

const InteractConfigSchema: Config.Config<InteractConfig> = Config.all({
    clearOutput: Config.boolean(B.keys.clearOutput).pipe(Config.withDefault(B.defaults.clearOutput)),
    logLevel: Config.logLevel(B.keys.logLevel).pipe(Config.option),
    manual: Config.boolean(B.keys.manual).pipe(Config.withDefault(B.defaults.manual)),
    runLabel: Config.string(B.keys.runLabel).pipe(Config.withDefault(B.defaults.runLabel)),
});

// --- [ENTRY_POINT] -----------------------------------------------------------

const loadConfig: Effect.Effect<InteractConfig, InteractError> = Effect.mapError(
    InteractConfigSchema,
    (error: ConfigError.ConfigError) => InteractError.from('Config', 'INVALID_CONFIG', String(error), error),
);

// --- [EXPORT] ----------------------------------------------------------------

export type { InteractConfig };
export { B as CONFIG_TUNING, InteractConfigSchema, loadConfig };
