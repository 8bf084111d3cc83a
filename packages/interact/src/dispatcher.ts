/**
 * Assemble bindings into a container and drive re-invocation: reactive mode runs on every value change,
 * manual mode runs on trigger clicks and text submits. Invocation failures are logged and reported, never raised.
 */
import { Fixed } from '@knobs/types/abbreviation';
import {
    type AnyValueControl,
    type BoxControl,
    type ButtonControl,
    isTextControl,
    type OutputControl,
    type Unsubscribe,
} from '@knobs/types/controls';
import { InteractError } from '@knobs/types/errors';
import { Effect, Option, Runtime } from 'effect';
import { type Binding, valueOf } from './factory.ts';
import { Host, Toolkit } from './services.ts';

// --- [TYPES] -----------------------------------------------------------------

type Kwargs = Readonly<Record<string, unknown>>;
type Mode = 'manual' | 'reactive';
type ContainerConfig<R> = {
    readonly bindings: ReadonlyArray<Binding>;
    readonly clearOutput: boolean;
    readonly fn: (kwargs: Kwargs) => R;
    readonly mode: Mode;
    readonly name: string;
    readonly runLabel: string;
};
type Container<R = unknown> = {
    readonly bindings: ReadonlyArray<Binding>;
    readonly box: BoxControl;
    /** Stops every control, trigger and display subscription the container registered. */
    readonly close: () => void;
    readonly controls: ReadonlyArray<AnyValueControl>;
    /** Run the target once with the current control values. */
    readonly invoke: () => void;
    readonly kwargs: () => Option.Option<Kwargs>;
    readonly mode: Mode;
    readonly output: OutputControl;
    readonly result: () => Option.Option<R>;
    readonly trigger: Option.Option<ButtonControl>;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    classes: ['widget-interact'],
    span: 'interact.invoke',
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));
const isPresent = (value: unknown): boolean => value !== undefined && value !== null;

// --- [ENTRY_POINT] -----------------------------------------------------------

const createContainer = <R>(config: ContainerConfig<R>): Effect.Effect<Container<R>, never, Toolkit> =>
    Effect.gen(function* () {
        const toolkit = yield* Toolkit;
        const host = yield* Effect.serviceOption(Host);
        const runtime = yield* Effect.runtime<never>();
        const controls: ReadonlyArray<AnyValueControl> = config.bindings.flatMap((b) =>
            b.source instanceof Fixed ? [] : [b.source],
        );
        const trigger: Option.Option<ButtonControl> =
            config.mode === 'manual' ? Option.some(toolkit.button(`${config.runLabel} ${config.name}`)) : Option.none();
        const output = toolkit.output();
        const box = toolkit.box([...controls, ...Option.toArray(trigger), output], B.classes);
        const state: { kwargs: Option.Option<Kwargs>; result: Option.Option<R> } = {
            kwargs: Option.none(),
            result: Option.none(),
        };
        const report = (error: InteractError) =>
            Effect.logWarning(error.formatted).pipe(
                Effect.zipRight(
                    Option.match(host, {
                        onNone: () => Effect.void,
                        onSome: (h) => h.reportError(error, { function: config.name, kwargs: Option.getOrElse(state.kwargs, () => ({})) }),
                    }),
                ),
            );
        const run = Effect.gen(function* () {
            const kwargs: Kwargs = Object.fromEntries(config.bindings.map((b) => [b.key, valueOf(b)]));
            state.kwargs = Option.some(kwargs);
            config.clearOutput && output.clear();
            const result = yield* Effect.try({
                catch: (cause) => InteractError.from('Invoke', 'CALLBACK_FAILED', describeCause(cause), cause),
                try: () => config.fn(kwargs),
            });
            state.result = Option.some(result);
            isPresent(result) && output.render(result);
        }).pipe(
            Effect.catchAll(report),
            Effect.withLogSpan(B.span),
            Effect.annotateLogs({ function: config.name, source: 'interact' }),
        );
        // Trigger stays disabled for the duration of the call, including when the target throws.
        const guarded = Option.match(trigger, {
            onNone: () => run,
            onSome: (button) =>
                Effect.acquireUseRelease(
                    Effect.sync(() => {
                        button.disabled = true;
                    }),
                    () => run,
                    () =>
                        Effect.sync(() => {
                            button.disabled = false;
                        }),
                ),
        });
        // Forked: a host may report asynchronously. Synchronous work still completes before invoke returns.
        const invoke = (): void => {
            Runtime.runFork(runtime)(guarded);
        };
        const subscriptions: Unsubscribe[] =
            config.mode === 'manual'
                ? [
                      ...Option.toArray(trigger).map((button) => button.onClick(invoke)),
                      ...controls.filter(isTextControl).map((text) => text.onSubmit(invoke)),
                  ]
                : [...controls.map((control) => control.observe(invoke)), box.onDisplayed(invoke)];
        yield* Effect.logDebug(`Container built for ${config.name}`).pipe(
            Effect.annotateLogs({ controls: controls.length, mode: config.mode }),
        );
        return {
            bindings: config.bindings,
            box,
            close: () => subscriptions.splice(0).forEach((unsubscribe) => unsubscribe()),
            controls,
            invoke,
            kwargs: () => state.kwargs,
            mode: config.mode,
            output,
            result: () => state.result,
            trigger,
        };
    });

// --- [EXPORT] ----------------------------------------------------------------

export type { Container, ContainerConfig, Kwargs, Mode };
export { B as DISPATCHER_TUNING, createContainer };
