/**
 * Public entry points: build a container for a target function from its parameter specification and
 * caller overrides, optionally display it through the host, and hand back the (fn, container) pair.
 */
import { fixed, range } from '@knobs/types/abbreviation';
import { InteractError } from '@knobs/types/errors';
import {
    decodeSignature,
    type ParameterInput,
    param,
    SIGNATURE_TUNING,
    type SignatureInput,
} from '@knobs/types/signature';
import { Effect, Logger, Option } from 'effect';
import { type InteractConfig, loadConfig } from './config.ts';
import { type Container, createContainer, type Kwargs } from './dispatcher.ts';
import { bind, classify, controlFor } from './factory.ts';
import { type Overrides, resolve } from './resolver.ts';
import { Host, Toolkit } from './services.ts';

// --- [TYPES] -----------------------------------------------------------------

type Target<R> = (kwargs: Kwargs) => R;
type Handle<R> = { readonly container: Container<R>; readonly fn: Target<R> };
type Reserved = { readonly clearOutput: Option.Option<boolean>; readonly manual: Option.Option<boolean> };

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    reserved: { clearOutput: 'clearOutput', manual: '__manual' },
} as const);
const reservedKeys: ReadonlyArray<string> = Object.values(B.reserved);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const reservedFlag = (overrides: Overrides, key: string): Effect.Effect<Option.Option<boolean>, InteractError> => {
    const raw = overrides[key];
    return raw === undefined
        ? Effect.succeed(Option.none())
        : typeof raw === 'boolean'
          ? Effect.succeed(Option.some(raw))
          : Effect.fail(InteractError.from('Resolve', 'RESERVED_KEY', `${InteractError.quote(key)}, got ${String(raw)}`));
};

/** Split the container switches off the overrides before resolution sees them. */
const splitReserved = (overrides: Overrides): Effect.Effect<[Reserved, Overrides], InteractError> =>
    Effect.all({
        clearOutput: reservedFlag(overrides, B.reserved.clearOutput),
        manual: reservedFlag(overrides, B.reserved.manual),
    }).pipe(
        Effect.map((reserved): [Reserved, Overrides] => [
            reserved,
            Object.fromEntries(Object.entries(overrides).filter(([key]) => !reservedKeys.includes(key))),
        ]),
    );

const build = <R>(
    fn: Target<R>,
    input: SignatureInput | undefined,
    overrides: Overrides,
    config: InteractConfig,
): Effect.Effect<Container<R>, InteractError, Toolkit> =>
    Effect.gen(function* () {
        const [reserved, rest] = yield* splitReserved(overrides);
        const signature = yield* decodeSignature(input);
        // An unnamed signature takes the function's own name.
        const fallbackName = fn.name || SIGNATURE_TUNING.defaults.name;
        const triples = yield* resolve(signature, rest);
        const bindings = yield* Effect.forEach(triples, (triple) =>
            Effect.flatMap(classify(triple.abbreviation), (abbreviation) => controlFor(abbreviation, triple.fallback)).pipe(
                Effect.map((source) => bind(triple.name, source)),
            ),
        );
        return yield* createContainer({
            bindings,
            clearOutput: Option.getOrElse(reserved.clearOutput, () => config.clearOutput),
            fn,
            mode: Option.getOrElse(reserved.manual, () => config.manual) ? 'manual' : 'reactive',
            name: Option.match(signature, {
                onNone: () => fallbackName,
                onSome: (s) => (s.name === SIGNATURE_TUNING.defaults.name ? fallbackName : s.name),
            }),
            runLabel: config.runLabel,
        });
    });

// --- [ENTRY_POINT] -----------------------------------------------------------

/** Build the container without displaying it. Without a signature, overrides bind as-is and no contract check runs. */
const interactive = <R>(
    fn: Target<R>,
    signature?: SignatureInput,
    overrides: Overrides = {},
): Effect.Effect<Container<R>, InteractError, Toolkit> =>
    Effect.flatMap(loadConfig, (config) =>
        build(fn, signature, overrides, config).pipe(
            Effect.annotateLogs({ source: 'interact' }),
            // Handlers run on the runtime captured during the build, so annotations and level carry over to invocations.
            (effect) => Option.match(config.logLevel, { onNone: () => effect, onSome: (level) => Logger.withMinimumLogLevel(effect, level) }),
        ),
    );

const interact = <R>(
    fn: Target<R>,
    signature?: SignatureInput,
    overrides: Overrides = {},
): Effect.Effect<Handle<R>, InteractError, Host | Toolkit> =>
    Effect.gen(function* () {
        const container = yield* interactive(fn, signature, overrides);
        const host = yield* Host;
        yield* host.display(container.box);
        return { container, fn };
    });

/** Decorator form: bind the overrides first, apply to a function later. */
const interactWith =
    (overrides: Overrides) =>
    <R>(fn: Target<R>, signature?: SignatureInput): Effect.Effect<Handle<R>, InteractError, Host | Toolkit> =>
        interact(fn, signature, overrides);

const interactManual = <R>(
    fn: Target<R>,
    signature?: SignatureInput,
    overrides: Overrides = {},
): Effect.Effect<Handle<R>, InteractError, Host | Toolkit> =>
    interact(fn, signature, { ...overrides, [B.reserved.manual]: true });

const signature = (name: string, parameters: ReadonlyArray<ParameterInput>): SignatureInput => ({ name, parameters });

// --- [EXPORT] ----------------------------------------------------------------

export type { Handle, Target };
export { B as INTERACT_TUNING, fixed, interact, interactive, interactManual, interactWith, param, range, signature };
