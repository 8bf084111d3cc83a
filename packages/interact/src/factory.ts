/**
 * Classify raw abbreviations into the closed variant once, then turn each variant into exactly one
 * control (or pass a Fixed through). Numeric shapes get their bounds and initial value here.
 */
import { Abbreviation, Fixed, RangeHint } from '@knobs/types/abbreviation';
import { type AnyValueControl, type ChoiceOption, isControl, isValueControl } from '@knobs/types/controls';
import { InteractError } from '@knobs/types/errors';
import { Effect, Either, Match, Option, Predicate } from 'effect';
import { Toolkit } from './services.ts';

// --- [TYPES] -----------------------------------------------------------------

type Bindable = AnyValueControl | Fixed;
type Binding = { readonly key: string; readonly source: Bindable };
type Span = { readonly max: number; readonly min: number; readonly value: number };

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    defaultStep: { integral: 1, real: 0.1 },
    zeroBounds: { max: 1, min: 0 },
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const isFiniteNumber = (u: unknown): u is number => typeof u === 'number' && Number.isFinite(u);
const isInteger = (u: unknown): u is number => isFiniteNumber(u) && Number.isInteger(u);
const isPlainMapping = (u: unknown): u is Readonly<Record<string, unknown>> => {
    const proto: unknown = Predicate.isObject(u) ? Object.getPrototypeOf(u) : undefined;
    return Predicate.isRecord(u) && (proto === Object.prototype || proto === null);
};
const isLabelledPair = (u: unknown): u is readonly [string, unknown] =>
    Array.isArray(u) && u.length === 2 && typeof u[0] === 'string';
const fromEntries = (entries: Iterable<readonly [unknown, unknown]>): ReadonlyArray<ChoiceOption> =>
    Array.from(entries, ([label, value]) => ({ label: String(label), value }));
const fromSequence = (items: ReadonlyArray<unknown>): ReadonlyArray<ChoiceOption> =>
    items.length > 0 && items.every(isLabelledPair)
        ? fromEntries(items)
        : items.map((value) => ({ label: String(value), value }));
const describeRaw = (raw: unknown): string =>
    Match.value(raw).pipe(
        Match.when(Match.string, (s) => JSON.stringify(s)),
        Match.when(Match.instanceOf(RangeHint), (hint) => `range(${hint.bounds.join(', ')})`),
        Match.orElse((other) => String(other)),
    );

/** Bounds centred asymmetrically on a bare scalar so the slider can move both ways. */
const scalarBounds = (v: number): Span =>
    v === 0 ? { ...B.zeroBounds, value: v } : v > 0 ? { max: 3 * v, min: -v, value: v } : { max: -v, min: 3 * v, value: v };

/** Midpoint of (min, max), integer-divided when both bounds are integers, snapped down onto min + k*step. */
const rangeValue = (min: number, max: number, step: Option.Option<number>): Either.Either<Span, InteractError> => {
    const bounds = `(min=${min}, max=${max}${Option.match(step, { onNone: () => '', onSome: (s) => `, step=${s}` })})`;
    const badStep = Option.exists(step, (s) => !(s > 0));
    const diff = max - min;
    const mid = Number.isInteger(min) && Number.isInteger(max) ? min + Math.floor(diff / 2) : min + diff / 2;
    return badStep
        ? Either.left(InteractError.from('Constraint', 'STEP_NOT_POSITIVE', bounds))
        : !(max > min)
          ? Either.left(InteractError.from('Constraint', 'MAX_NOT_GREATER', bounds))
          : Either.right({
                max,
                min,
                value: Option.match(step, { onNone: () => mid, onSome: (s) => min + Math.trunc((mid - min) / s) * s }),
            });
};

/** First matching shape wins: control/fixed, range, scalar, iterable; anything else is a hard error. */
const classify = (raw: unknown): Either.Either<Abbreviation, InteractError> =>
    Match.value(raw).pipe(
        Match.withReturnType<Either.Either<Abbreviation, InteractError>>(),
        Match.when(isValueControl, (control) => Either.right(Abbreviation.Widget({ control }))),
        Match.when(isControl, (control) =>
            Either.left(InteractError.from('Infer', 'NO_CONTROL', `${control._tag} is not a value control`)),
        ),
        Match.when(Match.instanceOf(Fixed), (fixed) => Either.right(Abbreviation.Fixed({ fixed }))),
        Match.when(
            (u: unknown): u is RangeHint => u instanceof RangeHint && u.bounds.every(isFiniteNumber),
            (hint) =>
                Either.right(
                    Abbreviation.Range({
                        integral: hint.bounds.every(isInteger),
                        max: hint.max,
                        min: hint.min,
                        step: hint.step,
                    }),
                ),
        ),
        Match.when(Match.string, (value) => Either.right(Abbreviation.Text({ value }))),
        Match.when(Match.boolean, (value) => Either.right(Abbreviation.Toggle({ value }))),
        Match.when(isInteger, (value) => Either.right(Abbreviation.Integer({ value }))),
        Match.when(isFiniteNumber, (value) => Either.right(Abbreviation.Real({ value }))),
        Match.when(
            (u: unknown): u is ReadonlyMap<unknown, unknown> => u instanceof Map,
            (map) => Either.right(Abbreviation.Choice({ options: fromEntries(map.entries()) })),
        ),
        Match.when(
            (u: unknown): u is ReadonlyArray<unknown> => Array.isArray(u),
            (items) => Either.right(Abbreviation.Choice({ options: fromSequence(items) })),
        ),
        Match.when(
            (u: unknown): u is Iterable<unknown> => Predicate.isIterable(u),
            (items) => Either.right(Abbreviation.Choice({ options: fromSequence(Array.from(items)) })),
        ),
        Match.when(isPlainMapping, (mapping) => Either.right(Abbreviation.Choice({ options: fromEntries(Object.entries(mapping)) }))),
        Match.orElse((other) => Either.left(InteractError.from('Infer', 'NO_CONTROL', describeRaw(other)))),
    );

/** Best-effort: a rejected default keeps the control's computed value. */
const applyDefault = <C extends AnyValueControl>(control: C, fallback: Option.Option<unknown>): Effect.Effect<C> =>
    Option.match(fallback, {
        onNone: () => Effect.succeed(control),
        onSome: (value) =>
            Either.match(control.assign(value), {
                onLeft: (error) =>
                    Effect.logDebug('Default rejected, keeping computed value').pipe(
                        Effect.annotateLogs({ code: String(error.code), control: control._tag }),
                        Effect.as(control),
                    ),
                onRight: () => Effect.succeed(control),
            }),
    });

// --- [ENTRY_POINT] -----------------------------------------------------------

const controlFor = (
    abbreviation: Abbreviation,
    fallback: Option.Option<unknown>,
): Effect.Effect<Bindable, InteractError, Toolkit> =>
    Effect.gen(function* () {
        const toolkit = yield* Toolkit;
        const ranged = (integral: boolean, span: Span, step: Option.Option<number>) =>
            (integral ? toolkit.intRange : toolkit.realRange)({
                ...span,
                step: Option.getOrElse(step, () => (integral ? B.defaultStep.integral : B.defaultStep.real)),
            });
        const built: Effect.Effect<Bindable, InteractError> = Abbreviation.$match(abbreviation, {
            Choice: ({ options }) => applyDefault(toolkit.choice(options), fallback),
            Fixed: ({ fixed }) => Effect.succeed<Bindable>(fixed),
            Integer: ({ value }) => Effect.succeed(ranged(true, scalarBounds(value), Option.none())),
            Range: ({ integral, max, min, step }) =>
                Effect.flatMap(rangeValue(min, max, step), (span) => applyDefault(ranged(integral, span, step), fallback)),
            Real: ({ value }) => Effect.succeed(ranged(false, scalarBounds(value), Option.none())),
            Text: ({ value }) => Effect.succeed(toolkit.text(value)),
            Toggle: ({ value }) => Effect.succeed(toolkit.toggle(value)),
            Widget: ({ control }) => Effect.succeed(control),
        });
        return yield* built;
    });

/** Label unlabelled controls with the parameter name and key the binding by it. */
const bind = (key: string, source: Bindable): Binding => {
    if (!(source instanceof Fixed) && source.description === '') {
        source.description = key;
    }
    return { key, source };
};

/** Read the value a binding contributes to the invocation state. */
const valueOf = (binding: Binding): unknown =>
    binding.source instanceof Fixed ? binding.source.value : binding.source.interactValue();

// --- [EXPORT] ----------------------------------------------------------------

export type { Bindable, Binding, Span };
export { applyDefault, B as FACTORY_TUNING, bind, classify, controlFor, rangeValue, scalarBounds, valueOf };
