/**
 * Resolve each declared parameter to (name, abbreviation, default) in declaration order, then check
 * the candidate arguments against the call contract before any control exists.
 */
import { InteractError } from '@knobs/types/errors';
import { isRequired, type ParameterSpec, SIGNATURE_TUNING, type Signature } from '@knobs/types/signature';
import { Effect, Match, Option } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type Overrides = Readonly<Record<string, unknown>>;
type Triple = {
    readonly abbreviation: unknown;
    /** Declared default, applied best-effort to range and choice controls. */
    readonly fallback: Option.Option<unknown>;
    readonly name: string;
};

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const take = (pending: Map<string, unknown>, name: string): Option.Option<unknown> => {
    const found = pending.has(name) ? Option.some(pending.get(name)) : Option.none();
    pending.delete(name);
    return found;
};
const drain = (pending: Map<string, unknown>): ReadonlyArray<Triple> => {
    const triples = [...pending].map(([name, abbreviation]) => ({ abbreviation, fallback: Option.none(), name }));
    pending.clear();
    return triples;
};

/** Priority for named parameters: caller override, then annotation, then declared default. */
const forParameter = (p: ParameterSpec, pending: Map<string, unknown>): Effect.Effect<ReadonlyArray<Triple>, InteractError> =>
    Match.value(p.kind).pipe(
        Match.withReturnType<Effect.Effect<ReadonlyArray<Triple>, InteractError>>(),
        Match.when(Match.is(SIGNATURE_TUNING.kinds.positionalOrKeyword, SIGNATURE_TUNING.kinds.keywordOnly), () =>
            take(pending, p.name).pipe(
                Option.orElse(() => p.annotation),
                Option.orElse(() => p.default),
                Option.match({
                    onNone: () => Effect.fail(InteractError.from('Resolve', 'MISSING_ABBREVIATION', InteractError.quote(p.name))),
                    onSome: (abbreviation) => Effect.succeed([{ abbreviation, fallback: p.default, name: p.name }]),
                }),
            ),
        ),
        Match.when(SIGNATURE_TUNING.kinds.varKeyword, () => Effect.sync(() => drain(pending))),
        Match.orElse(() => Effect.succeed([])),
    );

/** Reject argument sets the function could never be called with: duplicates, strays, unbound required names. */
const checkContract = (
    signature: Signature,
    triples: ReadonlyArray<Triple>,
    leftover: ReadonlyArray<string>,
): Effect.Effect<void, InteractError> => {
    const names = triples.map((t) => t.name);
    const bound = new Set(names);
    const duplicate = names.find((n, i) => names.indexOf(n) !== i);
    const missing = signature.parameters.find(
        (p) => isRequired(p) && (p.kind === SIGNATURE_TUNING.kinds.positionalOnly || !bound.has(p.name)),
    );
    return duplicate !== undefined
        ? Effect.fail(InteractError.from('Contract', 'DUPLICATE_ARGUMENT', InteractError.quote(duplicate)))
        : leftover.length > 0
          ? Effect.fail(InteractError.from('Contract', 'UNEXPECTED_ARGUMENT', leftover.map(InteractError.quote).join(', ')))
          : missing !== undefined
            ? Effect.fail(InteractError.from('Contract', 'MISSING_ARGUMENT', InteractError.quote(missing.name)))
            : Effect.void;
};

// --- [ENTRY_POINT] -----------------------------------------------------------

/** Without a signature every override binds directly and doubles as its own default. */
const resolve = (signature: Option.Option<Signature>, overrides: Overrides): Effect.Effect<ReadonlyArray<Triple>, InteractError> =>
    Option.match(signature, {
        onNone: () =>
            Effect.succeed(
                Object.entries(overrides).map(([name, value]) => ({ abbreviation: value, fallback: Option.some(value), name })),
            ),
        onSome: (sig) =>
            Effect.gen(function* () {
                const pending = new Map(Object.entries(overrides));
                const triples = (yield* Effect.forEach(sig.parameters, (p) => forParameter(p, pending))).flat();
                yield* checkContract(sig, triples, [...pending.keys()]);
                yield* Effect.logDebug(`Resolved ${triples.length} argument(s) for ${sig.name}`);
                return triples;
            }),
    });

// --- [EXPORT] ----------------------------------------------------------------

export type { Overrides, Triple };
export { checkContract, resolve };
