/**
 * Explicit parameter specification for interactable functions: kinds, declared defaults, annotations.
 * Absent defaults and annotations decode to Option.none so that `undefined` stays a legal declared value.
 */
import { Effect, Option, ParseResult, pipe, Schema as S } from 'effect';
import { InteractError } from './errors.ts';

// --- [TYPES] -----------------------------------------------------------------

type ParameterKind = S.Schema.Type<typeof ParameterKindSchema>;
type ParameterSpec = S.Schema.Type<typeof ParameterSpecSchema>;
type ParameterInput = S.Schema.Encoded<typeof ParameterSpecSchema>;
type Signature = S.Schema.Type<typeof SignatureSchema>;
type SignatureInput = S.Schema.Encoded<typeof SignatureSchema>;
type ParameterExtras = { readonly annotation?: unknown; readonly default?: unknown };

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    defaults: { kind: 'positional-or-keyword' as const, name: '<anonymous>' },
    kinds: {
        keywordOnly: 'keyword-only',
        positionalOnly: 'positional-only',
        positionalOrKeyword: 'positional-or-keyword',
        varKeyword: 'var-keyword',
        varPositional: 'var-positional',
    },
} as const);
/** Kinds that need a value at call time unless a default is declared. */
const requiredKinds: ReadonlyArray<string> = [B.kinds.positionalOrKeyword, B.kinds.keywordOnly, B.kinds.positionalOnly];

// --- [SCHEMA] ----------------------------------------------------------------

const ParameterKindSchema = S.Literal(
    B.kinds.positionalOrKeyword,
    B.kinds.keywordOnly,
    B.kinds.varKeyword,
    B.kinds.positionalOnly,
    B.kinds.varPositional,
);
const ParameterSpecSchema = S.Struct({
    annotation: S.optionalWith(S.Unknown, { as: 'Option', exact: true }),
    default: S.optionalWith(S.Unknown, { as: 'Option', exact: true }),
    kind: S.optionalWith(ParameterKindSchema, { default: () => B.defaults.kind }),
    name: S.NonEmptyTrimmedString,
});
const SignatureSchema = pipe(
    S.Struct({
        name: S.optionalWith(S.NonEmptyTrimmedString, { default: () => B.defaults.name }),
        parameters: S.Array(ParameterSpecSchema),
    }),
    S.filter((signature) => {
        const names = signature.parameters.map((p) => p.name);
        const duplicate = names.find((n, i) => names.indexOf(n) !== i);
        return duplicate === undefined || `duplicate parameter name ${InteractError.quote(duplicate)}`;
    }),
);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Build one encoded parameter; omitted extras stay absent rather than undefined. */
const param = (name: string, kind: ParameterKind = B.defaults.kind, extras: ParameterExtras = {}): ParameterInput => ({
    ...extras,
    kind,
    name,
});
const isRequired = (p: ParameterSpec): boolean => requiredKinds.includes(p.kind) && Option.isNone(p.default);
const decodeSignature = (input: SignatureInput | undefined): Effect.Effect<Option.Option<Signature>, InteractError> =>
    input === undefined
        ? Effect.succeed(Option.none())
        : S.decodeUnknown(SignatureSchema)(input).pipe(
              Effect.map(Option.some),
              Effect.mapError((error) =>
                  InteractError.from('Resolve', 'INVALID_SIGNATURE', ParseResult.TreeFormatter.formatErrorSync(error), error),
              ),
          );

// --- [EXPORT] ----------------------------------------------------------------

export type { ParameterExtras, ParameterInput, ParameterKind, ParameterSpec, Signature, SignatureInput };
export {
    B as SIGNATURE_TUNING,
    decodeSignature,
    isRequired,
    ParameterKindSchema,
    ParameterSpecSchema,
    param,
    SignatureSchema,
};
