/**
 * Unify setup and invocation failures via Data.TaggedError for Effect.gen yield.
 * Domain-scoped codes separate resolution, call-contract, inference, numeric-constraint and runtime failures.
 */
import { Data } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type ErrorDomain = keyof typeof B;
type ErrorCodes = { readonly [K in ErrorDomain]: keyof (typeof B)[K] };
type ErrorCode<D extends ErrorDomain> = ErrorCodes[D];

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    Config: {
        INVALID_CONFIG: 'Invalid interact configuration',
    },
    Constraint: {
        MAX_NOT_GREATER: 'max must be greater than min',
        STEP_NOT_POSITIVE: 'step must be greater than 0',
    },
    Contract: {
        DUPLICATE_ARGUMENT: 'Argument bound more than once',
        MISSING_ARGUMENT: 'Required argument is not bound',
        UNEXPECTED_ARGUMENT: 'Function does not accept argument',
    },
    Control: {
        VALUE_REJECTED: 'Control rejected value',
    },
    Infer: {
        NO_CONTROL: 'Cannot infer a control for abbreviation',
    },
    Invoke: {
        CALLBACK_FAILED: 'Exception in interact callback',
    },
    Resolve: {
        INVALID_SIGNATURE: 'Invalid parameter specification',
        MISSING_ABBREVIATION: 'Cannot find control or abbreviation for argument',
        RESERVED_KEY: 'Reserved override must be a boolean',
    },
} as const);
const messages: Readonly<Record<string, Readonly<Record<string, string>>>> = B;

// --- [CLASSES] ---------------------------------------------------------------

class InteractError<D extends ErrorDomain = ErrorDomain> extends Data.TaggedError('InteractError')<{
    readonly cause?: unknown;
    readonly code: ErrorCode<D>;
    readonly domain: D;
    readonly message: string;
}> {
    /** Format error for logging/display with domain:code prefix. */
    get formatted(): string { return `[${this.domain}:${String(this.code)}] ${this.message}`; }
    /** Construct from domain-scoped code; detail is appended to the table message. */
    static from<D extends ErrorDomain>(domain: D, key: ErrorCode<D>, detail?: string, cause?: unknown): InteractError<D> {
        const base = messages[domain]?.[String(key)] ?? String(key);
        return new InteractError({
            code: key,
            domain,
            message: detail === undefined ? base : `${base}: ${detail}`,
            ...(cause === undefined ? {} : { cause }),
        });
    }
    /** Quote a parameter or override name the way messages reference it. */
    static quote(name: string): string { return `'${name}'`; }
}

// --- [EXPORT] ----------------------------------------------------------------

export type { ErrorCode, ErrorDomain };
export { B as ERROR_TUNING, InteractError };
