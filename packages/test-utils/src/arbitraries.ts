/**
 * Arbitraries: fast-check generators for parameter names, numeric ranges and option lists.
 */
import fc from 'fast-check';

// --- [TYPES] ----------------------------------------------------------------

type IntRangeSample = { readonly max: number; readonly min: number };
type SteppedRangeSample = IntRangeSample & { readonly step: number };

// --- [CONSTANTS] ------------------------------------------------------------

const B = Object.freeze({
    integers: { bound: 1_000, maxStep: 50, maxWidth: 500 },
    names: { maxCount: 6, pattern: /^[a-z][a-z0-9_]{0,11}$/ },
    options: { maxCount: 8 },
    reals: { bound: 1_000, maxStep: 50, maxWidth: 500, minMagnitude: 0.001 },
} as const);

// --- [PURE_FUNCTIONS] -------------------------------------------------------

/** Identifier-shaped name; never collides with reserved override keys, which start with '_' or carry capitals. */
const fcName = (): fc.Arbitrary<string> => fc.stringMatching(B.names.pattern);
const fcNames = (minLength = 1): fc.Arbitrary<ReadonlyArray<string>> =>
    fc.uniqueArray(fcName(), { maxLength: B.names.maxCount, minLength });
/** Integer (min, max) with max strictly greater than min. */
const fcIntRange = (): fc.Arbitrary<IntRangeSample> =>
    fc
        .tuple(
            fc.integer({ max: B.integers.bound, min: -B.integers.bound }),
            fc.integer({ max: B.integers.maxWidth, min: 1 }),
        )
        .map(([min, width]) => ({ max: min + width, min }));
const fcSteppedRange = (): fc.Arbitrary<SteppedRangeSample> =>
    fc
        .tuple(fcIntRange(), fc.integer({ max: B.integers.maxStep, min: 1 }))
        .map(([range, step]) => ({ ...range, step }));
/** Real (min, max, step): max > min, step positive, none of them necessarily integral. */
const fcRealSteppedRange = (): fc.Arbitrary<SteppedRangeSample> =>
    fc
        .tuple(
            fc.double({ max: B.reals.bound, min: -B.reals.bound, noDefaultInfinity: true, noNaN: true }),
            fc.double({ max: B.reals.maxWidth, min: B.reals.minMagnitude, noDefaultInfinity: true, noNaN: true }),
            fc.double({ max: B.reals.maxStep, min: B.reals.minMagnitude, noDefaultInfinity: true, noNaN: true }),
        )
        .map(([min, width, step]) => ({ max: min + width, min, step }));
const fcNonPositiveStep = (): fc.Arbitrary<number> =>
    fc.oneof(fc.constant(0), fc.integer({ max: -1, min: -B.integers.maxStep }));
const fcNonZeroInteger = (): fc.Arbitrary<number> =>
    fc.integer({ max: B.integers.bound, min: -B.integers.bound }).filter((n) => n !== 0);
/** Finite non-integral real away from zero. */
const fcFraction = (): fc.Arbitrary<number> =>
    fc
        .double({ max: B.reals.bound, min: -B.reals.bound, noDefaultInfinity: true, noNaN: true })
        .filter((n) => !Number.isInteger(n) && Math.abs(n) > B.reals.minMagnitude);
const fcOptions = (): fc.Arbitrary<ReadonlyArray<string>> =>
    fc.uniqueArray(fc.string({ maxLength: 8, minLength: 1 }), { maxLength: B.options.maxCount, minLength: 1 });

// --- [ENTRY_POINT] ----------------------------------------------------------

const Arbitraries = Object.freeze({
    fraction: fcFraction,
    intRange: fcIntRange,
    name: fcName,
    names: fcNames,
    nonPositiveStep: fcNonPositiveStep,
    nonZeroInteger: fcNonZeroInteger,
    options: fcOptions,
    realSteppedRange: fcRealSteppedRange,
    steppedRange: fcSteppedRange,
} as const);

// --- [EXPORT] ---------------------------------------------------------------

export type { IntRangeSample, SteppedRangeSample };
export { Arbitraries as FC_ARB, B as ARB_TUNING };
