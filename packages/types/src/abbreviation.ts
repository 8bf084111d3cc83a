/**
 * Closed abbreviation variants a raw override, annotation or default classifies into, plus the
 * explicit markers callers use where a bare value is ambiguous: fixed pass-through and numeric range.
 */
import { Data, Option } from 'effect';
import type { AnyValueControl, ChoiceOption } from './controls.ts';

// --- [TYPES] -----------------------------------------------------------------

type Abbreviation = Data.TaggedEnum<{
    Choice: { readonly options: ReadonlyArray<ChoiceOption> };
    Fixed: { readonly fixed: Fixed };
    Integer: { readonly value: number };
    Range: {
        readonly integral: boolean;
        readonly max: number;
        readonly min: number;
        readonly step: Option.Option<number>;
    };
    Real: { readonly value: number };
    Text: { readonly value: string };
    Toggle: { readonly value: boolean };
    Widget: { readonly control: AnyValueControl };
}>;

// --- [CLASSES] ---------------------------------------------------------------

/** Pass-through value: never turned into a control, never displayed, supplied unchanged at call time. */
class Fixed<A = unknown> extends Data.TaggedClass('Fixed')<{ readonly value: A }> {}

/** Explicit (min, max[, step]) shape; arrays are option lists, so ranges must be spelled out. */
class RangeHint extends Data.TaggedClass('RangeHint')<{
    readonly max: number;
    readonly min: number;
    readonly step: Option.Option<number>;
}> {
    get bounds(): ReadonlyArray<number> { return Option.match(this.step, { onNone: () => [this.min, this.max], onSome: (step) => [this.min, this.max, step] }); }
}

// --- [DISPATCH_TABLES] -------------------------------------------------------

const Abbreviation = Data.taggedEnum<Abbreviation>();

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const fixed = <A>(value: A): Fixed<A> => new Fixed({ value });
const range = (min: number, max: number, step?: number): RangeHint =>
    new RangeHint({ max, min, step: Option.fromNullable(step) });

// --- [EXPORT] ----------------------------------------------------------------

export { Abbreviation, Fixed, fixed, RangeHint, range };
