/**
 * Control capability contracts the widget toolkit implements: value controls, trigger, output sink, container.
 * Value controls share assign/observe semantics so the dispatcher never inspects concrete toolkit types.
 */
import { type Either, Predicate } from 'effect';
import type { InteractError } from './errors.ts';

// --- [TYPES] -----------------------------------------------------------------

type ValueKind = (typeof B.valueKinds)[number];
type Unsubscribe = () => void;
type ValueChange<A> = { readonly current: A; readonly previous: A };
type ChoiceOption = { readonly label: string; readonly value: unknown };
type Bounds = { readonly max: number; readonly min: number; readonly step: number };
type RangeInit = Bounds & { readonly value: number };
interface ControlBase {
    readonly [ControlTypeId]: ControlTypeId;
}
interface ValueControl<A = unknown> extends ControlBase {
    readonly _tag: ValueKind;
    /** Human-readable label; empty until the dispatcher labels it with the parameter name. */
    description: string;
    readonly value: A;
    /** Validate and store; notifies observers only when the stored value changes. */
    readonly assign: (value: unknown) => Either.Either<A, InteractError>;
    /** Value handed to the target function, e.g. a choice yields the option value, not its label. */
    readonly interactValue: () => unknown;
    readonly observe: (handler: (change: ValueChange<A>) => void) => Unsubscribe;
}
interface TextControl extends ValueControl<string> {
    readonly _tag: 'Text';
    readonly onSubmit: (handler: () => void) => Unsubscribe;
    readonly submit: () => void;
}
interface ToggleControl extends ValueControl<boolean> {
    readonly _tag: 'Toggle';
}
interface RangeControl extends ValueControl<number> {
    readonly _tag: 'IntRange' | 'RealRange';
    readonly bounds: Bounds;
    readonly setBounds: (bounds: Bounds) => Either.Either<Bounds, InteractError>;
}
interface ChoiceControl extends ValueControl<unknown> {
    readonly _tag: 'Choice';
    readonly label: string | undefined;
    readonly options: ReadonlyArray<ChoiceOption>;
    readonly setOptions: (options: ReadonlyArray<ChoiceOption>) => void;
}
interface ButtonControl extends ControlBase {
    readonly _tag: 'Button';
    readonly click: () => void;
    description: string;
    disabled: boolean;
    readonly onClick: (handler: () => void) => Unsubscribe;
}
interface OutputControl extends ControlBase {
    readonly _tag: 'Output';
    readonly clear: () => void;
    readonly outputs: ReadonlyArray<unknown>;
    readonly render: (value: unknown) => void;
}
interface BoxControl extends ControlBase {
    readonly _tag: 'Box';
    readonly children: ReadonlyArray<Control>;
    readonly classes: ReadonlyArray<string>;
    /** Fired by the host once the container is on screen. */
    readonly markDisplayed: () => void;
    readonly onDisplayed: (handler: () => void) => Unsubscribe;
}
type AnyValueControl = ChoiceControl | RangeControl | TextControl | ToggleControl;
type Control = AnyValueControl | BoxControl | ButtonControl | OutputControl;

// --- [CONSTANTS] -------------------------------------------------------------

const ControlTypeId: unique symbol = Symbol.for('@knobs/types/Control');
type ControlTypeId = typeof ControlTypeId;
const B = Object.freeze({
    valueKinds: ['Text', 'Toggle', 'IntRange', 'RealRange', 'Choice'] as const,
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const isControl = (u: unknown): u is Control => Predicate.hasProperty(u, ControlTypeId);
const isValueControl = (u: unknown): u is AnyValueControl =>
    isControl(u) && B.valueKinds.some((kind) => kind === u._tag);
const isTextControl = (u: ValueControl): u is TextControl => u._tag === 'Text';

// --- [EXPORT] ----------------------------------------------------------------

export type {
    AnyValueControl,
    Bounds,
    BoxControl,
    ButtonControl,
    ChoiceControl,
    ChoiceOption,
    Control,
    OutputControl,
    RangeControl,
    RangeInit,
    TextControl,
    ToggleControl,
    Unsubscribe,
    ValueChange,
    ValueControl,
    ValueKind,
};
export { B as CONTROL_TUNING, ControlTypeId, isControl, isTextControl, isValueControl };
