/**
 * In-process toolkit and host: controls hold their values in memory and fire explicit subscription
 * lists synchronously, in registration order. Renders nothing; records displayed containers and
 * reported errors so callers and tests can inspect them.
 */
import {
    type BoxControl,
    type ButtonControl,
    type ChoiceControl,
    type ChoiceOption,
    type Control,
    ControlTypeId,
    type OutputControl,
    type RangeControl,
    type RangeInit,
    type TextControl,
    type ToggleControl,
    type Unsubscribe,
    type ValueChange,
} from '@knobs/types/controls';
import { InteractError } from '@knobs/types/errors';
import { Effect, Either, Equal, Layer } from 'effect';
import { Host, type HostShape, Toolkit, type ToolkitShape } from './services.ts';

// --- [TYPES] -----------------------------------------------------------------

type Reported = { readonly context: Readonly<Record<string, unknown>>; readonly error: unknown };
type HeadlessResult = {
    readonly displayed: BoxControl[];
    readonly errors: Reported[];
    readonly layer: Layer.Layer<Host | Toolkit>;
};
type Subscribers<A> = { readonly add: (handler: (a: A) => void) => Unsubscribe; readonly emit: (a: A) => void };
type Cell<A> = {
    readonly assign: (raw: unknown) => Either.Either<A, InteractError>;
    readonly observe: (handler: (change: ValueChange<A>) => void) => Unsubscribe;
    readonly set: (next: A) => void;
    readonly state: { description: string; value: A };
};

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const show = (value: unknown): string => (typeof value === 'string' ? JSON.stringify(value) : String(value));
const reject = (kind: string, value: unknown, reason: string): InteractError =>
    InteractError.from('Control', 'VALUE_REJECTED', `${kind} ${reason}, got ${show(value)}`);
const subscribers = <A>(): Subscribers<A> => {
    const handlers: Array<(a: A) => void> = [];
    return {
        add: (handler) => {
            handlers.push(handler);
            return () => {
                const index = handlers.indexOf(handler);
                index >= 0 && handlers.splice(index, 1);
            };
        },
        emit: (a) => [...handlers].forEach((handler) => handler(a)),
    };
};
const cell = <A>(initial: A, validate: (raw: unknown) => Either.Either<A, InteractError>): Cell<A> => {
    const state = { description: '', value: initial };
    const observers = subscribers<ValueChange<A>>();
    const set = (next: A): void => {
        const previous = state.value;
        state.value = next;
        Equal.equals(previous, next) || observers.emit({ current: next, previous });
    };
    return {
        assign: (raw) =>
            Either.map(validate(raw), (next) => {
                set(next);
                return next;
            }),
        observe: observers.add,
        set,
        state,
    };
};
const checkNumber = (kind: RangeControl['_tag'], bounds: RangeInit | RangeControl['bounds'], raw: unknown) =>
    typeof raw !== 'number' || !Number.isFinite(raw)
        ? Either.left(reject(kind, raw, 'expects a finite number'))
        : kind === 'IntRange' && !Number.isInteger(raw)
          ? Either.left(reject(kind, raw, 'expects an integer'))
          : raw < bounds.min || raw > bounds.max
            ? Either.left(reject(kind, raw, `expects a value within [${bounds.min}, ${bounds.max}]`))
            : Either.right(raw);

// --- [FACTORIES] -------------------------------------------------------------

const text = (value: string): TextControl => {
    const c = cell(value, (raw) =>
        typeof raw === 'string' ? Either.right(raw) : Either.left(reject('Text', raw, 'expects a string')),
    );
    const submits = subscribers<void>();
    return {
        [ControlTypeId]: ControlTypeId,
        _tag: 'Text',
        assign: c.assign,
        get description() { return c.state.description; },
        set description(next: string) { c.state.description = next; },
        interactValue: () => c.state.value,
        observe: c.observe,
        onSubmit: (handler) => submits.add(handler),
        submit: () => submits.emit(),
        get value() { return c.state.value; },
    };
};
const toggle = (value: boolean): ToggleControl => {
    const c = cell(value, (raw) =>
        typeof raw === 'boolean' ? Either.right(raw) : Either.left(reject('Toggle', raw, 'expects a boolean')),
    );
    return {
        [ControlTypeId]: ControlTypeId,
        _tag: 'Toggle',
        assign: c.assign,
        get description() { return c.state.description; },
        set description(next: string) { c.state.description = next; },
        interactValue: () => c.state.value,
        observe: c.observe,
        get value() { return c.state.value; },
    };
};
const rangeOf = (kind: RangeControl['_tag']) => (init: RangeInit): RangeControl => {
    const state = { bounds: { max: init.max, min: init.min, step: init.step } };
    const c = cell(init.value, (raw) => checkNumber(kind, state.bounds, raw));
    return {
        [ControlTypeId]: ControlTypeId,
        _tag: kind,
        assign: c.assign,
        get bounds() { return state.bounds; },
        get description() { return c.state.description; },
        set description(next: string) { c.state.description = next; },
        interactValue: () => c.state.value,
        observe: c.observe,
        setBounds: (bounds) => {
            if (!(bounds.max > bounds.min) || !(bounds.step > 0)) {
                return Either.left(reject(kind, `(${bounds.min}, ${bounds.max}, ${bounds.step})`, 'expects max > min and step > 0'));
            }
            state.bounds = { max: bounds.max, min: bounds.min, step: bounds.step };
            // Current value is clamped into the new bounds; observers see the change.
            c.set(Math.min(bounds.max, Math.max(bounds.min, c.state.value)));
            return Either.right(state.bounds);
        },
        get value() { return c.state.value; },
    };
};
const choice = (initial: ReadonlyArray<ChoiceOption>): ChoiceControl => {
    const state = { options: initial };
    const find = (raw: unknown): ChoiceOption | undefined => state.options.find((o) => Equal.equals(o.value, raw));
    const c = cell<unknown>(initial[0]?.value, (raw) => {
        const option = find(raw);
        return option === undefined ? Either.left(reject('Choice', raw, 'expects one of the options')) : Either.right(option.value);
    });
    return {
        [ControlTypeId]: ControlTypeId,
        _tag: 'Choice',
        assign: c.assign,
        get description() { return c.state.description; },
        set description(next: string) { c.state.description = next; },
        interactValue: () => c.state.value,
        get label() { return state.options.length === 0 ? undefined : find(c.state.value)?.label; },
        observe: c.observe,
        get options() { return state.options; },
        setOptions: (options) => {
            state.options = options;
            find(c.state.value) === undefined && c.set(options[0]?.value);
        },
        get value() { return c.state.value; },
    };
};
const button = (description: string): ButtonControl => {
    const state = { description, disabled: false };
    const clicks = subscribers<void>();
    return {
        [ControlTypeId]: ControlTypeId,
        _tag: 'Button',
        // A disabled trigger swallows clicks, as a rendered button would.
        click: () => state.disabled || clicks.emit(),
        get description() { return state.description; },
        set description(next: string) { state.description = next; },
        get disabled() { return state.disabled; },
        set disabled(next: boolean) { state.disabled = next; },
        onClick: (handler) => clicks.add(handler),
    };
};
const output = (): OutputControl => {
    const outputs: unknown[] = [];
    return {
        [ControlTypeId]: ControlTypeId,
        _tag: 'Output',
        clear: () => {
            outputs.length = 0;
        },
        outputs,
        render: (value) => {
            outputs.push(value);
        },
    };
};
const box = (children: ReadonlyArray<Control>, classes: ReadonlyArray<string>): BoxControl => {
    const displayed = subscribers<void>();
    return {
        [ControlTypeId]: ControlTypeId,
        _tag: 'Box',
        children,
        classes,
        markDisplayed: () => displayed.emit(),
        onDisplayed: (handler) => displayed.add(handler),
    };
};
const toolkit: ToolkitShape = Object.freeze({
    box,
    button,
    choice,
    intRange: rangeOf('IntRange'),
    output,
    realRange: rangeOf('RealRange'),
    text,
    toggle,
});

// --- [ENTRY_POINT] -----------------------------------------------------------

const make = (): HeadlessResult => {
    const displayed: BoxControl[] = [];
    const errors: Reported[] = [];
    const host: HostShape = {
        display: (target) =>
            Effect.sync(() => {
                displayed.push(target);
                target.markDisplayed();
            }),
        reportError: (error, context) =>
            Effect.sync(() => {
                errors.push({ context, error });
            }),
    };
    return { displayed, errors, layer: Layer.merge(Layer.succeed(Toolkit, toolkit), Layer.succeed(Host, host)) };
};
const Headless = Object.freeze({ make, toolkit });

// --- [EXPORT] ----------------------------------------------------------------

export type { HeadlessResult, Reported };
export { Headless };
