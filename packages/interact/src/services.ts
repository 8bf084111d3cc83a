/**
 * Capability tags for the collaborators the core delegates to: the control toolkit and the display host.
 */
import type {
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
} from '@knobs/types/controls';
import { Context, type Effect } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type ToolkitShape = {
    readonly box: (children: ReadonlyArray<Control>, classes: ReadonlyArray<string>) => BoxControl;
    readonly button: (description: string) => ButtonControl;
    readonly choice: (options: ReadonlyArray<ChoiceOption>) => ChoiceControl;
    readonly intRange: (init: RangeInit) => RangeControl;
    readonly output: () => OutputControl;
    readonly realRange: (init: RangeInit) => RangeControl;
    readonly text: (value: string) => TextControl;
    readonly toggle: (value: boolean) => ToggleControl;
};
type HostShape = {
    /** Put the container on screen and fire its displayed hooks. */
    readonly display: (box: BoxControl) => Effect.Effect<void>;
    /** Error channel for exceptions raised by the target function. */
    readonly reportError: (error: unknown, context: Readonly<Record<string, unknown>>) => Effect.Effect<void>;
};

// --- [SERVICES] --------------------------------------------------------------

class Toolkit extends Context.Tag('knobs/Toolkit')<Toolkit, ToolkitShape>() {}
class Host extends Context.Tag('knobs/Host')<Host, HostShape>() {}

// --- [EXPORT] ----------------------------------------------------------------

export type { HostShape, ToolkitShape };
export { Host, Toolkit };
