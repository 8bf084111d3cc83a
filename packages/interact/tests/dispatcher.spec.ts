/**
 * Validate container assembly and re-invocation in reactive and manual modes.
 */
import { fixed } from '@knobs/types/abbreviation';
import { InteractError } from '@knobs/types/errors';
import { Effect, Layer, Option } from 'effect';
import { describe, expect, it, vi } from 'vitest';
import { type Container, type ContainerConfig, createContainer, type Kwargs } from '../src/dispatcher.ts';
import { bind } from '../src/factory.ts';
import { Headless } from '../src/headless.ts';
import { Host, Toolkit } from '../src/services.ts';

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const setup = <R>(overrides: Partial<ContainerConfig<R>> & Pick<ContainerConfig<R>, 'fn'>) => {
    const headless = Headless.make();
    const count = Headless.toolkit.intRange({ max: 10, min: 0, step: 1, value: 2 });
    const query = Headless.toolkit.text('hello');
    const config: ContainerConfig<R> = {
        bindings: [bind('count', count), bind('query', query), bind('scale', fixed(3))],
        clearOutput: true,
        mode: 'reactive',
        name: 'target',
        runLabel: 'Run',
        ...overrides,
    };
    const container: Container<R> = Effect.runSync(createContainer(config).pipe(Effect.provide(headless.layer)));
    return { container, count, headless, query };
};

// --- [TESTS] -----------------------------------------------------------------

describe('createContainer', () => {
    it('lays out value controls then output, skipping fixed bindings', () => {
        const { container, count, query } = setup({ fn: () => undefined });
        expect(container.box.children).toEqual([count, query, container.output]);
        expect(container.box.classes).toEqual(['widget-interact']);
        expect(container.controls).toEqual([count, query]);
        expect(container.trigger).toBeNone();
        expect(container.mode).toBe('reactive');
    });

    it('labels controls with their parameter names', () => {
        const { count, query } = setup({ fn: () => undefined });
        expect([count.description, query.description]).toEqual(['count', 'query']);
    });

    it('does not run before display', () => {
        const calls: Kwargs[] = [];
        const { container } = setup({ fn: (kwargs) => calls.push(kwargs) });
        expect([calls.length, container.kwargs()]).toEqual([0, Option.none()]);
    });
});

describe('reactive mode', () => {
    it('runs once on display and once per value change', () => {
        const calls: Kwargs[] = [];
        const { container, count } = setup({
            fn: (kwargs) => {
                calls.push(kwargs);
                return Number(kwargs['count']) * 10;
            },
        });
        container.box.markDisplayed();
        count.assign(4);
        count.assign(4);
        expect(calls).toEqual([
            { count: 2, query: 'hello', scale: 3 },
            { count: 4, query: 'hello', scale: 3 },
        ]);
        expect(container.output.outputs).toEqual([40]);
        expect(container.result()).toBeSome(40);
        expect(container.kwargs()).toBeSome({ count: 4, query: 'hello', scale: 3 });
    });

    it('does not run on text submit', () => {
        let calls = 0;
        const { query } = setup({
            fn: () => {
                calls += 1;
            },
        });
        query.submit();
        expect(calls).toBe(0);
    });

    it('skips rendering absent results', () => {
        const { container } = setup({ fn: () => null });
        container.invoke();
        expect(container.output.outputs).toEqual([]);
        expect(container.result()).toBeSome(null);
    });

    it('accumulates output when clearing is off', () => {
        const { container, count } = setup({ clearOutput: false, fn: (kwargs) => kwargs['count'] });
        container.invoke();
        count.assign(5);
        expect(container.output.outputs).toEqual([2, 5]);
    });

    it('stops reacting once closed', () => {
        let calls = 0;
        const { container, count } = setup({
            fn: () => {
                calls += 1;
            },
        });
        container.close();
        count.assign(7);
        container.box.markDisplayed();
        expect(calls).toBe(0);
    });
});

describe('manual mode', () => {
    it('labels the trigger and runs only on clicks and submits', () => {
        const calls: Kwargs[] = [];
        const { container, count, query } = setup({
            fn: (kwargs) => calls.push(kwargs),
            mode: 'manual',
        });
        const trigger = Option.getOrUndefined(container.trigger);
        expect(trigger?.description).toBe('Run target');
        expect(container.box.children).toEqual([count, query, trigger, container.output]);
        container.box.markDisplayed();
        count.assign(9);
        expect(calls).toEqual([]);
        trigger?.click();
        query.submit();
        expect(calls).toEqual([
            { count: 9, query: 'hello', scale: 3 },
            { count: 9, query: 'hello', scale: 3 },
        ]);
    });

    it('disables the trigger while running and re-enables it after a failure', () => {
        const seen: boolean[] = [];
        const state: { trigger: Option.Option<{ readonly disabled: boolean }> } = { trigger: Option.none() };
        const { container } = setup({
            fn: () => {
                seen.push(Option.exists(state.trigger, (t) => t.disabled));
                throw new Error('boom');
            },
            mode: 'manual',
        });
        state.trigger = container.trigger;
        Option.map(container.trigger, (t) => t.click());
        expect(seen).toEqual([true]);
        expect(Option.map(container.trigger, (t) => t.disabled)).toBeSome(false);
    });
});

describe('exception containment', () => {
    it('reports target failures through the host and keeps running', () => {
        let calls = 0;
        const { container, count, headless } = setup({
            fn: () => {
                calls += 1;
                throw new Error('boom');
            },
        });
        container.box.markDisplayed();
        count.assign(3);
        expect(calls).toBe(2);
        expect(headless.errors).toHaveLength(2);
        const error = headless.errors[0]?.error;
        expect(error).toBeInstanceOf(InteractError);
        expect(error instanceof InteractError ? [error.formatted, error.cause] : []).toEqual([
            '[Invoke:CALLBACK_FAILED] Exception in interact callback: boom',
            new Error('boom'),
        ]);
        expect(headless.errors[0]?.context).toEqual({ function: 'target', kwargs: { count: 2, query: 'hello', scale: 3 } });
        expect(container.result()).toBeNone();
    });

    it('keeps the previous result when a later call throws', () => {
        const { container, count } = setup({
            fn: (kwargs) => {
                if (kwargs['count'] === 6) {
                    throw new Error('six');
                }
                return kwargs['count'];
            },
        });
        container.invoke();
        count.assign(6);
        expect(container.result()).toBeSome(2);
    });

    it('keeps event handlers synchronous when the host reports asynchronously', async () => {
        const reported: unknown[] = [];
        const seen: number[] = [];
        const count = Headless.toolkit.intRange({ max: 10, min: 0, step: 1, value: 2 });
        const host = Layer.succeed(Host, {
            display: (box) => Effect.sync(() => box.markDisplayed()),
            reportError: (error) =>
                Effect.promise(() => Promise.resolve(error)).pipe(
                    Effect.map((e) => {
                        reported.push(e);
                    }),
                ),
        });
        const container = Effect.runSync(
            createContainer({
                bindings: [bind('count', count)],
                clearOutput: true,
                fn: () => {
                    throw new Error('boom');
                },
                mode: 'reactive',
                name: 'target',
                runLabel: 'Run',
            }).pipe(Effect.provide(Layer.merge(host, Layer.succeed(Toolkit, Headless.toolkit)))),
        );
        count.observe((change) => seen.push(change.current));
        expect(() => container.box.markDisplayed()).not.toThrow();
        expect(() => count.assign(4)).not.toThrow();
        expect(seen).toEqual([4]);
        await vi.waitFor(() => expect(reported).toHaveLength(2));
    });

    it('logs failures even without a host', () => {
        const count = Headless.toolkit.intRange({ max: 10, min: 0, step: 1, value: 2 });
        const container = Effect.runSync(
            createContainer({
                bindings: [bind('count', count)],
                clearOutput: true,
                fn: () => {
                    throw new Error('boom');
                },
                mode: 'reactive',
                name: 'target',
                runLabel: 'Run',
            }).pipe(Effect.provideService(Toolkit, Headless.toolkit)),
        );
        expect(() => container.invoke()).not.toThrow();
    });
});
