/**
 * Effect matchers for Vitest: Option, Either and Exit shape assertions, plus InteractError code checks.
 * Expected payloads compare with Equal.equals, so Data values and Options match structurally.
 */
import { InteractError } from '@knobs/types/errors';
import { Cause, Either, Equal, Exit, Option } from 'effect';
import { expect } from 'vitest';

// --- [TYPES] -----------------------------------------------------------------

type MatcherResult = { message: () => string; pass: boolean };
type Probe = { readonly check: boolean; readonly label: string; readonly other: string; readonly value: unknown };
interface EffectMatchers<R = unknown> {
    toBeFailure: (expected?: unknown) => R;
    toBeLeft: (expected?: unknown) => R;
    toBeNone: () => R;
    toBeRight: (expected?: unknown) => R;
    toBeSome: (expected?: unknown) => R;
    toBeSuccess: (expected?: unknown) => R;
    /** Left or failed Exit carrying an InteractError with this `Domain:CODE`. */
    toFailWithCode: (code: string) => R;
}
declare module 'vitest' {
    // biome-ignore lint/suspicious/noExplicitAny: Vitest Assertion interface uses T = any
    interface Assertion<T = any> extends EffectMatchers<T> {}
}

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const show = (value: unknown): string => {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
};
const same = (actual: unknown, expected: unknown): boolean =>
    Equal.equals(actual, expected) || show(actual) === show(expected);
const judge = (probe: Probe, expected: unknown, withExpected: boolean): MatcherResult => {
    const pass = probe.check && (!withExpected || same(probe.value, expected));
    const wanted = withExpected ? `${probe.label}(${show(expected)})` : probe.label;
    const got = probe.check ? `${probe.label}(${show(probe.value)})` : probe.other;
    return { message: () => (pass ? `expected not to be ${wanted}` : `expected ${wanted} but got ${got}`), pass };
};
const failureOf = (exit: Exit.Exit<unknown, unknown>): Option.Option<unknown> =>
    Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
const errorOf = (received: unknown): Option.Option<unknown> =>
    Either.isEither(received)
        ? Either.getLeft(received)
        : Exit.isExit(received)
          ? failureOf(received)
          : Option.none();

// --- [ENTRY_POINT] -----------------------------------------------------------

expect.extend({
    toBeFailure(received: Exit.Exit<unknown, unknown>, ...expected: [unknown?]): MatcherResult {
        const failure = failureOf(received);
        return judge(
            { check: Exit.isFailure(received), label: 'Failure', other: 'Success', value: Option.getOrUndefined(failure) },
            expected[0],
            expected.length > 0,
        );
    },
    toBeLeft(received: Either.Either<unknown, unknown>, ...expected: [unknown?]): MatcherResult {
        return judge(
            { check: Either.isLeft(received), label: 'Left', other: 'Right', value: Option.getOrUndefined(Either.getLeft(received)) },
            expected[0],
            expected.length > 0,
        );
    },
    toBeNone(received: Option.Option<unknown>): MatcherResult {
        return judge({ check: Option.isNone(received), label: 'None', other: 'Some', value: undefined }, undefined, false);
    },
    toBeRight(received: Either.Either<unknown, unknown>, ...expected: [unknown?]): MatcherResult {
        return judge(
            { check: Either.isRight(received), label: 'Right', other: 'Left', value: Option.getOrUndefined(Either.getRight(received)) },
            expected[0],
            expected.length > 0,
        );
    },
    toBeSome(received: Option.Option<unknown>, ...expected: [unknown?]): MatcherResult {
        return judge(
            { check: Option.isSome(received), label: 'Some', other: 'None', value: Option.getOrUndefined(received) },
            expected[0],
            expected.length > 0,
        );
    },
    toBeSuccess(received: Exit.Exit<unknown, unknown>, ...expected: [unknown?]): MatcherResult {
        return judge(
            {
                check: Exit.isSuccess(received),
                label: 'Success',
                other: 'Failure',
                value: Exit.isSuccess(received) ? received.value : undefined,
            },
            expected[0],
            expected.length > 0,
        );
    },
    toFailWithCode(received: unknown, code: string): MatcherResult {
        const actual = Option.flatMap(errorOf(received), (error) =>
            error instanceof InteractError ? Option.some(`${error.domain}:${String(error.code)}`) : Option.none(),
        );
        const pass = Option.contains(actual, code);
        const got = Option.getOrElse(actual, () => 'no InteractError');
        return { message: () => (pass ? `expected not to fail with ${code}` : `expected ${code} but got ${got}`), pass };
    },
});
