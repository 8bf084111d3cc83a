/**
 * Validate InteractError construction, formatting and the domain code table.
 */
import { it } from '@fast-check/vitest';
import fc from 'fast-check';
import { describe, expect } from 'vitest';
import { ERROR_TUNING, InteractError } from '../src/errors.ts';

// --- [TESTS] -----------------------------------------------------------------

describe('InteractError', () => {
    it('uses the table message when no detail is given', () => {
        const error = InteractError.from('Invoke', 'CALLBACK_FAILED');
        expect([error._tag, error.domain, error.code, error.message]).toEqual([
            'InteractError',
            'Invoke',
            'CALLBACK_FAILED',
            'Exception in interact callback',
        ]);
        expect(error.cause).toBeUndefined();
    });

    it('appends detail and keeps the cause', () => {
        const cause = new Error('boom');
        const error = InteractError.from('Constraint', 'MAX_NOT_GREATER', '(min=5, max=1)', cause);
        expect(error.message).toBe('max must be greater than min: (min=5, max=1)');
        expect(error.formatted).toBe('[Constraint:MAX_NOT_GREATER] max must be greater than min: (min=5, max=1)');
        expect(error.cause).toBe(cause);
    });

    it.prop([fc.string({ maxLength: 12, minLength: 1 })])('quotes parameter names in messages', (name) => {
        const error = InteractError.from('Resolve', 'MISSING_ABBREVIATION', InteractError.quote(name));
        expect(error.message).toBe(`Cannot find control or abbreviation for argument: '${name}'`);
    });

    it('is an Error', () => {
        expect(InteractError.from('Infer', 'NO_CONTROL')).toBeInstanceOf(Error);
    });

    it('exposes a frozen code table', () => {
        expect(Object.isFrozen(ERROR_TUNING)).toBe(true);
        expect(Object.keys(ERROR_TUNING).sort()).toEqual([
            'Config',
            'Constraint',
            'Contract',
            'Control',
            'Infer',
            'Invoke',
            'Resolve',
        ]);
        expect(Object.keys(ERROR_TUNING.Contract).sort()).toEqual([
            'DUPLICATE_ARGUMENT',
            'MISSING_ARGUMENT',
            'UNEXPECTED_ARGUMENT',
        ]);
    });
});
