/**
 * Test constants: deterministic values for reproducible tests.
 */

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const env = (key: string): string | undefined => (typeof process === 'undefined' ? undefined : process.env[key]);
const seed = (raw: string | undefined): { readonly seed?: number } => {
    const parsed = raw === undefined ? Number.NaN : Number.parseInt(raw, 10);
    return Number.isNaN(parsed) ? {} : { seed: parsed };
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    fc: {
        interruptAfterTimeLimit: 5_000,
        numRuns: env('CI') ? 100 : 50,
        ...seed(env('FC_SEED')),
    },
    frozenTime: new Date('2025-01-15T12:00:00.000Z'),
});

// --- [EXPORT] ----------------------------------------------------------------

export { B as TEST_CONSTANTS };
