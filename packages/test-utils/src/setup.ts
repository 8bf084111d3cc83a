/**
 * Test setup: Effect equality testers, shared matchers, fast-check defaults.
 */
import './matchers/effect.ts';
import { addEqualityTesters } from '@effect/vitest';
import fc from 'fast-check';
import { TEST_CONSTANTS } from './constants.ts';

// --- [ENTRY_POINT] -----------------------------------------------------------

fc.configureGlobal(TEST_CONSTANTS.fc);
addEqualityTesters();
