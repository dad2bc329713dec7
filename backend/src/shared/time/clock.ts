/**
 * backend/src/shared/time/clock.ts
 *
 * Injected wall clock. Services never call `new Date()` directly so tests can pin time.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
