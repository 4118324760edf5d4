/** Uniform draw in [0, 1); injectable so tests can fix the sequence. */
export type RandomSource = () => number;

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');
